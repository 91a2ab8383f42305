// Console output with the timestamps the CI console shows for every line.

export interface Logger {
    info(message: string, ...rest: unknown[]): void
    error(message: string, ...rest: unknown[]): void
    // shell-style trace of a command about to run
    trace(command: string): void
}

export function stamp(message: string, now: Date): string {
    return `[${now.toISOString()}] ${message}`
}

export function createConsoleLogger(clock: () => Date = () => new Date()): Logger {
    return {
        info(message, ...rest) {
            console.log(stamp(message, clock()), ...rest)
        },
        error(message, ...rest) {
            console.error(stamp(message, clock()), ...rest)
        },
        trace(command) {
            console.error(stamp(`+ ${command}`, clock()))
        },
    }
}

export const silentLogger: Logger = {
    info() { },
    error() { },
    trace() { },
}

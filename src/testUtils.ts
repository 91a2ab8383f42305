import { Logger } from "./log";
import { CommandOptions, CommandOutput, Exec, ExecException, StreamCommand, StreamOptions } from "./shell";

export type LoggedLine = { level: "info" | "error" | "trace", message: string }

export function recordingLogger(): Logger & { lines: LoggedLine[] } {
    const lines: LoggedLine[] = []
    return {
        lines,
        info: (message) => { lines.push({ level: "info", message }) },
        error: (message) => { lines.push({ level: "error", message }) },
        trace: (command) => { lines.push({ level: "trace", message: command }) },
    }
}

export type ExecCall = { command: string, options: CommandOptions }

/**
 * Stands in for the shell. Every command is recorded; `respond` decides what
 * each one prints or how it fails.
 */
export function fakeExec(respond: (command: string) => CommandOutput | Error = () => ({ stdout: "", stderr: "" })): Exec & { calls: ExecCall[] } {
    const calls: ExecCall[] = []
    const exec = async (command: string, options: CommandOptions): Promise<CommandOutput> => {
        calls.push({ command, options })
        const response = respond(command)
        if (response instanceof Error) {
            throw response
        }
        return response
    }
    return Object.assign(exec, { calls })
}

export function execFailure(cmd: string, fields: Partial<Pick<ExecException, "code" | "signal" | "stdout" | "stderr">>): ExecException {
    return Object.assign(new Error(`Command failed: ${cmd}`), { cmd, stdout: "", stderr: "", ...fields })
}

export type StreamCall = { file: string, args: string[], options: StreamOptions }

// Stands in for a streamed command; prints `lines` and exits with `status`.
export function fakeStream(status: number | Error = 0, lines: string[] = []): StreamCommand & { calls: StreamCall[] } {
    const calls: StreamCall[] = []
    const stream = async (file: string, args: string[], options: StreamOptions): Promise<number> => {
        calls.push({ file, args, options })
        if (status instanceof Error) {
            throw status
        }
        lines.forEach(line => options.onLine(line, "stdout"))
        return status
    }
    return Object.assign(stream, { calls })
}

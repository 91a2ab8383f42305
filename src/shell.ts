import { exec as execStd, spawn } from 'child_process';
import { constants } from 'os';
import readline from 'readline';
import util from 'util';

const execAsync = util.promisify(execStd);

// scp and ssh output only; the benchmark itself goes through streamCommand
const MAX_BUFFER = 16 * 1024 * 1024

export type CommandOptions = {
    cwd?: string
    env?: NodeJS.ProcessEnv
    signal?: AbortSignal
}

export type CommandOutput = {
    stdout: string
    stderr: string
}

export type Exec = (command: string, options: CommandOptions) => Promise<CommandOutput>

export const shellExec: Exec = async (command, options) => {
    const { stdout, stderr } = await execAsync(command, { ...options, encoding: "utf8", maxBuffer: MAX_BUFFER })
    return { stdout, stderr }
}

export interface ExecException extends Error {
    cmd?: string | undefined;
    killed?: boolean | undefined;
    code?: number | string | null | undefined;
    signal?: NodeJS.Signals | null | undefined;
    stdout: string;
    stderr: string;
}

export function isExecException(candidate: unknown): candidate is ExecException {
    if (candidate && typeof candidate === 'object' && 'cmd' in candidate) {
        return true;
    }
    return false;
}

/**
 * The status a shell would report for a finished command: its exit code, or
 * 128 plus the signal number when it was killed. Undefined when the command
 * never ran.
 */
export function exitStatus(e: ExecException): number | undefined {
    if (typeof e.code === "number") {
        return e.code
    }
    if (e.signal != null) {
        return signalStatus(e.signal)
    }
    return undefined
}

function signalStatus(signal: NodeJS.Signals): number {
    return 128 + constants.signals[signal]
}

export type OutputStream = "stdout" | "stderr"

export type StreamOptions = {
    cwd?: string
    env?: NodeJS.ProcessEnv
    onLine: (line: string, stream: OutputStream) => void
}

export type StreamCommand = (file: string, args: string[], options: StreamOptions) => Promise<number>

/**
 * Runs a command without buffering its output: every line is handed to
 * `onLine` as it arrives. Resolves with the exit status, rejects only when
 * the command could not be started.
 */
export const streamCommand: StreamCommand = (file, args, options) => {
    return new Promise((resolve, reject) => {
        const child = spawn(file, args, {
            cwd: options.cwd,
            env: options.env,
            stdio: ['ignore', 'pipe', 'pipe'],
        })

        readline.createInterface({ input: child.stdout }).on('line', line => options.onLine(line, "stdout"))
        readline.createInterface({ input: child.stderr }).on('line', line => options.onLine(line, "stderr"))

        child.on('error', reject)
        child.on('close', (code, signal) => {
            if (code !== null) {
                resolve(code)
            } else if (signal !== null) {
                resolve(signalStatus(signal))
            } else {
                reject(new Error(`${file} ended without an exit status`))
            }
        })
    })
}

const SAFE = /^[A-Za-z0-9_\/.:@=+,-]+$/

export function quote(arg: string): string {
    if (SAFE.test(arg)) {
        return arg
    }
    return "'" + arg.replace(/'/g, "'\\''") + "'"
}

import { Logger, silentLogger } from "./log";
import { REMOTE_USER } from "./layout";
import { CommandOutput, Exec, exitStatus, isExecException, quote, shellExec } from "./shell";

const HEREDOC = "REMOTE_SCRIPT"

/**
 * File transfer and command execution on remote hosts. Remote paths may hold
 * globs; they are expanded on the remote side.
 */
export interface RemoteAccess {
    pull(host: string, remotePath: string, localPath: string): Promise<void>
    push(host: string, localPath: string, remotePath: string): Promise<void>
    // feeds `script` to `bash -s` on the host, with `args` as $1..$n
    script(host: string, script: string, args: string[]): Promise<CommandOutput>
}

export class RemoteCommandError extends Error {
    readonly command: string
    readonly exitCode: number | undefined
    readonly stdout: string
    readonly stderr: string

    constructor(command: string, cause: unknown) {
        const exitCode = isExecException(cause) ? exitStatus(cause) : undefined
        const reason = exitCode !== undefined ? `exit code ${exitCode}` : cause instanceof Error ? cause.message : String(cause)
        super(`remote command failed (${reason}): ${command}`, { cause })
        this.name = "RemoteCommandError"
        this.command = command
        this.exitCode = exitCode
        this.stdout = isExecException(cause) ? cause.stdout : ""
        this.stderr = isExecException(cause) ? cause.stderr : ""
    }
}

export type SshRemoteOpts = {
    exec?: Exec
    logger?: Logger
    user?: string
    timeoutSecs?: number
    baseEnv?: NodeJS.ProcessEnv
}

export class SshRemote implements RemoteAccess {
    private readonly exec: Exec
    private readonly logger: Logger
    private readonly user: string
    private readonly timeoutSecs?: number
    private readonly baseEnv: NodeJS.ProcessEnv

    constructor(opts: SshRemoteOpts = {}) {
        this.exec = opts.exec ?? shellExec
        this.logger = opts.logger ?? silentLogger
        this.user = opts.user ?? REMOTE_USER
        this.timeoutSecs = opts.timeoutSecs
        this.baseEnv = opts.baseEnv ?? process.env
    }

    async pull(host: string, remotePath: string, localPath: string): Promise<void> {
        await this.run(`scp ${quote(this.target(host, remotePath))} ${quote(localPath)}`)
    }

    async push(host: string, localPath: string, remotePath: string): Promise<void> {
        await this.run(`scp ${quote(localPath)} ${quote(this.target(host, remotePath))}`)
    }

    async script(host: string, script: string, args: string[]): Promise<CommandOutput> {
        const remoteCommand = ["bash", "-s", ...args.map(quote)].join(" ")
        const command = `ssh -T ${quote(`${this.user}@${host}`)} ${quote(remoteCommand)} <<'${HEREDOC}'\n${script}\n${HEREDOC}`
        return this.run(command)
    }

    private target(host: string, remotePath: string): string {
        return `${this.user}@${host}:${remotePath}`
    }

    private async run(command: string): Promise<CommandOutput> {
        this.logger.trace(command)
        try {
            const output = await this.exec(command, {
                env: this.baseEnv,
                signal: this.timeoutSecs !== undefined ? AbortSignal.timeout(1000 * this.timeoutSecs) : undefined,
            })
            if (output.stdout.length > 0) {
                this.logger.info(output.stdout.trimEnd())
            }
            return output
        } catch (e) {
            if (isExecException(e) && e.stderr.length > 0) {
                this.logger.error(e.stderr.trimEnd())
            }
            throw new RemoteCommandError(command, e)
        }
    }
}

import { promises as fs } from 'fs';
import path from 'path';
import { artifactsDir } from "./artifacts";
import { RUN_TEST_FUNCTION, SUPPORT_SCRIPT } from "./layout";
import { Logger, silentLogger } from "./log";
import { hostsFor, JobParameters, remoteEnvironment } from "./params";
import { quote, StreamCommand, streamCommand } from "./shell";

/**
 * Runs the benchmark against the cloud under test and reports the exit
 * status of that run. A non-zero status is a test failure, not an error.
 */
export interface RemoteRunner {
    run(params: JobParameters): Promise<number>
}

/**
 * The test operation could not be started at all, so there is no test
 * result to report.
 */
export class InvocationError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options)
        this.name = "InvocationError"
    }
}

export type SupportScriptRunnerOpts = {
    stream?: StreamCommand
    logger?: Logger
    baseEnv?: NodeJS.ProcessEnv
    shell?: string
}

/**
 * What the support script finds in its environment: the job parameters
 * plus the variables the job shell had set when it sourced the script.
 */
export function supportScriptEnvironment(params: JobParameters, workspace: string): Record<string, string> {
    const hosts = hostsFor(params)
    return {
        ...remoteEnvironment(params),
        admin: hosts.admin,
        cloud: hosts.cloud,
        artifacts_dir: artifactsDir(workspace),
    }
}

/**
 * Sources the support script fetched from the admin host and calls its
 * test entry point, which talks to the results host on its own. Output is
 * passed on line by line while the run goes.
 */
export class SupportScriptRunner implements RemoteRunner {
    private readonly stream: StreamCommand
    private readonly logger: Logger
    private readonly baseEnv: NodeJS.ProcessEnv
    private readonly shell: string

    constructor(private readonly workspace: string, opts: SupportScriptRunnerOpts = {}) {
        this.stream = opts.stream ?? streamCommand
        this.logger = opts.logger ?? silentLogger
        this.baseEnv = opts.baseEnv ?? process.env
        this.shell = opts.shell ?? "bash"
    }

    async run(params: JobParameters): Promise<number> {
        const script = path.join(this.workspace, SUPPORT_SCRIPT)
        try {
            await fs.access(script)
        } catch (e) {
            throw new InvocationError(`support script ${script} is not available`, { cause: e })
        }

        const command = `source ${quote(script)}; ${RUN_TEST_FUNCTION}`
        this.logger.trace(`${this.shell} -c ${quote(command)}`)

        try {
            return await this.stream(this.shell, ["-c", command], {
                cwd: this.workspace,
                env: { ...this.baseEnv, ...supportScriptEnvironment(params, this.workspace) },
                onLine: (line, stream) => stream === "stdout" ? this.logger.info(line) : this.logger.error(line),
            })
        } catch (e) {
            throw new InvocationError(`could not start ${RUN_TEST_FUNCTION}`, { cause: e })
        }
    }
}

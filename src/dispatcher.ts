import path from 'path';
import { artifactsDir, listArtifacts, resetArtifacts } from "./artifacts";
import {
    ADMIN_SCENARIO,
    ADMIN_SUPPORT_SCRIPT,
    ARCHIVE_SCRIPT,
    RESULTS_DIR,
    RESULTS_SCENARIO_DIR,
    SCENARIO_FILE,
    SUPPORT_SCRIPT,
} from "./layout";
import { Logger, silentLogger } from "./log";
import { DispatchConfig, hostsFor } from "./params";
import { attempt, runPipeline, Stage, StageOutcome } from "./pipeline";
import { RemoteAccess, RemoteCommandError } from "./remote";
import { InvocationError, RemoteRunner } from "./runner";

export type DispatchStage =
    | "preparing"
    | "distributing-inputs"
    | "running-remote-test"
    | "archiving-remote-results"
    | "collecting-artifacts"

export type DispatchState = DispatchStage | "done"

/**
 * passed/failed: the test ran and exited zero/non-zero.
 * aborted: a stage before the test run failed, nothing was run.
 * infrastructure: the test operation itself could not be started.
 */
export type DispatchKind = "passed" | "failed" | "aborted" | "infrastructure"

export type DispatchReport = {
    exitCode: number
    kind: DispatchKind
    stages: StageOutcome<DispatchStage>[]
    // contents of the artifact directory once the dispatch is done
    artifacts: string[]
}

export type DispatchDeps = {
    remote: RemoteAccess
    runner: RemoteRunner
    logger?: Logger
    onTransition?: (state: DispatchState) => void
}

// "command not found", what a shell reports when it cannot run the test
export const INVOCATION_FAILURE_EXIT_CODE = 127

export async function dispatch(config: DispatchConfig, deps: DispatchDeps): Promise<DispatchReport> {
    const { remote, runner } = deps
    const logger = deps.logger ?? silentLogger
    const { params, workspace, buildNumber } = config
    const hosts = hostsFor(params)
    const artifacts = artifactsDir(workspace)

    const testRun: { exitCode?: number } = {}

    const stages: Stage<DispatchStage>[] = [
        {
            name: "preparing",
            bestEffort: false,
            run: () => attempt(() => resetArtifacts(artifacts)),
        },
        {
            name: "distributing-inputs",
            bestEffort: false,
            run: () => attempt(async () => {
                await remote.pull(hosts.admin, ADMIN_SUPPORT_SCRIPT, path.join(workspace, SUPPORT_SCRIPT))
                await remote.pull(hosts.admin, ADMIN_SCENARIO, path.join(workspace, SCENARIO_FILE))
                await remote.push(hosts.results, path.join(workspace, SCENARIO_FILE), RESULTS_SCENARIO_DIR)
            }),
        },
        {
            name: "running-remote-test",
            bestEffort: false,
            run: () => attempt(async () => {
                testRun.exitCode = await runner.run(params)
                return `exit code ${testRun.exitCode}`
            }),
        },
        // Archival and collection never change the exit code of the test run.
        {
            name: "archiving-remote-results",
            bestEffort: true,
            run: () => attempt(async () => {
                await remote.script(hosts.results, ARCHIVE_SCRIPT, [buildNumber])
            }),
        },
        {
            name: "collecting-artifacts",
            bestEffort: true,
            run: () => attempt(() => remote.pull(hosts.results, `${RESULTS_DIR}/*`, artifacts)),
        },
    ]

    const result = await runPipeline(stages, {
        onStart: (stage) => deps.onTransition?.(stage),
        onFailure: (stage, error) => logger.error(`${stage} failed: ${error.message}`),
    })
    deps.onTransition?.("done")

    // the listing is informational; it must not replace the dispatch result
    const listed = await listArtifacts(artifacts).catch((e: unknown) => {
        logger.error(`could not list ${artifacts}: ${e instanceof Error ? e.message : String(e)}`)
        return []
    })
    const report = (exitCode: number, kind: DispatchKind): DispatchReport =>
        ({ exitCode, kind, stages: result.outcomes, artifacts: listed })

    if (result.abortedBy !== undefined) {
        const error = result.abortedBy.error
        if (error instanceof InvocationError) {
            return report(INVOCATION_FAILURE_EXIT_CODE, "infrastructure")
        }
        return report(abortCode(error), "aborted")
    }

    const exitCode = testRun.exitCode
    if (exitCode === undefined) {
        throw new Error("test run finished without an exit code")
    }
    return report(exitCode, exitCode === 0 ? "passed" : "failed")
}

function abortCode(error: Error | undefined): number {
    if (error instanceof RemoteCommandError && error.exitCode !== undefined && error.exitCode !== 0) {
        return error.exitCode
    }
    return 1
}

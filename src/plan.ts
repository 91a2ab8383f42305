import path from 'path';
import { stringify } from 'yaml';
import { artifactsDir } from "./artifacts";
import { DispatchStage } from "./dispatcher";
import {
    ADMIN_SCENARIO,
    ADMIN_SUPPORT_SCRIPT,
    ARCHIVE_SCRIPT,
    RESULTS_DIR,
    RESULTS_SCENARIO_DIR,
    RUN_TEST_FUNCTION,
    SCENARIO_FILE,
    SUPPORT_SCRIPT,
} from "./layout";
import { buildName, DispatchConfig, HostSet, hostsFor } from "./params";
import { supportScriptEnvironment } from "./runner";

export type PlannedOperation =
    | { stage: DispatchStage, op: "reset", dir: string }
    | { stage: DispatchStage, op: "pull", host: string, from: string, to: string }
    | { stage: DispatchStage, op: "push", host: string, from: string, to: string }
    | { stage: DispatchStage, op: "run", call: string, env: Record<string, string> }
    | { stage: DispatchStage, op: "script", host: string, args: string[], script: string }

export type Plan = {
    build: string
    hosts: HostSet
    operations: PlannedOperation[]
}

// What a dispatch with this config would do, in order, without doing any of it.
export function planDispatch(config: DispatchConfig): Plan {
    const { params, workspace, buildNumber } = config
    const hosts = hostsFor(params)
    const artifacts = artifactsDir(workspace)

    return {
        build: buildName(params, buildNumber),
        hosts,
        operations: [
            { stage: "preparing", op: "reset", dir: artifacts },
            { stage: "distributing-inputs", op: "pull", host: hosts.admin, from: ADMIN_SUPPORT_SCRIPT, to: path.join(workspace, SUPPORT_SCRIPT) },
            { stage: "distributing-inputs", op: "pull", host: hosts.admin, from: ADMIN_SCENARIO, to: path.join(workspace, SCENARIO_FILE) },
            { stage: "distributing-inputs", op: "push", host: hosts.results, from: path.join(workspace, SCENARIO_FILE), to: RESULTS_SCENARIO_DIR },
            { stage: "running-remote-test", op: "run", call: RUN_TEST_FUNCTION, env: supportScriptEnvironment(params, workspace) },
            { stage: "archiving-remote-results", op: "script", host: hosts.results, args: [buildNumber], script: ARCHIVE_SCRIPT },
            { stage: "collecting-artifacts", op: "pull", host: hosts.results, from: `${RESULTS_DIR}/*`, to: artifacts },
        ],
    }
}

export function renderPlan(config: DispatchConfig): string {
    return stringify(planDispatch(config))
}

#!/usr/bin/env node
import path from "path";
import process from "process";
import yargs from "yargs/yargs";
import { displayBuildBanner } from "./src/bannerUtils";
import { dispatch } from "./src/dispatcher";
import { createConsoleLogger } from "./src/log";
import {
    buildName,
    DispatchConfig,
    hostsFor,
    parametersFromEnv,
    resolveBuildNumber,
    resolveParameters,
    resolveTimeout,
} from "./src/params";
import { renderPlan } from "./src/plan";
import { SshRemote } from "./src/remote";
import { SupportScriptRunner } from "./src/runner";
import { SUMMARY_FILE, writeSummary } from "./src/summary";

export async function main(args: string[], env: NodeJS.ProcessEnv): Promise<number> {
    const argv = yargs(args)
        .options({
            'hw-number': {
                description: 'Mandatory, number of the QA cloud server (env: hw_number)',
                type: 'string',
            },
            'image-name': {
                description: 'Image the rally tests boot; it must already be uploaded (env: image_name)',
                type: 'string',
            },
            'scenario-name': {
                description: 'Scenario name, typically an integer with a single letter (env: scenario_name)',
                type: 'string',
            },
            'scenario-job-name': {
                description: 'Name of the scenario job that triggered this run (env: scenario_job_name)',
                type: 'string',
            },
            'scenario-build-number': {
                description: 'Build number of the scenario job that triggered this run (env: scenario_build_number)',
                type: 'string',
            },
            'rally-server': {
                description: 'Host where rally is set up (env: rally_server)',
                type: 'string',
            },
            'workspace': {
                description: 'Directory the inputs and artifacts go to (env: WORKSPACE)',
                type: 'string',
            },
            'build-number': {
                description: 'Build number, used to name the result backup (env: BUILD_NUMBER)',
                type: 'string',
            },
            'remote-timeout': {
                description: 'Seconds before a copy or ssh command is given up (env: REMOTE_TIMEOUT)',
                type: 'string',
            },
            'summary': {
                description: `Where to write the per-stage summary (default: <workspace>/${SUMMARY_FILE})`,
                type: 'string',
            },
            'emit-only': {
                alias: 'e',
                description: 'Only print what would be done',
                default: false,
                type: 'boolean',
            },
        })
        .help()
        .version(false)
        .alias('help', 'h')
        .strict()
        .parseSync()

    const fromEnv = parametersFromEnv(env)
    const params = resolveParameters({
        hwNumber: argv['hw-number'] ?? fromEnv.hwNumber,
        imageName: argv['image-name'] ?? fromEnv.imageName,
        scenarioName: argv['scenario-name'] ?? fromEnv.scenarioName,
        scenarioJobName: argv['scenario-job-name'] ?? fromEnv.scenarioJobName,
        scenarioBuildNumber: argv['scenario-build-number'] ?? fromEnv.scenarioBuildNumber,
        rallyServer: argv['rally-server'] ?? fromEnv.rallyServer,
    })
    const workspace = path.resolve(argv.workspace ?? env.WORKSPACE ?? process.cwd())
    const config: DispatchConfig = {
        params,
        workspace,
        buildNumber: resolveBuildNumber(argv['build-number'] ?? env.BUILD_NUMBER),
        remoteTimeoutSecs: resolveTimeout(argv['remote-timeout'] ?? env.REMOTE_TIMEOUT),
    }

    if (argv['emit-only']) {
        console.log(renderPlan(config))
        return 0
    }

    const logger = createConsoleLogger()
    const hosts = hostsFor(params)
    displayBuildBanner(logger, buildName(params, config.buildNumber), [
        `admin: ${hosts.admin}`,
        `cloud: ${hosts.cloud}`,
        `rally server: ${hosts.results}`,
        `image: ${params.imageName}`,
    ])

    const report = await dispatch(config, {
        remote: new SshRemote({ logger, timeoutSecs: config.remoteTimeoutSecs, baseEnv: env }),
        runner: new SupportScriptRunner(workspace, { logger, baseEnv: env }),
        logger,
        onTransition: (state) => logger.info(`== ${state}`),
    })

    const summary = argv.summary ?? path.join(workspace, SUMMARY_FILE)
    try {
        await writeSummary(summary, report)
    } catch (e) {
        logger.error(`could not write summary ${summary}`, e)
    }
    logger.info(`${report.kind}, exit code ${report.exitCode}`)
    logger.info(`artifacts: ${report.artifacts.join(", ")}`)

    return report.exitCode
}

if (require.main === module) {
    main(process.argv.slice(2), process.env)
        .then((code) => process.exit(code))
        .catch((err) => {
            console.error(err);
            process.exit(1);
        });
}

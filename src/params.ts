export const DEFAULT_IMAGE_NAME = "jeos-rally"
export const DEFAULT_RALLY_SERVER = "backup.cloudadm.qa.suse.de"

export type JobParameters = {
    readonly hwNumber: string
    readonly imageName: string
    readonly scenarioName: string
    readonly scenarioJobName: string
    readonly scenarioBuildNumber: string
    readonly rallyServer: string
}

export type HostSet = {
    admin: string
    cloud: string
    results: string
}

export type DispatchConfig = {
    params: JobParameters
    workspace: string
    buildNumber: string
    // unset means scp/ssh decide for themselves
    remoteTimeoutSecs?: number
}

export type RawParameters = {
    hwNumber?: string
    imageName?: string
    scenarioName?: string
    scenarioJobName?: string
    scenarioBuildNumber?: string
    rallyServer?: string
}

export class ParameterError extends Error {
    constructor(message: string) {
        super(message)
        this.name = "ParameterError"
    }
}

const DIGITS = /^\d+$/

function orDefault(value: string | undefined, fallback: string): string {
    if (value === undefined || value.trim() === "") {
        return fallback
    }
    return value.trim()
}

export function resolveParameters(raw: RawParameters): JobParameters {
    const hwNumber = orDefault(raw.hwNumber, "")
    if (hwNumber === "") {
        throw new ParameterError("hw_number is mandatory")
    }
    if (!DIGITS.test(hwNumber)) {
        throw new ParameterError(`hw_number must be a number, got "${hwNumber}"`)
    }

    return Object.freeze({
        hwNumber,
        imageName: orDefault(raw.imageName, DEFAULT_IMAGE_NAME),
        scenarioName: orDefault(raw.scenarioName, ""),
        scenarioJobName: orDefault(raw.scenarioJobName, ""),
        scenarioBuildNumber: orDefault(raw.scenarioBuildNumber, ""),
        rallyServer: orDefault(raw.rallyServer, DEFAULT_RALLY_SERVER),
    })
}

/**
 * Reads the job parameters the way the CI system materializes them: one
 * lower-case environment variable per parameter.
 */
export function parametersFromEnv(env: NodeJS.ProcessEnv): RawParameters {
    return {
        hwNumber: env.hw_number,
        imageName: env.image_name,
        scenarioName: env.scenario_name,
        scenarioJobName: env.scenario_job_name,
        scenarioBuildNumber: env.scenario_build_number,
        rallyServer: env.rally_server,
    }
}

export function hostsFor(params: JobParameters): HostSet {
    return {
        admin: `crowbar${params.hwNumber}`,
        cloud: `qa${params.hwNumber}`,
        results: params.rallyServer,
    }
}

export function resolveBuildNumber(raw: string | undefined): string {
    const buildNumber = orDefault(raw, "")
    if (!DIGITS.test(buildNumber)) {
        throw new ParameterError(`BUILD_NUMBER must be a number, got "${buildNumber}"`)
    }
    return buildNumber
}

export function resolveTimeout(raw: string | number | undefined): number | undefined {
    if (raw === undefined || raw === "") {
        return undefined
    }
    const timeout = typeof raw === "number" ? raw : parseInt(raw, 10)

    if (isNaN(timeout) || timeout <= 0) {
        throw new ParameterError(`remote timeout must be a positive number of seconds, got "${raw}"`)
    }

    return timeout
}

// e.g. "#42 - 7a - qa2 - openstack-rally"
export function buildName(params: JobParameters, buildNumber: string): string {
    return `#${buildNumber} - ${params.scenarioName} - qa${params.hwNumber} - openstack-rally`
}

/**
 * The environment the support script sees. Every job parameter is passed on,
 * under the name the CI system gives it.
 */
export function remoteEnvironment(params: JobParameters): Record<string, string> {
    return {
        hw_number: params.hwNumber,
        image_name: params.imageName,
        scenario_name: params.scenarioName,
        scenario_job_name: params.scenarioJobName,
        scenario_build_number: params.scenarioBuildNumber,
        rally_server: params.rallyServer,
    }
}

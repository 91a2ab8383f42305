export type StageResult =
    | { ok: true, detail?: string }
    | { ok: false, error: Error }

export interface Stage<Name extends string = string> {
    name: Name
    /**
     * A best-effort stage records its failure and lets the pipeline carry on.
     * Any other stage failing ends the pipeline and skips the rest.
     */
    bestEffort: boolean
    run(): Promise<StageResult>
}

export type StageStatus = "ok" | "failed" | "skipped"

export type StageOutcome<Name extends string = string> = {
    stage: Name
    status: StageStatus
    bestEffort: boolean
    detail?: string
    error?: Error
}

export type PipelineResult<Name extends string = string> = {
    // set when a stage that is not best-effort failed
    abortedBy?: StageOutcome<Name>
    outcomes: StageOutcome<Name>[]
}

export type PipelineHooks<Name extends string> = {
    onStart?: (stage: Name) => void
    onFailure?: (stage: Name, error: Error) => void
}

/**
 * Turns a throwing action into a stage result. A string returned by the
 * action becomes the result's detail.
 */
export async function attempt(action: () => Promise<string | void>): Promise<StageResult> {
    try {
        const detail = await action()
        return typeof detail === "string" ? { ok: true, detail } : { ok: true }
    } catch (e) {
        return { ok: false, error: e instanceof Error ? e : new Error(String(e)) }
    }
}

export async function runPipeline<Name extends string>(stages: Stage<Name>[], hooks: PipelineHooks<Name> = {}): Promise<PipelineResult<Name>> {
    const outcomes: StageOutcome<Name>[] = []

    for (let i = 0; i < stages.length; i++) {
        const stage = stages[i]
        hooks.onStart?.(stage.name)

        const result = await stage.run()
        if (result.ok) {
            outcomes.push({ stage: stage.name, status: "ok", bestEffort: stage.bestEffort, detail: result.detail })
            continue
        }

        hooks.onFailure?.(stage.name, result.error)
        const failed: StageOutcome<Name> = {
            stage: stage.name,
            status: "failed",
            bestEffort: stage.bestEffort,
            detail: result.error.message,
            error: result.error,
        }
        outcomes.push(failed)

        if (!stage.bestEffort) {
            for (const skipped of stages.slice(i + 1)) {
                outcomes.push({ stage: skipped.name, status: "skipped", bestEffort: skipped.bestEffort })
            }
            return { abortedBy: failed, outcomes }
        }
    }

    return { outcomes }
}

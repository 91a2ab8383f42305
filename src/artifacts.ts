import { promises as fs } from 'fs';
import path from 'path';
import { ARTIFACTS_DIR, IGNORE_MARKER } from "./layout";

export function artifactsDir(workspace: string): string {
    return path.join(workspace, ARTIFACTS_DIR)
}

/**
 * Wipes the directory and leaves only the marker in it, so the CI artifact
 * collector keeps the directory even when nothing is copied back.
 */
export async function resetArtifacts(dir: string): Promise<void> {
    await fs.rm(dir, { recursive: true, force: true })
    await fs.mkdir(dir, { recursive: true })
    await fs.writeFile(path.join(dir, IGNORE_MARKER), "")
}

// Sorted file names; a directory that could not be created lists as empty.
export async function listArtifacts(dir: string): Promise<string[]> {
    try {
        return (await fs.readdir(dir)).sort()
    } catch (e) {
        if (isMissing(e)) {
            return []
        }
        throw e
    }
}

function isMissing(e: unknown): boolean {
    return e instanceof Error && 'code' in e && (e.code === "ENOENT" || e.code === "ENOTDIR")
}

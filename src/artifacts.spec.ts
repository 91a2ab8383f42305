import fs from "fs";
import os from "os";
import path from "path";
import { artifactsDir, listArtifacts, resetArtifacts } from "./artifacts";

describe("artifact directory", () => {
    let workspace: string

    beforeEach(() => {
        workspace = fs.mkdtempSync(path.join(os.tmpdir(), "artifacts-"))
    });

    afterEach(() => {
        fs.rmSync(workspace, { recursive: true, force: true })
    });

    it("lives in the workspace", () => {
        expect(artifactsDir("/ws")).toEqual("/ws/.artifacts")
    });

    it("is created with only the marker in it", async () => {
        const dir = artifactsDir(workspace)

        await resetArtifacts(dir)

        expect(await listArtifacts(dir)).toEqual([".ignore"])
        expect(fs.readFileSync(path.join(dir, ".ignore"), "utf8")).toEqual("")
    });

    it("drops whatever a previous run left behind", async () => {
        const dir = artifactsDir(workspace)
        fs.mkdirSync(path.join(dir, "nested"), { recursive: true })
        fs.writeFileSync(path.join(dir, "rally-results.json"), "{}")
        fs.writeFileSync(path.join(dir, "nested", "old.html"), "<html></html>")

        await resetArtifacts(dir)

        expect(await listArtifacts(dir)).toEqual([".ignore"])
    });

    it("lists files sorted by name", async () => {
        const dir = artifactsDir(workspace)
        await resetArtifacts(dir)
        fs.writeFileSync(path.join(dir, "b.json"), "")
        fs.writeFileSync(path.join(dir, "a.html"), "")

        expect(await listArtifacts(dir)).toEqual([".ignore", "a.html", "b.json"])
    });

    it("lists a missing directory as empty", async () => {
        expect(await listArtifacts(path.join(workspace, "missing"))).toEqual([])
    });
});

import { exitStatus, isExecException, quote } from "./shell";
import { execFailure } from "./testUtils";

describe("quoting", () => {
    it.each([
        ["root@crowbar2:/root/scripts/jenkins-support.sh", "root@crowbar2:/root/scripts/jenkins-support.sh"],
        ["root@rally:/root/results/*", "'root@rally:/root/results/*'"],
        ["bash -s 42", "'bash -s 42'"],
        ["it's", "'it'\\''s'"],
        ["", "''"],
    ])("quotes %s as %s", (arg, quoted) => {
        expect(quote(arg)).toEqual(quoted)
    });
});

describe("exit status", () => {
    it("is the exit code of a command that ran", () => {
        expect(exitStatus(execFailure("false", { code: 3 }))).toEqual(3)
    });

    it("follows the shell convention for a killed command", () => {
        expect(exitStatus(execFailure("sleep 100", { code: null, signal: "SIGKILL" }))).toEqual(137)
        expect(exitStatus(execFailure("sleep 100", { code: null, signal: "SIGTERM" }))).toEqual(143)
    });

    it("is unknown when the command never ran", () => {
        expect(exitStatus(execFailure("missing", { code: "ENOENT" }))).toBeUndefined()
    });
});

describe("exec exception detection", () => {
    it("recognizes errors raised by exec", () => {
        expect(isExecException(execFailure("false", { code: 1 }))).toBe(true)
    });

    it("rejects anything else", () => {
        expect(isExecException(new Error("boom"))).toBe(false)
        expect(isExecException("boom")).toBe(false)
        expect(isExecException(null)).toBe(false)
    });
});

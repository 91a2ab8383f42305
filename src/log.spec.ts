import { createConsoleLogger, stamp } from "./log";

describe("console logger", () => {
    const now = new Date("2026-03-01T10:00:00.000Z")

    afterEach(() => {
        jest.restoreAllMocks()
    });

    it("prefixes lines with an ISO timestamp", () => {
        expect(stamp("preparing", now)).toEqual("[2026-03-01T10:00:00.000Z] preparing")
    });

    it("writes info to stdout and errors to stderr", () => {
        const log = jest.spyOn(console, "log").mockImplementation(() => { })
        const error = jest.spyOn(console, "error").mockImplementation(() => { })
        const logger = createConsoleLogger(() => now)

        logger.info("copying inputs")
        logger.error("archiving failed")

        expect(log).toHaveBeenCalledWith("[2026-03-01T10:00:00.000Z] copying inputs")
        expect(error).toHaveBeenCalledWith("[2026-03-01T10:00:00.000Z] archiving failed")
    });

    it("traces commands the way a shell does", () => {
        const error = jest.spyOn(console, "error").mockImplementation(() => { })
        const logger = createConsoleLogger(() => now)

        logger.trace("scp root@crowbar2:/root/x .")

        expect(error).toHaveBeenCalledWith("[2026-03-01T10:00:00.000Z] + scp root@crowbar2:/root/x .")
    });
});

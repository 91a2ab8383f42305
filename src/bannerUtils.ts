import { Logger } from "./log";

/**
 * Generate a centered banner with a title
 *
 * @param title - The text to display in the banner
 * @param width - Total width of the banner (default: 80)
 * @param char - Character to use for the banner border (default: "=")
 * @returns The formatted banner string
 *
 * @example
 * createBanner("running-remote-test", 40, "-")
 * // Returns: "--------- running-remote-test ----------"
 */
export function createBanner(title: string, width: number = 80, char: string = "="): string {
    if (title.length === 0) {
        return char.repeat(width);
    }

    const totalPadding = width - title.length - 2; // -2 for spaces around title

    if (totalPadding < 2) {
        return char.repeat(2) + " " + title + " " + char.repeat(2);
    }

    const leftPadding = Math.floor(totalPadding / 2);
    const rightPadding = Math.ceil(totalPadding / 2);

    return char.repeat(leftPadding) + " " + title + " " + char.repeat(rightPadding);
}

/**
 * Display the build banner: the build name framed above and below, followed
 * by the hosts the run is going to talk to.
 *
 * @example
 * displayBuildBanner(logger, "#42 - 7a - qa2 - openstack-rally", ["admin: crowbar2", "cloud: qa2"])
 */
export function displayBuildBanner(logger: Logger, name: string, details: string[], width: number = 80): void {
    logger.info(createBanner(name, width, "="));
    details.forEach(detail => logger.info(`  • ${detail}`));
    logger.info(createBanner("", width, "="));
}

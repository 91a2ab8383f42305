// Fixed file layout on the hosts a dispatch talks to. Other tooling on those
// hosts expects exactly these paths.

export const REMOTE_USER = "root"

export const SUPPORT_SCRIPT = "jenkins-support.sh"
export const SCENARIO_FILE = "rally-test.json"

export const ADMIN_SUPPORT_SCRIPT = `/root/scripts/${SUPPORT_SCRIPT}`
export const ADMIN_SCENARIO = `/root/scripts/scenarios/rally/${SCENARIO_FILE}`

export const RESULTS_SCENARIO_DIR = "/root/"
export const RESULTS_DIR = "/root/results"
export const BACKUP_ROOT = "/root/rally-results-backup"

export const ARTIFACTS_DIR = ".artifacts"
export const IGNORE_MARKER = ".ignore"

export const RUN_TEST_FUNCTION = "connect_rally_server_run_test"

// Run on the results host with the build number as $1.
export const ARCHIVE_SCRIPT = [
    "buildnumber=$1",
    `mkdir -p ${BACKUP_ROOT}/$buildnumber`,
    `cp ${RESULTS_DIR}/* ${BACKUP_ROOT}/$buildnumber/`,
].join("\n")

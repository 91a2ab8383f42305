import { stringify } from "csv-stringify/sync";
import { promises as fs } from 'fs';
import { DispatchReport } from "./dispatcher";

export const SUMMARY_FILE = "dispatch-summary.csv"

export function summaryRows(report: DispatchReport): string[][] {
    const rows: string[][] = [["stage", "status", "detail"]]
    for (const outcome of report.stages) {
        rows.push([outcome.stage, outcome.status, outcome.detail ?? ""])
    }
    rows.push(["done", report.kind, `exit code ${report.exitCode}`])
    return rows
}

export async function writeSummary(file: string, report: DispatchReport): Promise<void> {
    await fs.writeFile(file, stringify(summaryRows(report)))
}

import { RunReport } from "../types/runReport";
import { writeJson, writeJsonMin } from "../utils/fs";
import { assertValidSchema, getRunReportValidator } from "../validation/jsonSchema";

export interface ReportPaths {
  reportPath: string;
  minReportPath: string | null;
}

export async function writeRunReport(report: RunReport, paths: ReportPaths): Promise<void> {
  assertValidSchema(getRunReportValidator(), report, "Run report");
  await writeJson(paths.reportPath, report);
  if (paths.minReportPath) {
    await writeJsonMin(paths.minReportPath, report);
  }
}

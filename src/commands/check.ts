import path from "path";
import { BaselineStore } from "../baseline/baselineStore";
import { loadRegistry, selectSources } from "../config/registry";
import { Settings } from "../config/settings";
import { DetectorDeps, DriftDetector } from "../detect/driftDetector";
import { writeRunReport } from "../io/runReport";
import { exitCodeFor, formatSummary } from "../report/summary";
import { RunReport } from "../types/runReport";
import { createLogger } from "../utils/logger";
import { runIdAt } from "../utils/time";

const logger = createLogger("[Check]");

export interface CheckOptions {
  settings: Settings;
  only?: string[];
  runId?: string;
  deps?: DetectorDeps;
}

export interface CheckResult {
  report: RunReport;
  exitCode: number;
  baselinePersisted: boolean;
}

/**
 * One complete run. Registry and baseline problems throw ConfigurationError
 * before any network activity; per-source problems end up in the report.
 */
export async function runCheck(options: CheckOptions): Promise<CheckResult> {
  const { settings } = options;
  const registryPath = path.resolve(settings.registryPath);
  const registry = await loadRegistry(registryPath);
  const sources = selectSources(registry, options.only);

  const baseline = new BaselineStore(path.resolve(settings.baselinePath));
  await baseline.load();

  const detector = new DriftDetector(settings.detector, options.deps);
  const report = await detector.run(sources, baseline, {
    runId: options.runId ?? runIdAt(Date.now()),
    registryPath
  });

  await writeRunReport(report, {
    reportPath: path.resolve(settings.reportPath),
    minReportPath: settings.minReportPath ? path.resolve(settings.minReportPath) : null
  });
  const baselinePersisted = await baseline.persist();
  if (baselinePersisted) {
    logger.info(`Baseline ${baseline.path} updated`);
  }

  logger.info(`Run ${report.run_id} finished: ${formatSummary(report.summary)}`);
  return { report, exitCode: exitCodeFor(report), baselinePersisted };
}

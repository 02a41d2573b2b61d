#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command, InvalidArgumentError } from "commander";
import pkg from "../../package.json";
import { runCheck } from "../commands/check";
import { runValidate } from "../commands/validate";
import { applySettingOverrides, loadSettings } from "../config/settings";
import { ConfigurationError, errorMessage } from "../errors";
import { EXIT_FATAL } from "../report/summary";

interface CheckCommandOptions {
  registry?: string;
  baseline?: string;
  report?: string;
  minReport?: string;
  concurrency?: number;
  runDeadline?: number;
  only: string[];
}

interface ValidateCommandOptions {
  registry?: string;
}

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.DRIFT_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

const defaultEnvPath = path.resolve(process.cwd(), ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

const program = new Command();

program
  .name("datasource-drift")
  .description("Detects version drift of registered upstream data sources")
  .version(pkg.version);

program.option(
  "--env-file <path>",
  "Path to .env file (overrides DRIFT_ENV_FILE/DOTENV_CONFIG_PATH)",
  envPath
);

program
  .command("check")
  .description("Check every enabled source against the baseline and write a run report")
  .option("--registry <path>", "Path to the source registry (DRIFT_REGISTRY_PATH)")
  .option("--baseline <path>", "Path to the baseline file (DRIFT_BASELINE_PATH)")
  .option("--report <path>", "Output path for the run report (DRIFT_REPORT_PATH)")
  .option("--min-report <path>", "Optional output path for a minified copy of the report")
  .option("--concurrency <n>", "Sources checked in parallel", parsePositiveInt)
  .option("--run-deadline <ms>", "Deadline for the whole run in milliseconds", parsePositiveInt)
  .option("--only <id...>", "Check only these source ids", [])
  .action(async (opts: CheckCommandOptions) => {
    const settings = applySettingOverrides(loadSettings(), {
      registryPath: opts.registry,
      baselinePath: opts.baseline,
      reportPath: opts.report,
      minReportPath: opts.minReport,
      concurrency: opts.concurrency,
      runDeadlineMs: opts.runDeadline
    });
    const result = await runCheck({ settings, only: opts.only });
    console.log(`Report written to ${path.resolve(settings.reportPath)}`);
    process.exitCode = result.exitCode;
  });

program
  .command("validate")
  .description("Validate the source registry without contacting any source")
  .option("--registry <path>", "Path to the source registry (DRIFT_REGISTRY_PATH)")
  .action(async (opts: ValidateCommandOptions) => {
    const settings = loadSettings();
    const summary = await runValidate({ registryPath: opts.registry ?? settings.registryPath });
    const kinds = Object.entries(summary.byKind)
      .map(([kind, count]) => `${kind}=${count}`)
      .join(" ");
    console.log(
      `Registry ${summary.registryPath} (version ${summary.version}) OK: ` +
        `${summary.total} source(s), ${summary.enabled} enabled [${kinds}]`
    );
  });

program.parseAsync().catch((error) => {
  const prefix = error instanceof ConfigurationError ? "Configuration error: " : "";
  console.error(`${prefix}${errorMessage(error)}`);
  process.exitCode = EXIT_FATAL;
});

import { z } from "zod";
import { ConfigurationError } from "../errors";
import { formatZodIssues } from "./registry";

const intFromEnv = (fallback: number, min: number) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === "") return fallback;
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed < min) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected an integer >= ${min}` });
        return z.NEVER;
      }
      return parsed;
    });

const EnvSchema = z.object({
  DRIFT_REGISTRY_PATH: z.string().default("./config/sources.json"),
  DRIFT_BASELINE_PATH: z.string().default("./data/baseline.json"),
  DRIFT_REPORT_PATH: z.string().default("./data/report.json"),
  DRIFT_MIN_REPORT_PATH: z.string().optional(),
  DRIFT_CONCURRENCY: intFromEnv(8, 1),
  DRIFT_FETCH_TIMEOUT_MS: intFromEnv(15000, 1),
  DRIFT_RETRY_ATTEMPTS: intFromEnv(3, 1),
  DRIFT_RETRY_BASE_DELAY_MS: intFromEnv(500, 0),
  DRIFT_RETRY_MAX_DELAY_MS: intFromEnv(8000, 0),
  DRIFT_RETRY_JITTER_MS: intFromEnv(250, 0),
  DRIFT_SOURCE_BUDGET_MS: intFromEnv(60000, 1),
  DRIFT_RUN_DEADLINE_MS: intFromEnv(600000, 1),
  DRIFT_USER_AGENT: z.string().min(1).default("DataSource-Status Fetcher")
});

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
}

export interface DetectorSettings {
  concurrency: number;
  fetchTimeoutMs: number;
  retry: RetryPolicy;
  sourceBudgetMs: number;
  runDeadlineMs: number;
  userAgent: string;
}

export interface Settings {
  registryPath: string;
  baselinePath: string;
  reportPath: string;
  minReportPath: string | null;
  detector: DetectorSettings;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatZodIssues(parsed.error)}`);
  }
  const values = parsed.data;
  return {
    registryPath: values.DRIFT_REGISTRY_PATH,
    baselinePath: values.DRIFT_BASELINE_PATH,
    reportPath: values.DRIFT_REPORT_PATH,
    minReportPath: values.DRIFT_MIN_REPORT_PATH ?? null,
    detector: {
      concurrency: values.DRIFT_CONCURRENCY,
      fetchTimeoutMs: values.DRIFT_FETCH_TIMEOUT_MS,
      retry: {
        attempts: values.DRIFT_RETRY_ATTEMPTS,
        baseDelayMs: values.DRIFT_RETRY_BASE_DELAY_MS,
        maxDelayMs: values.DRIFT_RETRY_MAX_DELAY_MS,
        jitterMs: values.DRIFT_RETRY_JITTER_MS
      },
      sourceBudgetMs: values.DRIFT_SOURCE_BUDGET_MS,
      runDeadlineMs: values.DRIFT_RUN_DEADLINE_MS,
      userAgent: values.DRIFT_USER_AGENT
    }
  };
}

export interface SettingOverrides {
  registryPath?: string;
  baselinePath?: string;
  reportPath?: string;
  minReportPath?: string;
  concurrency?: number;
  runDeadlineMs?: number;
}

export function applySettingOverrides(settings: Settings, overrides: SettingOverrides): Settings {
  return {
    registryPath: overrides.registryPath ?? settings.registryPath,
    baselinePath: overrides.baselinePath ?? settings.baselinePath,
    reportPath: overrides.reportPath ?? settings.reportPath,
    minReportPath: overrides.minReportPath ?? settings.minReportPath,
    detector: {
      ...settings.detector,
      concurrency: overrides.concurrency ?? settings.detector.concurrency,
      runDeadlineMs: overrides.runDeadlineMs ?? settings.detector.runDeadlineMs
    }
  };
}

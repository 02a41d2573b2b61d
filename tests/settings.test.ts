import { describe, expect, it } from "vitest";
import { applySettingOverrides, loadSettings } from "../src/config/settings";
import { ConfigurationError } from "../src/errors";

describe("settings", () => {
  it("uses defaults for an empty environment", () => {
    const settings = loadSettings({});

    expect(settings.registryPath).toBe("./config/sources.json");
    expect(settings.minReportPath).toBeNull();
    expect(settings.detector).toEqual({
      concurrency: 8,
      fetchTimeoutMs: 15000,
      retry: { attempts: 3, baseDelayMs: 500, maxDelayMs: 8000, jitterMs: 250 },
      sourceBudgetMs: 60000,
      runDeadlineMs: 600000,
      userAgent: "DataSource-Status Fetcher"
    });
  });

  it("reads values from the environment", () => {
    const settings = loadSettings({
      DRIFT_CONCURRENCY: "2",
      DRIFT_RETRY_JITTER_MS: "0",
      DRIFT_MIN_REPORT_PATH: "./out/report.min.json"
    });

    expect(settings.detector.concurrency).toBe(2);
    expect(settings.detector.retry.jitterMs).toBe(0);
    expect(settings.minReportPath).toBe("./out/report.min.json");
  });

  it("rejects invalid numbers", () => {
    expect(() => loadSettings({ DRIFT_CONCURRENCY: "0" })).toThrow(ConfigurationError);
    expect(() => loadSettings({ DRIFT_RETRY_ATTEMPTS: "two" })).toThrow(
      "Invalid configuration: DRIFT_RETRY_ATTEMPTS: Expected an integer >= 1"
    );
  });

  it("lets command-line options override the environment", () => {
    const settings = applySettingOverrides(loadSettings({ DRIFT_CONCURRENCY: "4" }), {
      reportPath: "./custom.json",
      concurrency: 1
    });

    expect(settings.reportPath).toBe("./custom.json");
    expect(settings.baselinePath).toBe("./data/baseline.json");
    expect(settings.detector.concurrency).toBe(1);
    expect(settings.detector.fetchTimeoutMs).toBe(15000);
  });
});

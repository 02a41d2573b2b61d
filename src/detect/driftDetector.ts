import pLimit from "p-limit";
import { BaselineEntry, BaselineStore } from "../baseline/baselineStore";
import { DetectorSettings } from "../config/settings";
import { SourceDefinition } from "../config/sourceRegistry";
import { ExtractionError, errorMessage } from "../errors";
import { ExtractionResult, extractSignature, resolveFiles } from "../extract";
import { ArtifactFetcher, fetchArtifact } from "../fetch";
import { classifyNetworkError } from "../fetch/classify";
import { ReportBuilder } from "../report/reportBuilder";
import { CheckOutcome, CheckStatus } from "../types/checkOutcome";
import { RawArtifact } from "../types/rawArtifact";
import { RunReport } from "../types/runReport";
import { DriftLogger, createLogger } from "../utils/logger";
import { truncate } from "../utils/text";
import { isoSeconds } from "../utils/time";
import { compareSignature } from "./compare";
import { Sleep, backoffDelay, sleep as defaultSleep } from "./retry";

export const SOURCE_DEADLINE_DETAIL = "source deadline exceeded";
export const RUN_DEADLINE_DETAIL = "run deadline exceeded";

const MAX_DETAIL_LENGTH = 500;

export type SourceState = "pending" | "fetching" | "extracting" | "comparing" | CheckStatus;

export interface DetectorDeps {
  fetch?: ArtifactFetcher;
  sleep?: Sleep;
  random?: () => number;
  now?: () => number;
  logger?: DriftLogger;
}

export interface RunOptions {
  runId: string;
  registryPath: string;
}

interface TaskProgress {
  state: SourceState;
  attempts: number;
  startedAt: number | null;
}

interface OutcomeFields {
  previous: BaselineEntry | undefined;
  startedAt: number;
  attempts: number;
  current?: string;
  files?: Record<string, string> | null;
  detail?: string;
}

/**
 * Checks every source once: fetch, extract, compare. Sources run in parallel
 * up to `concurrency`; each one is bounded by `sourceBudgetMs` and the whole
 * run by `runDeadlineMs`. Every source gets exactly one outcome, and only
 * unchanged/changed outcomes are committed to the baseline.
 */
export class DriftDetector {
  private readonly fetch: ArtifactFetcher;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly now: () => number;
  private readonly logger: DriftLogger;

  constructor(
    private readonly settings: DetectorSettings,
    deps: DetectorDeps = {}
  ) {
    this.fetch = deps.fetch ?? fetchArtifact;
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
    this.now = deps.now ?? Date.now;
    this.logger = deps.logger ?? createLogger("[Detector]");
  }

  async run(
    sources: readonly SourceDefinition[],
    baseline: BaselineStore,
    options: RunOptions
  ): Promise<RunReport> {
    const runStartedAt = this.now();
    const builder = new ReportBuilder(
      sources.map((source) => source.id),
      { runId: options.runId, registryPath: options.registryPath, startedAt: isoSeconds(runStartedAt) }
    );
    const runController = new AbortController();
    const limit = pLimit(this.settings.concurrency);
    const progress = new Map<string, TaskProgress>();

    const accept = (source: SourceDefinition, outcome: CheckOutcome): void => {
      if (!builder.collect(outcome)) {
        this.logger.debug(`${source.id}: late outcome ${outcome.status} ignored`);
        return;
      }
      if ((outcome.status === "unchanged" || outcome.status === "changed") && outcome.current_signature) {
        baseline.commit(source.id, {
          signature: outcome.current_signature,
          confirmed_at: isoSeconds(this.now()),
          files: outcome.files ? { ...outcome.files } : null
        });
      }
      this.logOutcome(outcome);
    };

    this.logger.info(`Checking ${sources.length} source(s) with concurrency ${this.settings.concurrency}`);

    const tasks = sources.map((source) => {
      const task: TaskProgress = { state: "pending", attempts: 0, startedAt: null };
      progress.set(source.id, task);
      return limit(async () => {
        if (runController.signal.aborted) return;
        const outcome = await this.runSource(source, baseline.get(source.id), task, runController.signal);
        task.state = outcome.status;
        accept(source, outcome);
      });
    });

    let deadlineTimer: NodeJS.Timeout | undefined;
    const deadline = new Promise<"deadline">((resolve) => {
      deadlineTimer = setTimeout(() => resolve("deadline"), this.settings.runDeadlineMs);
    });
    const finished = await Promise.race([Promise.all(tasks).then(() => "done" as const), deadline]);
    clearTimeout(deadlineTimer);

    if (finished === "deadline") {
      limit.clearQueue();
      runController.abort();
      const pending = builder.pendingIds();
      this.logger.warn(`Run deadline of ${this.settings.runDeadlineMs}ms exceeded; abandoning ${pending.length} source(s)`);
      for (const source of sources) {
        if (!pending.includes(source.id)) continue;
        const task = progress.get(source.id);
        accept(
          source,
          this.buildOutcome(source.id, "unreachable", {
            previous: baseline.get(source.id),
            startedAt: task?.startedAt ?? runStartedAt,
            attempts: task?.attempts ?? 0,
            detail: RUN_DEADLINE_DETAIL
          })
        );
      }
    }

    return builder.build(isoSeconds(this.now()));
  }

  private async runSource(
    source: SourceDefinition,
    previous: BaselineEntry | undefined,
    task: TaskProgress,
    runSignal: AbortSignal
  ): Promise<CheckOutcome> {
    const startedAt = this.now();
    task.startedAt = startedAt;

    const controller = new AbortController();
    const onRunAbort = () => controller.abort();
    runSignal.addEventListener("abort", onRunAbort, { once: true });

    let budgetTimer: NodeJS.Timeout | undefined;
    const budget = new Promise<CheckOutcome>((resolve) => {
      budgetTimer = setTimeout(() => {
        controller.abort();
        resolve(
          this.buildOutcome(source.id, "unreachable", {
            previous,
            startedAt,
            attempts: task.attempts,
            detail: SOURCE_DEADLINE_DETAIL
          })
        );
      }, this.settings.sourceBudgetMs);
    });

    const check = this.checkSource(source, previous, task, controller.signal, startedAt).catch((error) => {
      this.logger.error(`${source.id}: unexpected failure`, error instanceof Error ? error : undefined);
      return this.buildOutcome(source.id, "extraction_failed", {
        previous,
        startedAt,
        attempts: task.attempts,
        detail: `unexpected error: ${errorMessage(error)}`
      });
    });

    try {
      return await Promise.race([check, budget]);
    } finally {
      clearTimeout(budgetTimer);
      runSignal.removeEventListener("abort", onRunAbort);
    }
  }

  private async checkSource(
    source: SourceDefinition,
    previous: BaselineEntry | undefined,
    task: TaskProgress,
    signal: AbortSignal,
    startedAt: number
  ): Promise<CheckOutcome> {
    let artifact: RawArtifact;
    try {
      artifact = await this.fetchWithRetry(source, task, signal, startedAt);
    } catch (error) {
      const fetchError = classifyNetworkError(error, { timedOut: false, aborted: signal.aborted, timeoutMs: 0 });
      return this.buildOutcome(source.id, "unreachable", {
        previous,
        startedAt,
        attempts: task.attempts,
        detail: fetchError.detail
      });
    }

    this.transition(source, task, "extracting");
    let result: ExtractionResult;
    let files: Record<string, string> | null;
    try {
      result = extractSignature(artifact, source);
      files = resolveFiles(source.files, result);
    } catch (error) {
      if (!(error instanceof ExtractionError)) throw error;
      return this.buildOutcome(source.id, "extraction_failed", {
        previous,
        startedAt,
        attempts: task.attempts,
        detail: error.message
      });
    }

    this.transition(source, task, "comparing");
    return this.buildOutcome(source.id, compareSignature(previous, result.signature), {
      previous,
      startedAt,
      attempts: task.attempts,
      current: result.signature,
      files
    });
  }

  private async fetchWithRetry(
    source: SourceDefinition,
    task: TaskProgress,
    signal: AbortSignal,
    startedAt: number
  ): Promise<RawArtifact> {
    const { retry } = this.settings;
    for (let attempt = 1; ; attempt += 1) {
      task.attempts = attempt;
      this.transition(source, task, "fetching");
      try {
        return await this.fetch(source, {
          timeoutMs: source.timeoutMs ?? this.settings.fetchTimeoutMs,
          userAgent: this.settings.userAgent,
          signal
        });
      } catch (error) {
        const fetchError = classifyNetworkError(error, {
          timedOut: false,
          aborted: signal.aborted,
          timeoutMs: source.timeoutMs ?? this.settings.fetchTimeoutMs
        });
        if (!fetchError.transient || attempt >= retry.attempts || signal.aborted) {
          throw fetchError;
        }

        const wait = backoffDelay(attempt, retry, this.random);
        if (this.now() - startedAt + wait >= this.settings.sourceBudgetMs) {
          throw fetchError;
        }
        this.logger.debug(`${source.id}: attempt ${attempt} failed (${fetchError.detail}); retrying in ${wait}ms`);
        await this.sleep(wait, signal);
      }
    }
  }

  private transition(source: SourceDefinition, task: TaskProgress, state: SourceState): void {
    task.state = state;
    this.logger.debug(`${source.id}: ${state}${state === "fetching" ? ` (attempt ${task.attempts})` : ""}`);
  }

  private buildOutcome(sourceId: string, status: CheckStatus, fields: OutcomeFields): CheckOutcome {
    const failed = status === "unreachable" || status === "extraction_failed";
    return {
      source_id: sourceId,
      status,
      previous_signature: fields.previous?.signature ?? null,
      current_signature: failed ? null : fields.current ?? null,
      error_detail: failed ? truncate(fields.detail ?? "unknown error", MAX_DETAIL_LENGTH) : null,
      duration_ms: Math.max(0, this.now() - fields.startedAt),
      attempts: fields.attempts,
      files: failed ? null : fields.files ?? null
    };
  }

  private logOutcome(outcome: CheckOutcome): void {
    switch (outcome.status) {
      case "unchanged":
        this.logger.debug(`${outcome.source_id}: unchanged (${outcome.current_signature})`);
        return;
      case "changed":
        this.logger.info(
          `${outcome.source_id}: changed ${outcome.previous_signature} -> ${outcome.current_signature}`
        );
        return;
      case "unreachable":
      case "extraction_failed":
        this.logger.warn(`${outcome.source_id}: ${outcome.status} (${outcome.error_detail})`);
        return;
    }
  }
}

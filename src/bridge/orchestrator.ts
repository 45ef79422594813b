/**
 * Bridge Orchestrator - supervises the subscribe/publish session pair
 *
 * Each retry iteration gets a fresh cancellation scope, a fresh hand-off
 * channel and a fresh pair of sessions. Whichever session exits first cancels
 * the scope; once both have unwound the iteration ends, the error is logged
 * and the next iteration starts after the backoff delay. Nothing is carried
 * over between iterations, including an update that was in flight.
 */

import { setTimeout as sleep } from "node:timers/promises";

import type { AuthMetadata, SubscribeRequest } from "../gnmi/request.js";
import type { Logger } from "../log.js";
import { type BackoffPolicy, immediateRetry } from "./backoff.js";
import { HandoffChannel } from "./channel.js";
import { runPublishSession } from "./publish-session.js";
import { runSubscribeSession } from "./subscribe-session.js";
import type { TelemetrySink, TelemetrySource, TelemetryUpdate } from "./types.js";

export type BridgeState = "idle" | "running" | "restarting" | "stopped";

export interface BridgeStats {
  /** Iterations started. */
  attempts: number;
  /** Iterations that ended in an error other than an external stop. */
  failures: number;
  /** Updates written to the collector across all iterations. */
  forwarded: number;
}

export interface BridgeOrchestratorParams {
  logger: Logger;
  source: TelemetrySource;
  sink: TelemetrySink;
  request: SubscribeRequest;
  metadata?: AuthMetadata;
  backoff?: BackoffPolicy;
}

interface IterationResult {
  error: unknown;
  forwarded: number;
}

export class BridgeOrchestrator {
  private readonly logger: Logger;
  private readonly source: TelemetrySource;
  private readonly sink: TelemetrySink;
  private readonly request: SubscribeRequest;
  private readonly metadata?: AuthMetadata;
  private readonly backoff: BackoffPolicy;
  private _state: BridgeState = "idle";
  private _activeSessions = 0;
  private readonly _stats: BridgeStats = { attempts: 0, failures: 0, forwarded: 0 };
  private consecutiveFailures = 0;

  constructor(params: BridgeOrchestratorParams) {
    this.logger = params.logger.child({ component: "bridge" });
    this.source = params.source;
    this.sink = params.sink;
    this.request = params.request;
    this.metadata = params.metadata;
    this.backoff = params.backoff ?? immediateRetry;
  }

  get state(): BridgeState {
    return this._state;
  }

  /** Sessions currently running; 2 while running, 0 between iterations. */
  get activeSessions(): number {
    return this._activeSessions;
  }

  get stats(): BridgeStats {
    return { ...this._stats };
  }

  /**
   * Run iterations until `signal` aborts or `maxAttempts` iterations have run.
   * Without either, this never resolves.
   */
  async run(options: { signal?: AbortSignal; maxAttempts?: number } = {}): Promise<BridgeStats> {
    if (this._state === "running" || this._state === "restarting") {
      throw new Error("Bridge already running");
    }
    const { signal, maxAttempts } = options;

    try {
      while (!signal?.aborted) {
        if (maxAttempts !== undefined && this._stats.attempts >= maxAttempts) break;

        this._stats.attempts++;
        const attempt = this._stats.attempts;
        this._state = "running";
        this.logger.debug({ attempt }, "Starting subscribe and publish sessions");

        const result = await this.runIteration(signal);

        this._state = "restarting";
        if (signal?.aborted) break;

        this._stats.failures++;
        this.consecutiveFailures = result.forwarded > 0 ? 1 : this.consecutiveFailures + 1;
        const delayMs = this.backoff(this.consecutiveFailures);
        this.logger.warn(
          { err: result.error, attempt, forwarded: result.forwarded, delayMs },
          "encountered error, retrying",
        );

        try {
          // Always yield, even with no delay, so a failing endpoint cannot starve I/O.
          await sleep(delayMs, undefined, { signal });
        } catch (err) {
          if (signal?.aborted) break;
          throw err;
        }
      }
    } finally {
      this._state = "stopped";
    }

    this.logger.info(this.stats, "Bridge stopped");
    return this.stats;
  }

  private async runIteration(outer?: AbortSignal): Promise<IterationResult> {
    const scope = new AbortController();
    const onOuterAbort = () => scope.abort(outer?.reason);
    outer?.addEventListener("abort", onOuterAbort, { once: true });

    const channel = new HandoffChannel<TelemetryUpdate>();
    let firstError: unknown;
    let forwarded = 0;

    const supervise = (session: Promise<never>): Promise<void> =>
      session
        .catch((err: unknown) => {
          if (firstError === undefined) firstError = err;
          scope.abort(err);
        })
        .finally(() => {
          this._activeSessions--;
        });

    this._activeSessions = 2;
    try {
      await Promise.all([
        supervise(
          runSubscribeSession({
            source: this.source,
            request: this.request,
            metadata: this.metadata,
            channel,
            signal: scope.signal,
            logger: this.logger.child({ component: "subscribe" }),
          }),
        ),
        supervise(
          runPublishSession({
            sink: this.sink,
            channel,
            signal: scope.signal,
            logger: this.logger.child({ component: "publish" }),
            onForward: () => {
              forwarded++;
              this._stats.forwarded++;
            },
          }),
        ),
      ]);
    } finally {
      outer?.removeEventListener("abort", onOuterAbort);
    }

    return { error: firstError, forwarded };
  }
}

/**
 * In-memory stand-ins for the target and collector legs.
 */

import type {
  PublishStream,
  SubscribeStream,
  TelemetrySink,
  TelemetrySource,
  TelemetryUpdate,
} from "../../src/bridge/types.js";
import type { AuthMetadata, SubscribeRequest } from "../../src/gnmi/request.js";

/** What one subscribe call does after delivering its updates. */
export type SubscribeEnding = "close" | "hang" | Error;

export interface SubscribeScript {
  updates?: TelemetryUpdate[];
  end?: SubscribeEnding;
  /** Thrown by `subscribe()` itself. */
  openError?: Error;
  /** Rejects the SubscribeRequest send. */
  sendError?: Error;
}

function untilAborted(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_resolve, reject) => {
    const fail = () => reject(new Error("stream cancelled"));
    if (signal.aborted) {
      fail();
      return;
    }
    signal.addEventListener("abort", fail, { once: true });
  });
}

export class FakeSubscribeStream implements SubscribeStream {
  readonly sent: SubscribeRequest[] = [];
  closed = false;
  private readonly pending: TelemetryUpdate[];

  constructor(
    private readonly script: SubscribeScript,
    readonly signal: AbortSignal,
  ) {
    this.pending = [...(script.updates ?? [])];
  }

  async send(request: SubscribeRequest): Promise<void> {
    if (this.script.sendError) throw this.script.sendError;
    this.sent.push(request);
  }

  async recv(): Promise<TelemetryUpdate | null> {
    const next = this.pending.shift();
    if (next) return next;
    const end = this.script.end ?? "hang";
    if (end === "close") return null;
    if (end === "hang") return untilAborted(this.signal);
    throw end;
  }

  close(): void {
    this.closed = true;
  }
}

/**
 * Plays one script per subscribe call; calls past the last script reuse it.
 */
export class FakeSource implements TelemetrySource {
  readonly streams: FakeSubscribeStream[] = [];
  readonly metadata: Array<AuthMetadata | undefined> = [];
  onSubscribe?: (call: number) => void;

  constructor(private readonly scripts: SubscribeScript[]) {}

  subscribe(params: { metadata?: AuthMetadata; signal: AbortSignal }): SubscribeStream {
    const call = this.metadata.push(params.metadata);
    this.onSubscribe?.(call);
    const script = this.scripts[Math.min(call, this.scripts.length) - 1] ?? {};
    if (script.openError) throw script.openError;
    const stream = new FakeSubscribeStream(script, params.signal);
    this.streams.push(stream);
    return stream;
  }
}

export interface PublishScript {
  openError?: Error;
  /** Fail the send of the update with this zero-based index on the stream. */
  failAt?: number;
  error?: Error;
}

export class FakePublishStream implements PublishStream {
  readonly received: TelemetryUpdate[] = [];
  closed = false;

  constructor(
    private readonly script: PublishScript,
    private readonly onSend: (update: TelemetryUpdate) => void,
  ) {}

  async send(update: TelemetryUpdate): Promise<void> {
    if (this.script.failAt === this.received.length) {
      throw this.script.error ?? new Error("collector went away");
    }
    this.received.push(update);
    this.onSend(update);
  }

  close(): void {
    this.closed = true;
  }
}

export class FakeSink implements TelemetrySink {
  readonly streams: FakePublishStream[] = [];
  /** Every update accepted, across all streams. */
  readonly received: TelemetryUpdate[] = [];
  onSend?: (update: TelemetryUpdate, total: number) => void;
  private calls = 0;

  constructor(private readonly scripts: PublishScript[] = [{}]) {}

  publish(_params: { signal: AbortSignal }): PublishStream {
    this.calls++;
    const script = this.scripts[Math.min(this.calls, this.scripts.length) - 1] ?? {};
    if (script.openError) throw script.openError;
    const stream = new FakePublishStream(script, (update) => {
      this.received.push(update);
      this.onSend?.(update, this.received.length);
    });
    this.streams.push(stream);
    return stream;
  }
}

export function update(text: string): TelemetryUpdate {
  return Buffer.from(text, "utf-8");
}

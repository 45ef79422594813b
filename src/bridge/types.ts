import type { AuthMetadata, SubscribeRequest } from "../gnmi/request.js";

/**
 * One update as received from the target: the encoded SubscribeResponse.
 * The bridge never decodes it.
 */
export type TelemetryUpdate = Buffer;

export interface SubscribeStream {
  send(request: SubscribeRequest): Promise<void>;
  /** Resolves with null when the target closes the stream cleanly. */
  recv(): Promise<TelemetryUpdate | null>;
  close(): void;
}

export interface PublishStream {
  send(update: TelemetryUpdate): Promise<void>;
  close(): void;
}

/** Target side. Implementations must cancel the open stream when `signal` aborts. */
export interface TelemetrySource {
  subscribe(params: { metadata?: AuthMetadata; signal: AbortSignal }): SubscribeStream;
}

/** Collector side. Implementations must cancel the open stream when `signal` aborts. */
export interface TelemetrySink {
  publish(params: { signal: AbortSignal }): PublishStream;
}

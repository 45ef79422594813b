import { CancellationError, StreamError, errorMessage, streamFailure } from "../errors.js";
import type { AuthMetadata, SubscribeRequest } from "../gnmi/request.js";
import type { Logger } from "../log.js";
import type { HandoffChannel } from "./channel.js";
import type { SubscribeStream, TelemetrySource, TelemetryUpdate } from "./types.js";

export interface SubscribeSessionParams {
  source: TelemetrySource;
  request: SubscribeRequest;
  metadata?: AuthMetadata;
  channel: HandoffChannel<TelemetryUpdate>;
  signal: AbortSignal;
  logger: Logger;
}

/**
 * Subscribe to the target and hand every update to the channel.
 * Runs until the stream fails, the target closes it, or the scope is cancelled;
 * it never returns normally.
 */
export async function runSubscribeSession(params: SubscribeSessionParams): Promise<never> {
  const { source, request, metadata, channel, signal, logger } = params;
  if (signal.aborted) throw new CancellationError(signal.reason);

  let stream: SubscribeStream;
  try {
    stream = source.subscribe({ metadata, signal });
  } catch (err) {
    throw new StreamError(`error from Subscribe: ${errorMessage(err)}`);
  }

  try {
    try {
      await stream.send(request);
    } catch (err) {
      throw streamFailure(signal, `error sending SubscribeRequest: ${errorMessage(err)}`);
    }
    logger.debug({ subscriptions: request.subscribe.subscription.length }, "Subscription sent");

    for (;;) {
      let update: TelemetryUpdate | null;
      try {
        update = await stream.recv();
      } catch (err) {
        throw streamFailure(signal, `error from Subscribe.Recv: ${errorMessage(err)}`);
      }
      if (update === null) {
        throw new StreamError("subscription stream closed by target");
      }
      await channel.send(update, signal);
    }
  } finally {
    stream.close();
  }
}


import { CancellationError, StreamError, errorMessage, streamFailure } from "../errors.js";
import type { Logger } from "../log.js";
import type { HandoffChannel } from "./channel.js";
import type { PublishStream, TelemetrySink, TelemetryUpdate } from "./types.js";

export interface PublishSessionParams {
  sink: TelemetrySink;
  channel: HandoffChannel<TelemetryUpdate>;
  signal: AbortSignal;
  logger: Logger;
  /** Called after each update has been written to the collector stream. */
  onForward?: (update: TelemetryUpdate) => void;
}

/**
 * Relay updates from the channel to the collector. The response side of the
 * Publish stream is never read.
 */
export async function runPublishSession(params: PublishSessionParams): Promise<never> {
  const { sink, channel, signal, logger, onForward } = params;
  if (signal.aborted) throw new CancellationError(signal.reason);

  let stream: PublishStream;
  try {
    stream = sink.publish({ signal });
  } catch (err) {
    throw new StreamError(`error from Publish: ${errorMessage(err)}`);
  }
  logger.debug("Publish stream opened");

  try {
    for (;;) {
      const update = await channel.receive(signal);
      try {
        await stream.send(update);
      } catch (err) {
        throw streamFailure(signal, `error from Publish.Send: ${errorMessage(err)}`);
      }
      onForward?.(update);
    }
  } finally {
    stream.close();
  }
}

/**
 * gRPC adapters for the two legs of the bridge.
 *
 * Updates are kept as the raw bytes received from the target: the Subscribe
 * call deserializes nothing and the Publish call serializes nothing, so every
 * field reaches the collector exactly as the target encoded it.
 */

import * as grpc from "@grpc/grpc-js";

import type {
  PublishStream,
  SubscribeStream,
  TelemetrySink,
  TelemetrySource,
  TelemetryUpdate,
} from "../bridge/types.js";
import type { AuthMetadata, SubscribeRequest } from "./request.js";
import { type GrpcMethod, loadGnmiDefinitions } from "./proto.js";

const rawBytes = (buffer: Buffer): Buffer => buffer;

function writeMessage<T>(call: grpc.ClientWritableStream<T>, message: T): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    call.write(message, (err?: Error | null) => (err ? reject(err) : resolve()));
  });
}

export class GnmiTargetClient implements TelemetrySource {
  private readonly client: grpc.Client;
  private readonly method: GrpcMethod;

  constructor(params: { client: grpc.Client }) {
    this.client = params.client;
    this.method = loadGnmiDefinitions().subscribe;
  }

  subscribe(params: { metadata?: AuthMetadata; signal: AbortSignal }): SubscribeStream {
    const metadata = new grpc.Metadata();
    for (const [key, value] of Object.entries(params.metadata ?? {})) {
      metadata.set(key, value);
    }
    const call = this.client.makeBidiStreamRequest<SubscribeRequest, Buffer>(
      this.method.path,
      (request) => this.method.requestSerialize(request),
      rawBytes,
      metadata,
    );
    return new GrpcSubscribeStream(call, params.signal);
  }
}

class GrpcSubscribeStream implements SubscribeStream {
  private readonly call: grpc.ClientDuplexStream<SubscribeRequest, Buffer>;
  private readonly signal: AbortSignal;
  private readonly iterator: AsyncIterator<unknown>;
  private failure: Error | null = null;
  private readonly onAbort = () => this.call.cancel();

  constructor(call: grpc.ClientDuplexStream<SubscribeRequest, Buffer>, signal: AbortSignal) {
    this.call = call;
    this.signal = signal;
    // A non-OK status arrives as an "error" event, possibly before the first read.
    call.on("error", (err: Error) => {
      this.failure ??= err;
    });
    this.iterator = call[Symbol.asyncIterator]();
    signal.addEventListener("abort", this.onAbort, { once: true });
  }

  send(request: SubscribeRequest): Promise<void> {
    return writeMessage(this.call, request);
  }

  async recv(): Promise<TelemetryUpdate | null> {
    const next = await this.iterator.next();
    if (next.done) {
      if (this.failure) throw this.failure;
      return null;
    }
    if (!Buffer.isBuffer(next.value)) {
      throw new Error("Subscribe stream yielded a non-binary message");
    }
    return next.value;
  }

  close(): void {
    this.signal.removeEventListener("abort", this.onAbort);
    this.call.cancel();
  }
}

export class GnmiCollectorClient implements TelemetrySink {
  private readonly client: grpc.Client;
  private readonly method: GrpcMethod;

  constructor(params: { client: grpc.Client }) {
    this.client = params.client;
    this.method = loadGnmiDefinitions().publish;
  }

  publish(params: { signal: AbortSignal }): PublishStream {
    return new GrpcPublishStream(this.client, this.method, params.signal);
  }
}

class GrpcPublishStream implements PublishStream {
  private readonly call: grpc.ClientWritableStream<Buffer>;
  private readonly signal: AbortSignal;
  private failure: Error | null = null;
  private readonly onAbort = () => this.call.cancel();

  constructor(client: grpc.Client, method: GrpcMethod, signal: AbortSignal) {
    this.signal = signal;
    // The collector's reply is never inspected. Once the call has finished,
    // with any status, nothing written afterwards reaches the collector.
    this.call = client.makeClientStreamRequest<Buffer, object>(
      method.path,
      rawBytes,
      (buffer) => method.responseDeserialize(buffer),
      new grpc.Metadata(),
      (err) => {
        this.failure ??= err ?? new Error("publish stream closed by collector");
      },
    );
    this.call.on("error", (err: Error) => {
      this.failure ??= err;
    });
    signal.addEventListener("abort", this.onAbort, { once: true });
  }

  async send(update: TelemetryUpdate): Promise<void> {
    if (this.failure) throw this.failure;
    await writeMessage(this.call, update);
  }

  close(): void {
    this.signal.removeEventListener("abort", this.onAbort);
    this.call.cancel();
  }
}

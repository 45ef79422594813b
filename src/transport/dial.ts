import * as grpc from "@grpc/grpc-js";

import { DialError, errorMessage } from "../errors.js";

export interface DialParams {
  /** Which leg, for error messages. */
  peer: "target" | "collector";
  address: string;
  credentials: grpc.ChannelCredentials;
  /** 0 returns immediately and lets the channel connect in the background. */
  timeoutMs: number;
}

/**
 * Create the long-lived client for one leg. Streams are opened on it afresh
 * each retry iteration; the channel itself reconnects on its own.
 */
export async function dial(params: DialParams): Promise<grpc.Client> {
  const { peer, address, credentials, timeoutMs } = params;

  let client: grpc.Client;
  try {
    client = new grpc.Client(address, credentials);
  } catch (err) {
    throw new DialError(`error dialing ${peer} "${address}": ${errorMessage(err)}`);
  }

  if (timeoutMs > 0) {
    try {
      await new Promise<void>((resolve, reject) => {
        client.waitForReady(Date.now() + timeoutMs, (err) => (err ? reject(err) : resolve()));
      });
    } catch (err) {
      client.close();
      throw new DialError(`error dialing ${peer} "${address}": ${errorMessage(err)}`, {
        suggestion: `Check that the ${peer} is reachable and its TLS settings match`,
      });
    }
  }

  return client;
}

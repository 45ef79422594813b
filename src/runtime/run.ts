import type * as grpc from "@grpc/grpc-js";

import { type BackoffPolicy, exponentialBackoff, immediateRetry } from "../bridge/backoff.js";
import { type BridgeStats, BridgeOrchestrator } from "../bridge/orchestrator.js";
import type { BridgeConfig } from "../config.js";
import { GnmiCollectorClient, GnmiTargetClient } from "../gnmi/client.js";
import { formatPath } from "../gnmi/path.js";
import { authMetadata, buildSubscribeRequest } from "../gnmi/request.js";
import type { Logger } from "../log.js";
import { buildCredentials, describeCredentials, toChannelCredentials } from "../transport/credentials.js";
import { dial } from "../transport/dial.js";

export function backoffFromConfig(cfg: BridgeConfig): BackoffPolicy {
  if (cfg.retry.initialDelayMs <= 0) return immediateRetry;
  return exponentialBackoff({
    initialDelayMs: cfg.retry.initialDelayMs,
    maxDelayMs: cfg.retry.maxDelayMs,
  });
}

/**
 * Build credentials, dial both legs and run the bridge until `signal` aborts.
 * Configuration and dial failures reject before any stream is opened.
 */
export async function runBridge(
  cfg: BridgeConfig,
  logger: Logger,
  opts: { signal?: AbortSignal } = {},
): Promise<BridgeStats> {
  const log = logger.child({ component: "runtime" });
  const credentials = await buildCredentials(cfg.collector.tls);

  if (cfg.resolved.collector.vrf || cfg.resolved.sourceAddress) {
    log.warn(
      { vrf: cfg.resolved.collector.vrf, sourceAddress: cfg.resolved.sourceAddress },
      "VRF and source address are parsed but not applied to the collector connection",
    );
  }

  log.info(
    {
      target: cfg.resolved.targetAddress,
      collector: cfg.resolved.collector.address,
      collectorTls: describeCredentials(credentials),
      paths: cfg.resolved.paths.map(formatPath),
      authenticated: Boolean(cfg.target.username),
    },
    "Starting gNMI dial-out bridge",
  );

  const collectorConn = await dial({
    peer: "collector",
    address: cfg.resolved.collector.address,
    credentials: toChannelCredentials(credentials),
    timeoutMs: cfg.dialTimeoutMs,
  });
  let targetConn: grpc.Client;
  try {
    targetConn = await dial({
      peer: "target",
      address: cfg.resolved.targetAddress,
      credentials: toChannelCredentials({ kind: "insecure" }),
      timeoutMs: cfg.dialTimeoutMs,
    });
  } catch (err) {
    collectorConn.close();
    throw err;
  }

  try {
    const orchestrator = new BridgeOrchestrator({
      logger,
      source: new GnmiTargetClient({ client: targetConn }),
      sink: new GnmiCollectorClient({ client: collectorConn }),
      request: buildSubscribeRequest(cfg.target.value, cfg.resolved.paths),
      metadata: authMetadata(cfg.target.username, cfg.target.password),
      backoff: backoffFromConfig(cfg),
    });
    return await orchestrator.run({ signal: opts.signal });
  } finally {
    targetConn.close();
    collectorConn.close();
  }
}

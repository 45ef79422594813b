/**
 * Start Command - run the bridge in the foreground until SIGINT/SIGTERM
 */

import type { BridgeConfig } from "../../config.js";
import { type Logger, createLogger } from "../../log.js";
import { runBridge } from "../../runtime/run.js";

export interface StartDeps {
  run?: typeof runBridge;
  logger?: Logger;
}

export async function start(cfg: BridgeConfig, deps: StartDeps = {}): Promise<void> {
  const run = deps.run ?? runBridge;
  const logger =
    deps.logger ?? createLogger(cfg.logging.level, cfg.resolved.logFilePath, cfg.logging.fileLevel);

  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "Shutting down");
    controller.abort(new Error(`received ${signal}`));
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  try {
    await run(cfg, logger, { signal: controller.signal });
  } catch (err) {
    logger.fatal({ err }, "Bridge failed to start");
    throw err;
  } finally {
    process.off("SIGINT", shutdown);
    process.off("SIGTERM", shutdown);
  }
}

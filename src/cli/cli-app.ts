/**
 * CLI App - Commander.js setup
 */

import { Command, InvalidArgumentError } from "commander";

import { type ConfigOverrides, loadConfig } from "../config.js";
import { start } from "./commands/start.js";
import { withErrorHandling } from "./error-handler.js";

export interface CliOptions extends ConfigOverrides {
  config?: string;
  verbose?: boolean;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function nonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Must be a non-negative integer.");
  }
  return parsed;
}

/**
 * Create and configure the CLI program
 */
export function createProgram(deps: { start?: typeof start } = {}): Command {
  const startBridge = deps.start ?? start;
  const program = new Command();

  program
    .name("gnmi-dialout")
    .description("Subscribe to a gNMI target and publish every update to a collector that cannot dial the target")
    .version("0.1.0")
    .option("-c, --config <path>", "Path to a JSON config file (or set GNMI_DIALOUT_CONFIG)")
    .option("--target-addr <addr>", "address of the gNMI target (default: 127.0.0.1:6030)")
    .option("--collector-addr <addr>", "address of collector in the form of [<vrf-name>/]address:port")
    .option("--target-value <value>", "value to use in the target field of the Subscribe")
    .option("--subscribe <path>", "path to subscribe to; repeat for more paths", collect, [])
    .option("--username <name>", "username to authenticate with target")
    .option("--password <password>", "password to authenticate with target")
    .option("--source-addr <addr>", "addr to use as source in connection to collector (not applied yet)")
    .option("--collector-certfile <path>", "path to TLS certificate file to authenticate with collector")
    .option("--collector-keyfile <path>", "path to TLS key file to authenticate with collector")
    .option("--collector-cafile <path>", "path to TLS CA file to verify collector (leave empty to use host's root CA set)")
    .option("--collector-tls", "use TLS in connection with collector (default)")
    .option("--no-collector-tls", "use plaintext in connection with collector")
    .option("--collector-tls-skipverify", "don't verify collector's certificate (insecure)")
    .option("--retry-delay <ms>", "initial delay between retries; 0 retries immediately", nonNegativeInt)
    .option("--retry-max-delay <ms>", "upper bound on the delay between retries", nonNegativeInt)
    .option("--dial-timeout <ms>", "wait this long for each connection at startup; 0 does not wait", nonNegativeInt)
    .option("--log-level <level>", "trace, debug, info, warn or error")
    .option("--log-file <path>", "also write logs to this file")
    .option("--verbose", "Print stack traces for fatal errors");

  program.action(async (options: CliOptions) => {
    const { config, verbose, ...overrides } = options;
    await withErrorHandling(
      async () => {
        const cfg = await loadConfig({ configPath: config, overrides });
        await startBridge(cfg);
      },
      { verbose },
    )();
  });

  return program;
}

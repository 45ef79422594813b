import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { z } from "zod";

import { ConfigError, errorMessage } from "./errors.js";
import { type GnmiPath, PathSyntaxError, parsePath } from "./gnmi/path.js";
import { type CollectorAddress, parseCollectorAddress, validateHostPort, validateSourceAddress } from "./transport/address.js";

export const CONFIG_ENV_VAR = "GNMI_DIALOUT_CONFIG";

const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error"]);

const TlsSchema = z.object({
  enabled: z.boolean().default(true),
  skipVerify: z.boolean().default(false),
  certFile: z.string().optional(),
  keyFile: z.string().optional(),
  caFile: z.string().optional(),
});

const TargetSchema = z.object({
  address: z.string().default("127.0.0.1:6030"),
  /** Goes in the target field of the Subscribe prefix. */
  value: z.string().default(""),
  username: z.string().optional(),
  password: z.string().optional(),
});

const CollectorSchema = z.object({
  /** `[<vrf-name>/]address:port` */
  address: z.string().default(""),
  sourceAddress: z.string().optional(),
  tls: TlsSchema.default({}),
});

const RetrySchema = z
  .object({
    initialDelayMs: z.number().int().min(0).default(0),
    maxDelayMs: z.number().int().positive().default(30_000),
  })
  .default({});

const LoggingSchema = z.object({
  level: LogLevelSchema.default("info"),
  filePath: z.string().optional(),
  fileLevel: LogLevelSchema.optional(),
});

const ConfigSchema = z.object({
  target: TargetSchema.default({}),
  subscriptions: z.array(z.string()).default([]),
  collector: CollectorSchema.default({}),
  retry: RetrySchema,
  dialTimeoutMs: z.number().int().min(0).default(0),
  logging: LoggingSchema.default({}),
});

export type ParsedConfig = z.infer<typeof ConfigSchema>;

export type BridgeConfig = Readonly<ParsedConfig> & {
  readonly resolved: {
    readonly paths: readonly GnmiPath[];
    readonly collector: CollectorAddress;
    readonly targetAddress: string;
    readonly sourceAddress?: string;
    readonly logFilePath?: string;
  };
};

/**
 * Values given on the command line; each one set replaces the file's.
 * Relative file paths here resolve against the working directory, those in
 * the config file against the file's directory.
 */
export interface ConfigOverrides {
  targetAddr?: string;
  targetValue?: string;
  subscribe?: string[];
  username?: string;
  password?: string;
  collectorAddr?: string;
  sourceAddr?: string;
  collectorTls?: boolean;
  collectorTlsSkipverify?: boolean;
  collectorCertfile?: string;
  collectorKeyfile?: string;
  collectorCafile?: string;
  retryDelay?: number;
  retryMaxDelay?: number;
  dialTimeout?: number;
  logLevel?: string;
  logFile?: string;
}

export async function loadConfig(
  options: { configPath?: string; overrides?: ConfigOverrides } = {},
): Promise<BridgeConfig> {
  const configPath = resolveConfigPath(options.configPath);
  const fileConfig = configPath ? await readConfigFile(configPath) : {};
  const base = parseWithSchema(fileConfig, configPath ?? "configuration");
  const merged = parseWithSchema(applyOverrides(base, options.overrides ?? {}), "command line");
  return resolveConfig(merged, configPath ? path.dirname(configPath) : undefined);
}

export function resolveConfigPath(explicitPath?: string): string | undefined {
  const envPath = process.env[CONFIG_ENV_VAR]?.trim();
  const pathToUse = explicitPath?.trim() || envPath;
  return resolveUserPath(pathToUse);
}

async function readConfigFile(configPath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${configPath}: ${errorMessage(err)}`);
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file ${configPath} is not valid JSON: ${errorMessage(err)}`);
  }
}

function parseWithSchema(raw: unknown, source: string): ParsedConfig {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigError(`Invalid ${source}: ${issues.join("; ")}`);
  }
  return result.data;
}

export function applyOverrides(base: ParsedConfig, o: ConfigOverrides): ParsedConfig {
  return {
    target: {
      address: o.targetAddr ?? base.target.address,
      value: o.targetValue ?? base.target.value,
      username: o.username ?? base.target.username,
      password: o.password ?? base.target.password,
    },
    subscriptions: o.subscribe && o.subscribe.length > 0 ? [...o.subscribe] : base.subscriptions,
    collector: {
      address: o.collectorAddr ?? base.collector.address,
      sourceAddress: o.sourceAddr ?? base.collector.sourceAddress,
      tls: {
        enabled: o.collectorTls ?? base.collector.tls.enabled,
        skipVerify: o.collectorTlsSkipverify ?? base.collector.tls.skipVerify,
        certFile: resolveUserPath(o.collectorCertfile) ?? base.collector.tls.certFile,
        keyFile: resolveUserPath(o.collectorKeyfile) ?? base.collector.tls.keyFile,
        caFile: resolveUserPath(o.collectorCafile) ?? base.collector.tls.caFile,
      },
    },
    retry: {
      initialDelayMs: o.retryDelay ?? base.retry.initialDelayMs,
      maxDelayMs: o.retryMaxDelay ?? base.retry.maxDelayMs,
    },
    dialTimeoutMs: o.dialTimeout ?? base.dialTimeoutMs,
    logging: {
      ...base.logging,
      level: parseLogLevel(o.logLevel) ?? base.logging.level,
      filePath: resolveUserPath(o.logFile) ?? base.logging.filePath,
    },
  };
}

function parseLogLevel(value: string | undefined): ParsedConfig["logging"]["level"] | undefined {
  if (value === undefined) return undefined;
  const parsed = LogLevelSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(`Invalid log level "${value}"`, {
      suggestion: `Use one of: ${LogLevelSchema.options.join(", ")}`,
    });
  }
  return parsed.data;
}

function resolveConfig(base: ParsedConfig, baseDir?: string): BridgeConfig {
  if (base.subscriptions.length === 0) {
    throw new ConfigError("No subscription paths configured", {
      suggestion: "Pass --subscribe <path> at least once",
    });
  }
  const paths = base.subscriptions.map((p) => {
    try {
      return parsePath(p);
    } catch (err) {
      if (err instanceof PathSyntaxError) {
        throw new ConfigError(`Invalid subscription path "${p}": ${err.message}`);
      }
      throw err;
    }
  });

  const targetAddress = validateHostPort(base.target.address, "target");
  if (!base.collector.address.trim()) {
    throw new ConfigError("collector address is required", {
      suggestion: "Pass --collector-addr [<vrf-name>/]address:port",
    });
  }
  const collector = parseCollectorAddress(base.collector.address);
  const sourceAddress = base.collector.sourceAddress?.trim()
    ? validateSourceAddress(base.collector.sourceAddress)
    : undefined;

  const tls = base.collector.tls;
  return {
    ...base,
    collector: {
      ...base.collector,
      tls: {
        ...tls,
        certFile: resolveUserPath(tls.certFile, baseDir),
        keyFile: resolveUserPath(tls.keyFile, baseDir),
        caFile: resolveUserPath(tls.caFile, baseDir),
      },
    },
    resolved: {
      paths,
      collector,
      targetAddress,
      sourceAddress,
      logFilePath: resolveUserPath(base.logging.filePath, baseDir),
    },
  };
}

function resolveUserPath(value: string | undefined, baseDir?: string): string | undefined {
  const trimmed = value?.trim();
  if (!trimmed) return undefined;
  if (trimmed.startsWith("~")) {
    return path.join(os.homedir(), trimmed.slice(1));
  }
  if (path.isAbsolute(trimmed)) {
    return path.normalize(trimmed);
  }
  return path.resolve(baseDir ?? process.cwd(), trimmed);
}

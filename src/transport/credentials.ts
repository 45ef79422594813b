/**
 * Credential Builder - TLS settings for the collector leg
 *
 * Builds a plain descriptor from local files only; no connection is made
 * here. `toChannelCredentials` turns the descriptor into gRPC credentials.
 */

import { X509Certificate, createPrivateKey } from "node:crypto";
import fs from "node:fs/promises";

import * as grpc from "@grpc/grpc-js";

import { ConfigError, errorMessage } from "../errors.js";

export interface TlsOptions {
  enabled: boolean;
  /** Accept any server certificate. Insecure. */
  skipVerify: boolean;
  certFile?: string;
  keyFile?: string;
  caFile?: string;
}

export interface ClientKeyPair {
  cert: Buffer;
  key: Buffer;
}

export type TransportCredentials =
  | { kind: "insecure" }
  | {
      kind: "tls";
      skipVerify: boolean;
      /** Trusted roots; absent means the system trust store. */
      rootCerts?: Buffer;
      clientKeyPair?: ClientKeyPair;
    };

type VerifyOptions = NonNullable<Parameters<typeof grpc.credentials.createSsl>[3]>;

const PEM_CERTIFICATE = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g;

export async function buildCredentials(options: TlsOptions): Promise<TransportCredentials> {
  if (!options.enabled) {
    return { kind: "insecure" };
  }
  if (options.certFile && !options.keyFile) {
    throw new ConfigError("please provide both --collector-certfile and --collector-keyfile");
  }

  let rootCerts: Buffer | undefined;
  if (!options.skipVerify && options.caFile) {
    rootCerts = await loadCaBundle(options.caFile);
  }

  let clientKeyPair: ClientKeyPair | undefined;
  if (options.certFile && options.keyFile) {
    clientKeyPair = await loadKeyPair(options.certFile, options.keyFile);
  }

  return { kind: "tls", skipVerify: options.skipVerify, rootCerts, clientKeyPair };
}

async function readMaterial(file: string, what: string): Promise<Buffer> {
  try {
    return await fs.readFile(file);
  } catch (err) {
    throw new ConfigError(`cannot read ${what} ${file}: ${errorMessage(err)}`);
  }
}

/** The bundle is accepted when at least one certificate in it parses. */
export async function loadCaBundle(caFile: string): Promise<Buffer> {
  const pem = await readMaterial(caFile, "CA file");
  const blocks = pem.toString("utf-8").match(PEM_CERTIFICATE) ?? [];
  const parsed = blocks.filter((block) => {
    try {
      new X509Certificate(block);
      return true;
    } catch {
      return false;
    }
  });
  if (parsed.length === 0) {
    throw new ConfigError(`credentials: failed to append certificates from ${caFile}`);
  }
  return Buffer.from(parsed.join("\n") + "\n", "utf-8");
}

export async function loadKeyPair(certFile: string, keyFile: string): Promise<ClientKeyPair> {
  const cert = await readMaterial(certFile, "certificate file");
  const key = await readMaterial(keyFile, "key file");

  let matches: boolean;
  try {
    matches = new X509Certificate(cert).checkPrivateKey(createPrivateKey(key));
  } catch (err) {
    throw new ConfigError(`cannot load key pair ${certFile}, ${keyFile}: ${errorMessage(err)}`);
  }
  if (!matches) {
    throw new ConfigError(`private key ${keyFile} does not match certificate ${certFile}`);
  }
  return { cert, key };
}

export function toChannelCredentials(credentials: TransportCredentials): grpc.ChannelCredentials {
  if (credentials.kind === "insecure") {
    return grpc.credentials.createInsecure();
  }
  const verifyOptions: VerifyOptions | undefined = credentials.skipVerify
    ? { rejectUnauthorized: false, checkServerIdentity: () => undefined }
    : undefined;
  return grpc.credentials.createSsl(
    credentials.rootCerts ?? null,
    credentials.clientKeyPair?.key ?? null,
    credentials.clientKeyPair?.cert ?? null,
    verifyOptions,
  );
}

export function describeCredentials(credentials: TransportCredentials): string {
  if (credentials.kind === "insecure") return "plaintext";
  const parts = ["tls"];
  if (credentials.skipVerify) parts.push("skip-verify");
  else parts.push(credentials.rootCerts ? "custom-ca" : "system-ca");
  if (credentials.clientKeyPair) parts.push("client-cert");
  return parts.join(", ");
}

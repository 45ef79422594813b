import path from "node:path";
import { fileURLToPath } from "node:url";

import * as protoLoader from "@grpc/proto-loader";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** `proto/` sits two levels above both `src/gnmi` and `dist/gnmi`. */
export const PROTO_DIR = path.resolve(__dirname, "../../proto");

export const LOADER_OPTIONS: protoLoader.Options = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: false,
  oneofs: true,
  includeDirs: [PROTO_DIR],
};

export type GrpcMethod = protoLoader.MethodDefinition<object, object>;

export interface GnmiDefinitions {
  /** gnmi.gNMI/Subscribe */
  subscribe: GrpcMethod;
  /** gnmireverse.gNMIReverse/Publish */
  publish: GrpcMethod;
}

let cached: GnmiDefinitions | null = null;

export function loadGnmiDefinitions(): GnmiDefinitions {
  if (cached) return cached;
  const pkg = protoLoader.loadSync(
    ["gnmi/gnmi.proto", "gnmireverse/gnmireverse.proto"],
    LOADER_OPTIONS,
  );
  cached = {
    subscribe: findMethod(pkg, "gnmi.gNMI", "Subscribe"),
    publish: findMethod(pkg, "gnmireverse.gNMIReverse", "Publish"),
  };
  return cached;
}

function findMethod(pkg: protoLoader.PackageDefinition, service: string, name: string): GrpcMethod {
  const definition = pkg[service];
  if (!definition || "format" in definition) {
    throw new Error(`Service ${service} missing from ${PROTO_DIR}`);
  }
  const method = definition[name];
  if (!method) {
    throw new Error(`Method ${service}/${name} missing from ${PROTO_DIR}`);
  }
  return method;
}

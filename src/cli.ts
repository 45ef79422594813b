#!/usr/bin/env node
/**
 * gnmi-dialout CLI entrypoint
 */

import fs from "node:fs";
import { fileURLToPath } from "node:url";

import { createProgram } from "./cli/cli-app.js";
import { formatError } from "./cli/error-handler.js";

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    const entryPath = fs.realpathSync(entry);
    const modulePath = fs.realpathSync(fileURLToPath(import.meta.url));
    return entryPath === modulePath;
  } catch {
    return false;
  }
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  await createProgram()
    .parseAsync(argv)
    .catch((err: unknown) => {
      console.error(formatError(err));
      process.exitCode = 1;
    });
}

// Only parse argv when invoked as an entrypoint script.
if (isMainModule()) {
  void runCli();
}

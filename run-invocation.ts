#!/usr/bin/env node
import fs from "node:fs";
import { fileURLToPath } from "node:url";
import {
  buildInvocationConfig,
  credentialStorePath,
  resolveProjectRoot,
} from "./config/invocationConfig.js";
import { type AskForSecret, loadCredential } from "./config/loadCredential.js";
import { runInvocation, type InvocationDeps } from "./invocation/runInvocation.js";
import { isInvocationError } from "./invocation/errors.js";
import { invocationLogHelpers } from "./logging/invocationEvents.js";

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;

/**
 * Whole script as a function returning the process exit code.
 */
export async function main(
  params: {
    env?: Record<string, string | undefined>;
    cwd?: string;
    ask?: AskForSecret;
    deps?: InvocationDeps;
  } = {}
): Promise<number> {
  try {
    const projectRoot = resolveProjectRoot(params.env ?? process.env, params.cwd ?? process.cwd());
    const apiKey = await loadCredential({
      storePath: credentialStorePath(projectRoot),
      ask: params.ask,
    });
    const config = buildInvocationConfig({ projectRoot, apiKey });

    const result = await runInvocation(config, params.deps);

    console.log(
      `✅ Solaria has spoken.\n📜 Scroll saved to: ${result.scrollPath}\n🗂️  Log saved to: ${result.logPath}`
    );
    return EXIT_OK;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    invocationLogHelpers.failed({
      error_kind: isInvocationError(err) ? err.kind : "unexpected",
      error_message: message,
    });
    console.error(`❌ ${message}`);
    return EXIT_FATAL;
  }
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    // bin shims reach us through a symlink
    return fs.realpathSync(entry) === fs.realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (invokedDirectly()) {
  main().then(
    (code) => process.exit(code),
    (err) => {
      console.error(err);
      process.exit(EXIT_FATAL);
    }
  );
}

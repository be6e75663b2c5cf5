import fs from "node:fs";
import { createInterface } from "node:readline/promises";
import { parse } from "dotenv";
import { ConfigurationError } from "../invocation/errors.js";

export const CREDENTIAL_KEY = "OPENAI_API_KEY";

export type AskForSecret = () => Promise<string>;

export async function promptForApiKey(): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question("Enter your OpenAI API key: ");
  } finally {
    rl.close();
  }
}

/**
 * Returns true when the store had to be created from an interactive answer.
 */
export async function ensureCredentialStore(
  storePath: string,
  ask: AskForSecret = promptForApiKey
): Promise<boolean> {
  if (fs.existsSync(storePath)) return false;

  console.log("[credentials] No .env file found. Let's create one.");
  const answer = (await ask()).trim();
  fs.writeFileSync(storePath, `${CREDENTIAL_KEY}=${answer}\n`, "utf-8");
  return true;
}

export function readCredential(storePath: string): string | undefined {
  const parsed = parse(fs.readFileSync(storePath));
  const value = parsed[CREDENTIAL_KEY]?.trim();
  return value ? value : undefined;
}

export async function loadCredential(params: {
  storePath: string;
  ask?: AskForSecret;
}): Promise<string> {
  await ensureCredentialStore(params.storePath, params.ask);

  const apiKey = readCredential(params.storePath);
  if (!apiKey) {
    throw new ConfigurationError("OpenAI API key not found. Aborting.");
  }
  return apiKey;
}

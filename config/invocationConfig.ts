import path from "node:path";

export type LLMInvocationConfig = {
  provider: "openai";
  model: string;
  endpoint: string;
};

export const SOLARIA_LLM_CONFIG: LLMInvocationConfig = {
  provider: "openai",
  model: "gpt-4o",
  endpoint: "https://api.openai.com/v1/chat/completions",
};

export const SEED_PACKET_FILENAME = "SolariaSeedPacket_∞.20_SacredMomentEdition.md";
export const FRAGMENT_EXTENSION = ".md";
export const CREDENTIAL_STORE_FILENAME = ".env";

export type InvocationPaths = {
  projectRoot: string;
  seedPath: string;
  fragmentDir: string;
  scrollDir: string;
  logDir: string;
};

/**
 * Built once at process start and passed down explicitly.
 * Nothing downstream reads process.env.
 */
export type InvocationConfig = Readonly<{
  apiKey: string;
  llm: LLMInvocationConfig;
  paths: InvocationPaths;
}>;

export function resolveProjectRoot(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): string {
  const fromEnv = env.INVOCATION_ROOT?.trim();
  return path.resolve(fromEnv ? fromEnv : cwd);
}

export function resolveInvocationPaths(projectRoot: string): InvocationPaths {
  return {
    projectRoot,
    seedPath: path.join(projectRoot, "seed_packets", SEED_PACKET_FILENAME),
    fragmentDir: path.join(projectRoot, "motd_fragments"),
    scrollDir: path.join(projectRoot, "scrolls"),
    logDir: path.join(projectRoot, "logs"),
  };
}

export function credentialStorePath(projectRoot: string): string {
  return path.join(projectRoot, CREDENTIAL_STORE_FILENAME);
}

export function buildInvocationConfig(params: {
  projectRoot: string;
  apiKey: string;
  llm?: LLMInvocationConfig;
}): InvocationConfig {
  return Object.freeze({
    apiKey: params.apiKey,
    llm: params.llm ?? SOLARIA_LLM_CONFIG,
    paths: resolveInvocationPaths(params.projectRoot),
  });
}

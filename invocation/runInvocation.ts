import type { InvocationConfig } from "../config/invocationConfig.js";
import { TransportError } from "./errors.js";
import { loadSeedPacket } from "./assembly/loadSeedPacket.js";
import { selectFragment } from "./assembly/selectFragment.js";
import { buildInvocationPrompt } from "./assembly/buildInvocationPrompt.js";
import { generateKairosId } from "./identity/generateKairosId.js";
import { invokeLLM } from "../llm/invokeLLM.js";
import { buildScrollPaths, relativeToRoot } from "./persistence/buildScrollPaths.js";
import { writeScroll } from "./persistence/writeScroll.js";
import { writeInvocationLog } from "./persistence/writeInvocationLog.js";
import { type InvocationLogRecord, formatTimestampUtc } from "./persistence/invocationLog.schema.js";
import { invocationLogHelpers } from "../logging/invocationEvents.js";

export type InvocationResult = {
  kairosId: string;
  scrollPath: string;
  logPath: string;
  record: InvocationLogRecord;
};

export type InvocationDeps = {
  now?: () => number;
  random?: () => number;
};

/**
 * One invocation: seed + fragment -> prompt -> single chat completion -> scroll + log.
 * Throws SeedNotFoundError before any network call, and TransportError before any file is written.
 */
export async function runInvocation(
  config: InvocationConfig,
  deps: InvocationDeps = {}
): Promise<InvocationResult> {
  const now = deps.now ?? Date.now;
  const random = deps.random ?? Math.random;
  const { paths, llm } = config;

  const seedText = loadSeedPacket(paths.seedPath);
  const fragment = selectFragment(paths.fragmentDir, random);
  const kairosId = generateKairosId({ now, random });

  invocationLogHelpers.started({ kairos_id: kairosId, motd_file: fragment.name });

  const prompt = buildInvocationPrompt({
    fragmentText: fragment.text,
    seedText,
  });

  console.log("[invocation] 🌀 Invoking Solaria...");
  invocationLogHelpers.llmRequested({ kairos_id: kairosId, model: llm.model });

  const llmResult = await invokeLLM(prompt, { apiKey: config.apiKey, config: llm });
  if (llmResult.status !== "ok") {
    invocationLogHelpers.llmFailed({
      kairos_id: kairosId,
      model: llm.model,
      error_kind: llmResult.error_type,
      error_message: llmResult.message,
    });
    throw new TransportError(llmResult.error_type, llmResult.message);
  }

  const { scrollPath, logPath } = buildScrollPaths(paths, kairosId);

  // Independent writes: a crash between them leaves a scroll without its log.
  writeScroll(scrollPath, kairosId, llmResult.text);

  const record: InvocationLogRecord = {
    kairos_id: kairosId,
    timestamp_utc: formatTimestampUtc(new Date(now())),
    scroll_file: relativeToRoot(paths.projectRoot, scrollPath),
    motd_file: fragment.name,
    seed_packet: relativeToRoot(paths.projectRoot, paths.seedPath),
    model: llm.model,
  };
  writeInvocationLog(logPath, record);

  invocationLogHelpers.persisted({
    kairos_id: kairosId,
    scroll_file: record.scroll_file,
    log_file: relativeToRoot(paths.projectRoot, logPath),
  });

  return { kairosId, scrollPath, logPath, record };
}

import fs from "node:fs";
import path from "node:path";
import { type InvocationLogRecord, InvocationLogSchema } from "./invocationLog.schema.js";

export function writeInvocationLog(logPath: string, record: InvocationLogRecord): void {
  const result = InvocationLogSchema.safeParse(record);
  if (!result.success) {
    throw new Error(`Invocation log failed schema validation: ${result.error.message}`);
  }

  fs.mkdirSync(path.dirname(logPath), { recursive: true });
  fs.writeFileSync(logPath, JSON.stringify(result.data, null, 2), "utf-8");
}

export function readInvocationLog(logPath: string): InvocationLogRecord {
  const raw = fs.readFileSync(logPath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(
      `Failed to parse invocation log JSON (${path.basename(logPath)}): ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return InvocationLogSchema.parse(parsed);
}

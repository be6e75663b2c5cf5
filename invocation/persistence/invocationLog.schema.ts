import { z } from "zod";
import { KAIROS_ID_PATTERN } from "../identity/generateKairosId.js";

export const TIMESTAMP_UTC_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/;

export const InvocationLogSchema = z.object({
  kairos_id: z.string().regex(KAIROS_ID_PATTERN, "kairos_id must be 8 lowercase hex chars"),
  timestamp_utc: z.string().regex(TIMESTAMP_UTC_PATTERN, "timestamp_utc must be YYYY-MM-DDTHH:MM:SSZ"),
  scroll_file: z.string().min(1),
  motd_file: z.string().min(1),
  seed_packet: z.string().min(1),
  model: z.string().min(1),
});

export type InvocationLogRecord = z.infer<typeof InvocationLogSchema>;

export function formatTimestampUtc(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

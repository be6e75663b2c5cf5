import fs from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { readInvocationLog, writeInvocationLog } from "../writeInvocationLog.js";
import { type InvocationLogRecord, formatTimestampUtc } from "../invocationLog.schema.js";
import { makeProjectRoot, removeProjectRoot } from "../../__tests__/testHelpers.js";

const record: InvocationLogRecord = {
  kairos_id: "0a1b2c3d",
  timestamp_utc: "2026-01-02T03:04:05Z",
  scroll_file: "scrolls/SCROLL_0a1b2c3d.md",
  motd_file: "none",
  seed_packet: "seed_packets/SolariaSeedPacket_∞.20_SacredMomentEdition.md",
  model: "gpt-4o",
};

describe("writeInvocationLog", () => {
  let root: string | undefined;

  afterEach(() => {
    removeProjectRoot(root);
  });

  it("writes the six fields with two-space indentation", () => {
    root = makeProjectRoot();
    const logPath = path.join(root, "logs", "log_0a1b2c3d.json");

    writeInvocationLog(logPath, record);

    expect(fs.readFileSync(logPath, "utf-8")).toBe(
      [
        "{",
        '  "kairos_id": "0a1b2c3d",',
        '  "timestamp_utc": "2026-01-02T03:04:05Z",',
        '  "scroll_file": "scrolls/SCROLL_0a1b2c3d.md",',
        '  "motd_file": "none",',
        '  "seed_packet": "seed_packets/SolariaSeedPacket_∞.20_SacredMomentEdition.md",',
        '  "model": "gpt-4o"',
        "}",
      ].join("\n")
    );
    expect(readInvocationLog(logPath)).toEqual(record);
  });

  it("refuses a record with a malformed id and writes nothing", () => {
    root = makeProjectRoot();
    const logPath = path.join(root, "logs", "log_bad.json");

    expect(() => writeInvocationLog(logPath, { ...record, kairos_id: "NOT-HEX" })).toThrow(
      /schema validation/
    );
    expect(fs.existsSync(logPath)).toBe(false);
  });
});

describe("formatTimestampUtc", () => {
  it("drops milliseconds", () => {
    expect(formatTimestampUtc(new Date(Date.UTC(2026, 0, 2, 3, 4, 5, 678)))).toBe(
      "2026-01-02T03:04:05Z"
    );
  });
});

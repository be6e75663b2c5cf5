import fs from "node:fs";
import { SeedNotFoundError } from "../errors.js";

export function loadSeedPacket(seedPath: string): string {
  if (!fs.existsSync(seedPath)) {
    throw new SeedNotFoundError(seedPath);
  }
  return fs.readFileSync(seedPath, "utf-8");
}

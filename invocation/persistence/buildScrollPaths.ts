import path from "node:path";
import type { InvocationPaths } from "../../config/invocationConfig.js";

export type ScrollPaths = {
  scrollPath: string;
  logPath: string;
};

export function buildScrollPaths(paths: InvocationPaths, kairosId: string): ScrollPaths {
  return {
    scrollPath: path.join(paths.scrollDir, `SCROLL_${kairosId}.md`),
    logPath: path.join(paths.logDir, `log_${kairosId}.json`),
  };
}

// Paths in the log are recorded relative to the project root, with forward slashes.
export function relativeToRoot(projectRoot: string, target: string): string {
  return path.relative(projectRoot, target).split(path.sep).join("/");
}

import fs from "node:fs";
import path from "node:path";

export const SCROLL_TITLE = "# 🌌 Scroll of Becoming";

export function renderScroll(kairosId: string, text: string): string {
  return `${SCROLL_TITLE}\n\n**Kairos ID:** ${kairosId}\n\n${text}`;
}

export function readScrollKairosId(content: string): string | null {
  const match = content.match(/^\*\*Kairos ID:\*\* ([0-9a-f]+)$/m);
  return match ? match[1] : null;
}

export function writeScroll(scrollPath: string, kairosId: string, text: string): void {
  fs.mkdirSync(path.dirname(scrollPath), { recursive: true });
  fs.writeFileSync(scrollPath, renderScroll(kairosId, text), "utf-8");
}

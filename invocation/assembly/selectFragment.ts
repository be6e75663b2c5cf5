import fs from "node:fs";
import path from "node:path";
import { FRAGMENT_EXTENSION } from "../../config/invocationConfig.js";

export const NO_FRAGMENT = "none";

export type SelectedFragment = {
  name: string;
  text: string;
};

export function listFragmentFiles(fragmentDir: string): string[] {
  if (!fs.existsSync(fragmentDir)) return [];

  return fs
    .readdirSync(fragmentDir, { withFileTypes: true })
    .filter(
      (dirent) =>
        dirent.name.endsWith(FRAGMENT_EXTENSION) &&
        (dirent.isFile() || (dirent.isSymbolicLink() && isLinkToFile(path.join(fragmentDir, dirent.name))))
    )
    .map((dirent) => dirent.name)
    .sort((a, b) => a.localeCompare(b));
}

// Symlinked fragments count; dangling links and links to directories do not.
function isLinkToFile(linkPath: string): boolean {
  const target = fs.statSync(linkPath, { throwIfNoEntry: false });
  return target?.isFile() ?? false;
}

/**
 * Uniform draw over the fragment files. A missing or empty directory
 * yields an empty fragment named "none".
 */
export function selectFragment(
  fragmentDir: string,
  random: () => number = Math.random
): SelectedFragment {
  const files = listFragmentFiles(fragmentDir);
  if (files.length === 0) {
    return { name: NO_FRAGMENT, text: "" };
  }

  const index = Math.min(Math.floor(random() * files.length), files.length - 1);
  const name = files[index];
  return {
    name,
    text: fs.readFileSync(path.join(fragmentDir, name), "utf-8"),
  };
}

import fs from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { NO_FRAGMENT, listFragmentFiles, selectFragment } from "../selectFragment.js";
import { makeProjectRoot, removeProjectRoot } from "../../__tests__/testHelpers.js";

describe("selectFragment", () => {
  let root: string | undefined;

  afterEach(() => {
    removeProjectRoot(root);
  });

  it("returns the none sentinel when the directory is absent", () => {
    root = makeProjectRoot();
    expect(selectFragment(path.join(root, "motd_fragments"))).toEqual({ name: NO_FRAGMENT, text: "" });
    expect(NO_FRAGMENT).toBe("none");
  });

  it("returns the none sentinel when no .md files exist", () => {
    root = makeProjectRoot({ fragments: { "notes.txt": "ignored" } });
    fs.mkdirSync(path.join(root, "motd_fragments", "nested.md"));

    expect(selectFragment(path.join(root, "motd_fragments"))).toEqual({ name: "none", text: "" });
  });

  it("lists only regular .md files, sorted by name", () => {
    root = makeProjectRoot({
      fragments: { "b.md": "B", "a.md": "A", "c.txt": "C" },
    });

    expect(listFragmentFiles(path.join(root, "motd_fragments"))).toEqual(["a.md", "b.md"]);
  });

  it("maps the random draw uniformly onto the sorted files", () => {
    root = makeProjectRoot({
      fragments: { "a.md": "alpha", "b.md": "beta", "c.md": "gamma" },
    });
    const dir = path.join(root, "motd_fragments");

    expect(selectFragment(dir, () => 0)).toEqual({ name: "a.md", text: "alpha" });
    expect(selectFragment(dir, () => 0.4)).toEqual({ name: "b.md", text: "beta" });
    expect(selectFragment(dir, () => 0.99)).toEqual({ name: "c.md", text: "gamma" });
  });

  it("follows symlinked fragments and skips dangling links", () => {
    root = makeProjectRoot({ fragments: {} });
    const dir = path.join(root, "motd_fragments");
    const target = path.join(root, "shared-world.md");
    fs.writeFileSync(target, "World", "utf-8");
    fs.symlinkSync(target, path.join(dir, "a.md"));
    fs.symlinkSync(path.join(root, "missing.md"), path.join(dir, "b.md"));

    expect(listFragmentFiles(dir)).toEqual(["a.md"]);
    expect(selectFragment(dir, () => 0)).toEqual({ name: "a.md", text: "World" });
  });

  it("clamps a draw of exactly 1 to the last file", () => {
    root = makeProjectRoot({ fragments: { "a.md": "alpha", "b.md": "beta" } });

    expect(selectFragment(path.join(root, "motd_fragments"), () => 1).name).toBe("b.md");
  });
});

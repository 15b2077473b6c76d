import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, it } from "node:test";
import { pathExists, safeFilename, sanitizeAssetName, walkFiles } from "./filesystem.js";

const createdTempDirs: string[] = [];

afterEach(async () => {
  await Promise.all(createdTempDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
});

async function tempDir(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "asset-localizer-fs-"));
  createdTempDirs.push(dir);
  return dir;
}

describe("safeFilename", () => {
  it("strips characters outside the allowed set", () => {
    assert.equal(safeFilename("img@2x!.png"), "img2x.png");
  });

  it("keeps dots, underscores and hyphens", () => {
    assert.equal(safeFilename("my_file-v1.2.min.svg"), "my_file-v1.2.min.svg");
  });
});

describe("sanitizeAssetName", () => {
  it("removes %20 and preserves the extension case", () => {
    assert.equal(sanitizeAssetName("https://example.com/a%20b.PNG"), "ab.PNG");
  });

  it("ignores query string and fragment", () => {
    assert.equal(sanitizeAssetName("https://cdn.test/x/logo.png?v=2#top"), "logo.png");
  });

  it("strips percent signs of other escapes without decoding", () => {
    assert.equal(sanitizeAssetName("https://cdn.test/caf%C3%A9.png"), "cafC3A9.png");
  });

  it("returns an empty name for a path ending in a slash", () => {
    assert.equal(sanitizeAssetName("https://cdn.test/dir/"), "");
  });
});

describe("walkFiles", () => {
  it("yields every file in nested directories", async () => {
    const root = await tempDir();
    await fs.mkdir(path.join(root, "sub", "deep"), { recursive: true });
    await fs.writeFile(path.join(root, "a.html"), "");
    await fs.writeFile(path.join(root, "sub", "b.css"), "");
    await fs.writeFile(path.join(root, "sub", "deep", "c.txt"), "");

    const found: string[] = [];
    for await (const file of walkFiles(root)) {
      found.push(path.relative(root, file).replace(/\\/g, "/"));
    }

    assert.deepEqual(found.sort(), ["a.html", "sub/b.css", "sub/deep/c.txt"]);
  });
});

describe("walkFiles with symlinks", () => {
  it("yields links to files and skips broken links", async () => {
    const root = await tempDir();
    const outside = await tempDir();
    await fs.writeFile(path.join(outside, "shared.css"), "");
    await fs.symlink(path.join(outside, "shared.css"), path.join(root, "linked.css"));
    await fs.symlink(path.join(outside, "gone.css"), path.join(root, "broken.css"));

    const found: string[] = [];
    for await (const file of walkFiles(root)) {
      found.push(path.basename(file));
    }

    assert.deepEqual(found, ["linked.css"]);
  });
});

describe("pathExists", () => {
  it("reports existing and missing paths", async () => {
    const root = await tempDir();
    await fs.writeFile(path.join(root, "here.txt"), "x");

    assert.equal(await pathExists(path.join(root, "here.txt")), true);
    assert.equal(await pathExists(path.join(root, "missing.txt")), false);
  });
});

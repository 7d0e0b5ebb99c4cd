import assert from "node:assert/strict";
import test from "node:test";
import { mkdtemp, readdir, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { withTempFile } from "../audio/temp-file.js";

async function makeRoot(): Promise<string> {
  return mkdtemp(join(tmpdir(), "temp-file-test-"));
}

test("withTempFile removes the file after the callback resolves", async () => {
  const root = await makeRoot();
  try {
    const seen = await withTempFile(root, ".mp3", async (path) => {
      await writeFile(path, "abc");
      assert.equal((await stat(path)).size, 3);
      assert.ok(path.endsWith(".mp3"));
      return path;
    });

    await assert.rejects(stat(seen), { code: "ENOENT" });
    assert.deepEqual(await readdir(root), []);
  } finally {
    await rm(root, { recursive: true, force: true });
  }
});

test("withTempFile removes the file when the callback throws", async () => {
  const root = await makeRoot();
  try {
    await assert.rejects(
      withTempFile(root, ".wav", async (path) => {
        await writeFile(path, "abc");
        throw new Error("boom");
      }),
      /boom/,
    );
    assert.deepEqual(await readdir(root), []);
  } finally {
    await rm(root, { recursive: true, force: true });
  }
});

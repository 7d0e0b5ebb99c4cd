import { mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";

/**
 * Runs `fn` with the path of a fresh file under `root` and removes the file
 * (and the directory holding it) once `fn` settles.
 */
export async function withTempFile<T>(
  root: string,
  suffix: string,
  fn: (path: string) => Promise<T>,
): Promise<T> {
  const dir = await mkdtemp(join(root, "voice-translator-"));
  try {
    return await fn(join(dir, `audio${suffix}`));
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

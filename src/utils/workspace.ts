/**
 * ContractExtractor – Run-scoped temporary workspace
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

export const WORKSPACE_PREFIX = "contract-extract-";

/**
 * Create a temporary directory, hand it to `fn`, and remove it again
 * whether `fn` resolves or rejects.
 */
export async function withTempWorkspace<T>(
  fn: (workDir: string) => Promise<T>,
  prefix: string = WORKSPACE_PREFIX,
): Promise<T> {
  const workDir = await mkdtemp(join(tmpdir(), prefix));
  try {
    return await fn(workDir);
  } finally {
    await rm(workDir, { recursive: true, force: true });
  }
}

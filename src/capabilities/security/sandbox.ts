import { resolve, normalize, dirname, basename, sep } from "node:path";
import { realpath, access } from "node:fs/promises";

/**
 * Resolve a capability-supplied path inside a root directory.
 * Throws if the resolved path escapes the root.
 *
 * Existing paths are resolved through realpath so symlinks cannot escape;
 * write targets resolve their parent instead.
 */
export async function resolveWithinRoot(inputPath: string, root: string): Promise<string> {
  let normalizedRoot: string;
  try {
    normalizedRoot = await realpath(resolve(root));
  } catch {
    normalizedRoot = normalize(resolve(root));
  }

  const resolved = resolve(normalizedRoot, inputPath);

  let real: string;
  try {
    await access(resolved);
    real = await realpath(resolved);
  } catch {
    const parentDir = dirname(resolved);
    let realParent: string;
    try {
      await access(parentDir);
      realParent = await realpath(parentDir);
    } catch {
      realParent = normalize(parentDir);
    }
    real = resolve(realParent, basename(resolved));
  }

  if (!isWithinRoot(real, normalizedRoot)) {
    throw new Error(`Path "${inputPath}" resolves outside of "${normalizedRoot}"`);
  }

  return real;
}

function isWithinRoot(path: string, root: string): boolean {
  const normalizedPath = normalize(path);
  const normalizedRoot = normalize(root);
  return normalizedPath === normalizedRoot || normalizedPath.startsWith(normalizedRoot + sep);
}

export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

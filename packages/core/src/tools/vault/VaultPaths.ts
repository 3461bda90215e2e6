import path from "node:path";

/**
 * Resolves a vault-relative path. A leading slash means the vault root, and
 * anything that escapes the root is rejected.
 */
export const resolveVaultPath = (vaultRoot: string, targetPath: string): string => {
  const root = path.resolve(vaultRoot);
  const relativeTarget = targetPath.replace(/^[\\/]+/, "");
  const resolved = path.resolve(root, relativeTarget);
  const relative = path.relative(root, resolved);
  if (relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new Error(`Path is outside the vault root: ${targetPath}`);
  }
  return resolved;
};

export const toVaultRelative = (vaultRoot: string, targetPath: string): string => {
  const relative = path.relative(path.resolve(vaultRoot), targetPath) || ".";
  return relative.split(path.sep).join("/");
};

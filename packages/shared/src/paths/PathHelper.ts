import os from "node:os";
import path from "node:path";
import { createHash } from "node:crypto";
import { promises as fs } from "node:fs";

const normalizePathCase = (value: string): string => {
  const normalized = path.normalize(value);
  return process.platform === "win32" ? normalized.toLowerCase() : normalized;
};

/**
 * Resolves where vaultsplit keeps its own files. Per-vault state lives under the
 * global directory so nothing is written into the vault besides breakdown notes.
 */
export class PathHelper {
  static getGlobalDir(): string {
    const envHome = process.env.HOME ?? process.env.USERPROFILE;
    const homeDir = envHome && envHome.trim().length > 0 ? envHome : os.homedir();
    return path.join(homeDir, ".vaultsplit");
  }

  static getVaultStateDir(vaultRoot: string): string {
    const normalizedRoot = normalizePathCase(path.resolve(vaultRoot));
    const hash = createHash("sha256").update(normalizedRoot).digest("hex").slice(0, 12);
    const rawName = path.basename(normalizedRoot) || "vault";
    const safeName = rawName.replace(/[^a-zA-Z0-9._-]+/g, "_").slice(0, 32) || "vault";
    return path.join(this.getGlobalDir(), "state", `${safeName}-${hash}`);
  }

  static async ensureDir(dir: string): Promise<void> {
    await fs.mkdir(dir, { recursive: true });
  }
}

// src/assets/AssetBundle.ts
/**
 * Purpose:
 * - Read-only, in-memory file tree served by the production asset routes.
 * - Built once at startup (from a directory, or from a record in tests);
 *   lookups never touch the filesystem afterwards.
 *
 * Invariants:
 * - Keys are "/"-separated paths relative to the bundle root.
 * - Lookups ignore a leading "/" or "./"; paths containing ".." never match.
 * - Contents are copied in and copied out, so callers can't mutate the bundle.
 */

import fs from "node:fs";
import path from "node:path";

export interface AssetFile {
  path: string;
  contents: Buffer;
}

function normalizeKey(p: string): string | null {
  const parts = p
    .replace(/\\/g, "/")
    .split("/")
    .filter((s) => s !== "" && s !== ".");
  if (parts.length === 0 || parts.includes("..")) return null;
  return parts.join("/");
}

function walk(root: string, dir: string, out: Map<string, Buffer>): void {
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const abs = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      walk(root, abs, out);
    } else if (entry.isFile()) {
      const rel = path.relative(root, abs).split(path.sep).join("/");
      out.set(rel, fs.readFileSync(abs));
    }
  }
}

export class AssetBundle {
  private readonly files: ReadonlyMap<string, Buffer>;

  private constructor(files: Map<string, Buffer>) {
    this.files = files;
  }

  static fromRecord(record: Record<string, string | Buffer>): AssetBundle {
    const files = new Map<string, Buffer>();
    for (const [k, v] of Object.entries(record)) {
      const key = normalizeKey(k);
      if (!key) throw new Error(`ASSET_PATH_INVALID: "${k}"`);
      // Buffer.from(buffer) copies.
      files.set(
        key,
        typeof v === "string" ? Buffer.from(v, "utf8") : Buffer.from(v)
      );
    }
    return new AssetBundle(files);
  }

  /** Load a whole directory tree into memory. Throws if `dir` is not a directory. */
  static fromDirectory(dir: string): AssetBundle {
    const root = path.resolve(dir);
    if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
      throw new Error(`ASSET_DIR_MISSING: "${root}" is not a directory`);
    }
    const files = new Map<string, Buffer>();
    walk(root, root, files);
    return new AssetBundle(files);
  }

  static empty(): AssetBundle {
    return new AssetBundle(new Map());
  }

  /** Returns a copy of the stored bytes; the bundle itself never changes. */
  getFile(p: string): AssetFile | undefined {
    const key = normalizeKey(p);
    if (!key) return undefined;
    const contents = this.files.get(key);
    return contents ? { path: key, contents: Buffer.from(contents) } : undefined;
  }

  has(p: string): boolean {
    const key = normalizeKey(p);
    return key !== null && this.files.has(key);
  }

  paths(): string[] {
    return [...this.files.keys()].sort();
  }

  get size(): number {
    return this.files.size;
  }
}

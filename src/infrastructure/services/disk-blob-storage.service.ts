import { copyFile, mkdir, readFile, readdir, stat, unlink, writeFile } from "node:fs/promises";
import { dirname, join, relative, resolve, sep } from "node:path";
import type { IBlobStorage } from "../../core/domain/services/blob-storage.service.js";

function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

/**
 * Blob store backed by a local folder; object keys map to relative file
 * paths. Used for local runs and mounted shares.
 */
export class DiskBlobStorage implements IBlobStorage {
  private basePath: string;

  constructor(basePath: string) {
    this.basePath = resolve(basePath);
  }

  private resolveKey(key: string): string {
    const full = resolve(this.basePath, key);
    if (full !== this.basePath && !full.startsWith(this.basePath + sep)) {
      throw new Error(`Key escapes storage root: ${key}`);
    }
    return full;
  }

  async list(prefix: string): Promise<string[]> {
    // Walk from the deepest folder fully named by the prefix.
    const lastSlash = prefix.lastIndexOf("/");
    const startDir = this.resolveKey(lastSlash === -1 ? "" : prefix.slice(0, lastSlash));
    try {
      const s = await stat(startDir);
      if (!s.isDirectory()) return [];
    } catch (e) {
      if (isNotFound(e)) return [];
      throw e;
    }

    const keys: string[] = [];
    const walk = async (dir: string): Promise<void> => {
      const entries = await readdir(dir, { withFileTypes: true });
      for (const entry of entries) {
        const full = join(dir, entry.name);
        if (entry.isDirectory()) {
          await walk(full);
        } else if (entry.isFile()) {
          const key = relative(this.basePath, full).split(sep).join("/");
          if (key.startsWith(prefix)) keys.push(key);
        }
      }
    };

    await walk(startDir);
    return keys.sort();
  }

  async read(path: string): Promise<Uint8Array> {
    return readFile(this.resolveKey(path));
  }

  async write(path: string, data: Uint8Array | string): Promise<void> {
    const fullPath = this.resolveKey(path);
    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, data);
  }

  async copy(sourcePath: string, destinationPath: string): Promise<void> {
    const target = this.resolveKey(destinationPath);
    await mkdir(dirname(target), { recursive: true });
    await copyFile(this.resolveKey(sourcePath), target);
  }

  async delete(path: string): Promise<void> {
    await unlink(this.resolveKey(path));
  }
}

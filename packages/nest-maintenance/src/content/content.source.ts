import { readFile, stat } from 'node:fs/promises';
import { resolve } from 'node:path';

/** Filesystem access used for the trigger probe and the maintenance content. */
export interface MaintenanceFiles {
  /** Resolves `true` when the artifact exists; rejections are read as "absent" by callers. */
  exists(path: string): Promise<boolean>;
  /** Reads the full artifact. */
  read(path: string): Promise<Buffer>;
}

/** Default `MaintenanceFiles` backed by `node:fs/promises`, paths resolved from `baseDir`. */
export class NodeMaintenanceFiles implements MaintenanceFiles {
  constructor(private readonly baseDir = process.cwd()) {}

  async exists(path: string): Promise<boolean> {
    try {
      await stat(resolve(this.baseDir, path));
      return true;
    } catch {
      return false;
    }
  }

  read(path: string): Promise<Buffer> {
    return readFile(resolve(this.baseDir, path));
  }
}

/** In-memory `MaintenanceFiles`; handy for tests and for content bundled with the application. */
export class MemoryMaintenanceFiles implements MaintenanceFiles {
  private readonly entries = new Map<string, Buffer>();

  constructor(initial: Record<string, string | Buffer> = {}) {
    for (const [path, content] of Object.entries(initial)) {
      this.put(path, content);
    }
  }

  put(path: string, content: string | Buffer): void {
    this.entries.set(path, typeof content === 'string' ? Buffer.from(content, 'utf-8') : content);
  }

  remove(path: string): void {
    this.entries.delete(path);
  }

  async exists(path: string): Promise<boolean> {
    return this.entries.has(path);
  }

  async read(path: string): Promise<Buffer> {
    const content = this.entries.get(path);
    if (!content) {
      throw new Error(`ENOENT: no such file '${path}'`);
    }
    return content;
  }
}

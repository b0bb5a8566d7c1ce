import { promises as fs } from "node:fs";
import * as path from "node:path";
import { isErrnoException } from "./errors.js";

// One named blob. `read` yields null when nothing has been stored yet.
export interface BlobStorage {
  readonly name: string;
  read(): Promise<string | null>;
  write(data: string): Promise<void>;
}

export class FileBlobStorage implements BlobStorage {
  public readonly filename: string;

  constructor(filename: string) {
    this.filename = filename;
  }

  get name(): string {
    return this.filename;
  }

  async read(): Promise<string | null> {
    try {
      return await fs.readFile(this.filename, "utf8");
    } catch (e) {
      if (isErrnoException(e) && e.code === "ENOENT") return null;
      throw e;
    }
  }

  async write(data: string): Promise<void> {
    const dir = path.dirname(this.filename);
    await fs.mkdir(dir, { recursive: true });

    const tmp = `${this.filename}.tmp`;
    await fs.writeFile(tmp, data, { encoding: "utf8", mode: 0o644 });
    await fs.rename(tmp, this.filename);
  }
}

import { readFile, stat } from "node:fs/promises";
import JSZip from "jszip";
import { ArchiveError, InputNotFoundError } from "../errors";
import type { ArchiveMember } from "../types";
import { METHOD_STORE, readCentralDirectory } from "./centralDirectory";

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function errorDetail(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Read-only view of a zipped spreadsheet container.
 *
 * The source file is read into memory once and the handle released, so the
 * same path can later be replaced by the rewriter.
 */
export class WorkbookArchive {
  private constructor(
    readonly path: string,
    /** Exact bytes of the container as read from disk. */
    readonly bytes: Buffer,
    private readonly zip: JSZip,
    /** Names of members written without compression. */
    private readonly stored: ReadonlySet<string>
  ) {}

  static async open(path: string): Promise<WorkbookArchive> {
    try {
      const info = await stat(path);
      if (!info.isFile()) throw new ArchiveError(`'${path}' is not a file`);
    } catch (err) {
      if (isMissingFile(err)) throw new InputNotFoundError(path);
      if (err instanceof ArchiveError) throw err;
      throw new ArchiveError(`Cannot read '${path}': ${errorDetail(err)}`, { cause: err });
    }
    let bytes: Buffer;
    try {
      bytes = await readFile(path);
    } catch (err) {
      throw new ArchiveError(`Cannot read '${path}': ${errorDetail(err)}`, { cause: err });
    }
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(bytes);
    } catch (err) {
      throw new ArchiveError(`'${path}' is not a valid zip container: ${errorDetail(err)}`, {
        cause: err,
      });
    }
    const stored = readCentralDirectory(bytes)
      .filter((entry) => entry.method === METHOD_STORE)
      .map((entry) => entry.name);
    return new WorkbookArchive(path, bytes, zip, new Set(stored));
  }

  has(name: string): boolean {
    return this.zip.file(name) !== null;
  }

  async readBytes(name: string): Promise<Uint8Array> {
    const entry = this.zip.file(name);
    if (!entry) throw new ArchiveError(`Member '${name}' not found in '${this.path}'`);
    return entry.async("uint8array");
  }

  async readText(name: string): Promise<string> {
    const entry = this.zip.file(name);
    if (!entry) throw new ArchiveError(`Member '${name}' not found in '${this.path}'`);
    return entry.async("string");
  }

  /** Every member in stored order, directories included. */
  members(): ArchiveMember[] {
    return Object.values(this.zip.files).map((entry) => ({
      name: entry.name,
      dir: entry.dir,
      date: entry.date,
      comment: entry.comment ?? "",
      compression: this.stored.has(entry.name) ? "STORE" : "DEFLATE",
    }));
  }
}

import { randomUUID } from "node:crypto";
import { copyFile, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import JSZip from "jszip";
import type { Logger } from "pino";
import { SerializationError } from "../errors";
import type { WorkbookArchive } from "./archive";

export interface RewriteOptions {
  destination: string;
  /** Copy the untouched source here before the destination is replaced. */
  backupPath?: string | null;
  logger?: Logger;
}

function ioFailure(action: string, err: unknown): SerializationError {
  const detail = err instanceof Error ? err.message : String(err);
  return new SerializationError(`${action}: ${detail}`, { cause: err });
}

async function attempt<T>(action: string, op: () => Promise<T>): Promise<T> {
  try {
    return await op();
  } catch (err) {
    throw ioFailure(action, err);
  }
}

/**
 * Write `archive` to `destination` with the given members replaced.
 *
 * The output is loaded from the source bytes, so members that are not
 * replaced keep their compressed data, method, date and comment. The
 * container is written to a temporary file beside the destination and
 * renamed over it; the temporary file never outlives this call.
 */
export async function rewriteArchive(
  archive: WorkbookArchive,
  replacements: ReadonlyMap<string, string>,
  opts: RewriteOptions
): Promise<void> {
  const { destination, backupPath, logger } = opts;
  const out = await JSZip.loadAsync(archive.bytes);
  const pending = new Set(replacements.keys());
  for (const member of archive.members()) {
    if (member.dir) continue;
    const data = replacements.get(member.name);
    if (data === undefined) {
      // Matching the loaded method lets jszip copy the compressed bytes as they are.
      const entry = out.file(member.name);
      if (entry) entry.options.compression = member.compression;
      continue;
    }
    out.file(member.name, data, {
      date: member.date,
      comment: member.comment,
      compression: member.compression,
    });
    pending.delete(member.name);
  }
  if (pending.size) {
    throw new SerializationError(
      `Replacement never applied for member(s): ${[...pending].join(", ")}`
    );
  }
  const buffer = await out.generateAsync({
    type: "nodebuffer",
    compression: "DEFLATE",
  });

  const tempPath = join(
    dirname(destination),
    `.${basename(destination)}.${randomUUID()}.tmp`
  );
  try {
    await attempt(`Cannot write '${destination}'`, () => writeFile(tempPath, buffer));
    if (backupPath) {
      await attempt(`Cannot save backup '${backupPath}'`, () =>
        copyFile(archive.path, backupPath)
      );
      logger?.info({ backupPath }, "backup saved");
    }
    await attempt(`Cannot replace '${destination}'`, () => rename(tempPath, destination));
    logger?.debug({ destination, bytes: buffer.length }, "workbook written");
  } finally {
    await rm(tempPath, { force: true });
  }
}

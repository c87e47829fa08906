/**
 * Reading SVG sources and writing PDF files.
 *
 * Writes go to a temporary sibling that is renamed over the destination,
 * so a failed write never leaves a partial file in its place.
 */

import { existsSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { basename, dirname, join } from "node:path";
import { DestinationWriteError, SourceOpenError } from "#src/errors";

/**
 * @throws {SourceOpenError} if the file cannot be read
 */
export function readSvgFile(path: string): string {
  try {
    return readFileSync(path, "utf8");
  } catch (error) {
    throw new SourceOpenError(path, error);
  }
}

function temporaryPathFor(path: string): string {
  return join(dirname(path), `.${basename(path)}.${process.pid}.tmp`);
}

/**
 * @throws {DestinationWriteError} if the file cannot be written
 */
export function writePdfFile(path: string, bytes: Uint8Array): void {
  const temporary = temporaryPathFor(path);

  try {
    writeFileSync(temporary, bytes);
    renameSync(temporary, path);
  } catch (error) {
    if (existsSync(temporary)) {
      rmSync(temporary, { force: true });
    }

    throw new DestinationWriteError(path, error);
  }
}

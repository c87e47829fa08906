import { mkdirSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DestinationWriteError, SourceOpenError } from "#src/errors";
import { readSvgFile, writePdfFile } from "./files";

describe("files", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "svgpdf-files-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe("readSvgFile", () => {
    it("reads the file as UTF-8", () => {
      const path = join(dir, "in.svg");
      writeFileSync(path, "<svg>é</svg>");

      expect(readSvgFile(path)).toBe("<svg>é</svg>");
    });

    it("wraps a missing file in SourceOpenError", () => {
      const path = join(dir, "missing.svg");

      expect(() => readSvgFile(path)).toThrow(SourceOpenError);
      expect(() => readSvgFile(path)).toThrow(`Error opening SVG source "${path}": ENOENT`);
    });
  });

  describe("writePdfFile", () => {
    it("writes the bytes and leaves no temporary file", () => {
      const path = join(dir, "out.pdf");

      writePdfFile(path, new Uint8Array([0x25, 0x50, 0x44, 0x46]));

      expect(readFileSync(path, "latin1")).toBe("%PDF");
      expect(readdirSync(dir)).toEqual(["out.pdf"]);
    });

    it("replaces an existing file", () => {
      const path = join(dir, "out.pdf");
      writeFileSync(path, "old");

      writePdfFile(path, new Uint8Array([0x6e, 0x65, 0x77]));

      expect(readFileSync(path, "latin1")).toBe("new");
    });

    it("wraps an unwritable destination in DestinationWriteError", () => {
      const path = join(dir, "no-such-dir", "out.pdf");

      expect(() => writePdfFile(path, new Uint8Array(1))).toThrow(DestinationWriteError);
      expect(readdirSync(dir)).toEqual([]);
    });

    it("removes the temporary file when the rename fails", () => {
      const path = join(dir, "taken");
      mkdirSync(path);
      writeFileSync(join(path, "inside.txt"), "kept");

      expect(() => writePdfFile(path, new Uint8Array(1))).toThrow(DestinationWriteError);
      expect(readdirSync(dir)).toEqual(["taken"]);
      expect(readFileSync(join(path, "inside.txt"), "utf8")).toBe("kept");
    });
  });
});

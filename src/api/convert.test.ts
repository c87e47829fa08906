import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DecodeError, InvalidOptionsError, SourceOpenError } from "#src/errors";
import { decodeLatin1, pdfLines, svg } from "#src/test-utils";
import { convertSvg, convertSvgFile } from "./convert";

/**
 * Lines between "stream" and "endstream" of the first content stream.
 */
function contentLines(pdf: string): string[] {
  const lines = pdfLines(pdf);
  const start = lines.indexOf("stream");
  const end = lines.indexOf("endstream");

  return lines.slice(start + 1, end);
}

describe("convertSvg", () => {
  describe("end to end", () => {
    const source = svg(`<rect x="0" y="0" width="100" height="50"/><text x="10" y="10">Hi(there)</text>`, {
      width: "400",
      height: "150",
    });

    it("produces one page with a stroked rectangle and a text object", () => {
      const { document, bytes } = convertSvg(source);
      const pdf = decodeLatin1(bytes);

      expect(document.pageCount).toBe(1);
      expect(pdf).toContain("/Type /Pages\n/Kids [4 0 R]\n/Count 1\n");
      expect(contentLines(pdf)).toEqual([
        "0.00 842.00 m",
        "148.75 842.00 l",
        "148.75 561.33 l",
        "0.00 561.33 l",
        "h",
        "0 0 0 RG",
        "S",
        "BT",
        "/F1 12.00 Tf",
        "785.87 580.13 Td",
        "(Hi\\(there\\)) Tj",
        "ET",
      ]);
    });

    it("writes exactly 8 cross-reference entries with valid offsets", () => {
      const { bytes } = convertSvg(source);
      const pdf = decodeLatin1(bytes);
      const lines = pdfLines(pdf);
      const xrefLine = lines.indexOf("xref");

      expect(lines[xrefLine + 1]).toBe("0 8");
      expect(pdf).toContain("/Size 8\n");

      const entries = lines.slice(xrefLine + 2, xrefLine + 10);
      expect(entries[0]).toBe("0000000000 65535 f");

      entries.slice(1).forEach((entry, index) => {
        const offset = Number(entry.slice(0, 10));

        expect(entry.endsWith(" 00000 n")).toBe(true);
        expect(pdf.slice(offset).startsWith(`${index + 1} 0 obj\n`)).toBe(true);
      });

      expect(lines[xrefLine + 10]).toBe("trailer");
    });

    it("points startxref at the xref keyword", () => {
      const pdf = decodeLatin1(convertSvg(source).bytes);
      const lines = pdfLines(pdf);
      const startxref = Number(lines[lines.indexOf("startxref") + 1]);

      expect(pdf.slice(startxref).startsWith("xref\n0 8\n")).toBe(true);
      expect(pdf.endsWith("%%EOF\n")).toBe(true);
    });

    it("declares the content stream length", () => {
      const pdf = decodeLatin1(convertSvg(source).bytes);
      const length = contentLines(pdf).join("\n").length;

      expect(pdf).toContain(`5 0 obj\n<<\n/Length ${length}\n>>\nstream\n`);
    });
  });

  describe("scaling", () => {
    it("uses the 400×150 default when no dimensions are declared", () => {
      const { document, warnings } = convertSvg(svg(""));

      expect(document.scale.scaleX).toBe(595 / 400);
      expect(document.scale.scaleY).toBe(842 / 150);
      expect(warnings).toEqual([]);
    });

    it("uses declared dimensions", () => {
      const { document } = convertSvg(svg("", { width: "595", height: "421" }));

      expect(document.scale).toEqual({ scaleX: 1, scaleY: 2 });
    });

    it("falls back for both dimensions when one is not numeric", () => {
      const { document, warnings } = convertSvg(svg("", { width: "100%", height: "421" }));

      expect(document.scale).toEqual({ scaleX: 595 / 400, scaleY: 842 / 150 });
      expect(warnings).toEqual([
        'SVG size width="100%" height="421" is not a pair of positive numbers; using 400×150',
      ]);
    });

    it("falls back for both dimensions when only the width is declared", () => {
      const { document, warnings } = convertSvg(svg("", { width: "800" }));

      expect(document.scale).toEqual({ scaleX: 595 / 400, scaleY: 842 / 150 });
      expect(warnings).toEqual([
        'SVG size width="800" is not a pair of positive numbers; using 400×150',
      ]);
    });
  });

  it("emits gradients, then rectangles, then text", () => {
    const { bytes } = convertSvg(
      svg(
        `<text x="1" y="1">t</text><rect x="1" y="1" width="1" height="1"/>` +
          `<path d="M0 0"/><linearGradient id="g"><stop offset="0" stop-color="red"/></linearGradient>`,
      ),
    );
    const lines = contentLines(decodeLatin1(bytes));

    expect(lines[0]).toBe("100.00 100.00 200.00 50.00 re");
    expect(lines[3]?.endsWith(" m")).toBe(true);
    expect(lines[10]).toBe("BT");
    expect(lines).toHaveLength(15);
  });

  it("keeps huge coordinates in plain decimal notation", () => {
    const lines = contentLines(decodeLatin1(convertSvg(svg(`<rect x="1e30" width="1" height="1"/>`)).bytes));

    expect(lines[0]).toMatch(/^\d{31}\.00 842\.00 m$/);
  });

  it("uses the configured font size and title", () => {
    const pdf = decodeLatin1(
      convertSvg(svg(`<text>x</text>`), { fontSize: 20, title: "Floor (2)" }).bytes,
    );

    expect(pdf).toContain("/F1 20.00 Tf\n");
    expect(pdf).toContain("/Title (Floor \\(2\\))\n");
  });

  it("reports warnings from every stage", () => {
    const onWarning = vi.fn();

    const { warnings } = convertSvg(svg(`<circle/><linearGradient id="bare"/>`), {
      fontName: "Courier",
      onWarning,
    });

    expect(warnings).toEqual([
      "Ignoring unsupported element <circle>",
      'Font "Courier" is not embedded; text is drawn in Helvetica',
      'Gradient "bare" has no stops',
    ]);
    expect(onWarning.mock.calls.map(([message]) => message)).toEqual(warnings);
  });

  it("rejects malformed SVG", () => {
    expect(() => convertSvg(`<svg width="1><rect/></svg>`)).toThrow(DecodeError);
    expect(() => convertSvg(`<svg><text x="1">a</svg>`)).toThrow(DecodeError);
  });

  it("converts an svg root without a namespace", () => {
    const { bytes } = convertSvg(`<svg width="400" height="150"><rect width="100" height="50"/></svg>`);

    expect(contentLines(decodeLatin1(bytes))[0]).toBe("0.00 842.00 m");
  });

  it("validates options before decoding", () => {
    expect(() => convertSvg("not xml", { columns: 0 })).toThrow(InvalidOptionsError);
  });
});

describe("convertSvgFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "svgpdf-convert-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes the converted PDF", () => {
    const svgPath = join(dir, "in.svg");
    const pdfPath = join(dir, "out.pdf");
    writeFileSync(svgPath, svg(`<rect width="10" height="10"/>`));

    const result = convertSvgFile(svgPath, pdfPath);

    expect(new Uint8Array(readFileSync(pdfPath))).toEqual(result.bytes);
  });

  it("fails with SourceOpenError and writes nothing when the source is missing", () => {
    const pdfPath = join(dir, "out.pdf");

    expect(() => convertSvgFile(join(dir, "missing.svg"), pdfPath)).toThrow(SourceOpenError);
    expect(existsSync(pdfPath)).toBe(false);
  });

  it("keeps an existing PDF when decoding fails", () => {
    const svgPath = join(dir, "bad.svg");
    const pdfPath = join(dir, "out.pdf");
    writeFileSync(svgPath, "<html/>");
    writeFileSync(pdfPath, "previous");

    expect(() => convertSvgFile(svgPath, pdfPath)).toThrow(DecodeError);
    expect(readFileSync(pdfPath, "utf8")).toBe("previous");
  });
});

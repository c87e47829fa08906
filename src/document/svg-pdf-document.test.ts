import { describe, expect, it, vi } from "vitest";
import { DocumentFinalizedError, NoActivePageError } from "#src/errors";
import { decodeLatin1 } from "#src/test-utils";
import { type DocumentOptions, SvgPdfDocument } from "./svg-pdf-document";

function createDocument(overrides: Partial<DocumentOptions> = {}) {
  return new SvgPdfDocument({ columns: 3, rows: 10, fontName: "Helvetica", fontSize: 12, ...overrides });
}

describe("SvgPdfDocument", () => {
  describe("state", () => {
    it("moves from empty to has-pages to finalized", () => {
      const doc = createDocument();

      expect(doc.state).toBe("empty");

      doc.addPage();
      expect(doc.state).toBe("has-pages");

      doc.addPage();
      expect(doc.pageCount).toBe(2);
      expect(doc.pages.map(p => p.number)).toEqual([1, 2]);

      doc.finalize();
      expect(doc.state).toBe("finalized");
    });

    it("rejects drawing before any page exists", () => {
      const doc = createDocument();

      expect(() => doc.drawRectangle({ x: 0, y: 0, width: 1, height: 1 })).toThrow(NoActivePageError);
      expect(() => doc.drawText({ x: 0, y: 0, content: "a" })).toThrow(NoActivePageError);
      expect(() => doc.drawGradient({ x1: 0, y1: 0, x2: 0, y2: 0, stops: [] })).toThrow(
        NoActivePageError,
      );
      expect(() => doc.drawPath({ d: "M0 0" })).toThrow(
        "Cannot draw a path: the document has no page yet (call addPage() first)",
      );
    });

    it("rejects changes after finalize", () => {
      const doc = createDocument();

      doc.addPage();
      doc.finalize();

      expect(() => doc.addPage()).toThrow(DocumentFinalizedError);
      expect(() => doc.drawRectangle({ x: 0, y: 0, width: 1, height: 1 })).toThrow(
        "Cannot draw a rectangle: the document has been finalized",
      );
      expect(() => doc.setSvgSize({ width: 1, height: 1 })).toThrow(DocumentFinalizedError);
    });

    it("finalizes on save", () => {
      const doc = createDocument();

      doc.addPage();
      doc.save();

      expect(doc.state).toBe("finalized");
    });
  });

  describe("scale", () => {
    it("defaults to the 400×150 canvas", () => {
      expect(createDocument().scale).toEqual({ scaleX: 595 / 400, scaleY: 842 / 150 });
    });

    it("follows setSvgSize", () => {
      const doc = createDocument();

      doc.setSvgSize({ width: 595, height: 421 });

      expect(doc.scale).toEqual({ scaleX: 1, scaleY: 2 });
    });
  });

  describe("drawing", () => {
    it("strokes rectangles at their scaled, flipped position", () => {
      const doc = createDocument();
      const page = doc.addPage();

      doc.setSvgSize({ width: 595, height: 421 });
      doc.drawRectangle({ x: 10, y: 20, width: 30, height: 40, stroke: "red" });

      expect(page.lines).toEqual([
        "10.00 802.00 m",
        "40.00 802.00 l",
        "40.00 722.00 l",
        "10.00 722.00 l",
        "h",
        "0 0 0 RG",
        "S",
      ]);
    });

    it("rotates text anchors and uses the document font size", () => {
      const doc = createDocument({ fontSize: 9.5 });
      const page = doc.addPage();

      doc.setSvgSize({ width: 595, height: 421 });
      doc.drawText({ x: 100, y: 21, content: "a(b)" });

      // (100, 842 - 42) rotated: (800, 595 - 100)
      expect(page.lines).toEqual(["BT", "/F1 9.50 Tf", "800.00 495.00 Td", "(a\\(b\\)) Tj", "ET"]);
    });

    it("marks gradients with the placeholder box", () => {
      const doc = createDocument();
      const page = doc.addPage();

      doc.drawGradient({ id: "g", x1: 0, y1: 0, x2: 1, y2: 1, stops: [{ color: "#f00" }] });

      expect(page.lines).toEqual(["100.00 100.00 200.00 50.00 re", "0 0 1 RG", "S"]);
    });

    it("emits nothing for paths", () => {
      const doc = createDocument();
      const page = doc.addPage();

      doc.drawPath({ d: "M 0 0 L 10 10" });

      expect(page.lines).toEqual([]);
    });

    it("draws on the most recently added page", () => {
      const doc = createDocument();
      const first = doc.addPage();
      const second = doc.addPage();

      doc.drawGradient({ x1: 0, y1: 0, x2: 0, y2: 0, stops: [] });

      expect(first.lines).toEqual([]);
      expect(second.lines).toHaveLength(3);
    });
  });

  describe("layout cursor", () => {
    it("advances for rectangles and text but not for gradients or paths", () => {
      const doc = createDocument();

      doc.addPage();
      doc.drawRectangle({ x: 0, y: 0, width: 1, height: 1 });
      doc.drawGradient({ x1: 0, y1: 0, x2: 0, y2: 0, stops: [{}] });
      doc.drawPath({ d: "" });
      doc.drawText({ x: 0, y: 0, content: "t" });

      expect(doc.cursor.position).toEqual({ x: 300, y: 0 });
    });

    it("does not change drawing coordinates", () => {
      const doc = createDocument();
      const page = doc.addPage();
      const rect = { x: 0, y: 0, width: 100, height: 50 };

      doc.drawRectangle(rect);
      doc.drawRectangle(rect);
      doc.drawRectangle(rect);

      const firstRun = page.lines.slice(0, 7);

      expect(page.lines.slice(7, 14)).toEqual(firstRun);
      expect(page.lines.slice(14, 21)).toEqual(firstRun);
    });

    it("warns once when elements overflow the grid", () => {
      const onWarning = vi.fn();
      const doc = createDocument({ columns: 1, rows: 1, onWarning });

      doc.addPage();
      for (let i = 0; i < 4; i++) {
        doc.drawText({ x: 0, y: 0, content: "t" });
      }

      expect(onWarning).toHaveBeenCalledTimes(1);
      expect(doc.warnings).toEqual([
        "Layout grid of 1×1 cells is full; later elements are placed outside it",
      ]);
    });
  });

  describe("warnings", () => {
    it("reports a font that will not be used", () => {
      const doc = createDocument({ fontName: "Courier" });

      expect(doc.warnings).toEqual(['Font "Courier" is not embedded; text is drawn in Helvetica']);
    });

    it("reports gradients without stops", () => {
      const doc = createDocument();

      doc.addPage();
      doc.drawGradient({ id: "empty", x1: 0, y1: 0, x2: 0, y2: 0, stops: [] });
      doc.drawGradient({ x1: 0, y1: 0, x2: 0, y2: 0, stops: [] });

      expect(doc.warnings).toEqual(['Gradient "empty" has no stops', "Gradient has no stops"]);
    });
  });

  describe("save", () => {
    it("returns the same bytes when saved twice", () => {
      const doc = createDocument({ title: "Twice" });

      doc.addPage();
      doc.drawText({ x: 1, y: 2, content: "x" });

      expect(doc.save()).toEqual(doc.save());
    });

    it("writes one page object per page", () => {
      const doc = createDocument();

      doc.addPage();
      doc.addPage();

      const text = decodeLatin1(doc.save());

      expect(text).toContain("/Kids [4 0 R 6 0 R]\n/Count 2\n");
      expect(text).toContain("4 0 obj\n<<\n/Type /Page\n");
      expect(text).toContain("6 0 obj\n<<\n/Type /Page\n");
      expect(text).toContain("5 0 obj\n<<\n/Length 0\n>>\nstream\n\nendstream\n");
    });
  });
});

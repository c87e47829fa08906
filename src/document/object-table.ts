/**
 * Object table for a complete document.
 *
 * Numbering is decided in one place: `planObjectRoles` lists every object
 * in emission order, each role takes the next number from 1, and all
 * cross-references are resolved from that table. For N pages:
 *
 * ```
 * 1          Catalog
 * 2          Pages root
 * 3          Font
 * 4 + 2i     Page i
 * 5 + 2i     Contents of page i
 * 4 + 2N     Outlines
 * 5 + 2N     Info
 * ```
 *
 * The cross-reference table therefore has exactly 5 + 2N + 1 entries,
 * counting the free-list head.
 */

import type { PageSize } from "#src/helpers/page-size";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import type { PdfObject } from "#src/objects/pdf-object";
import { PdfRef } from "#src/objects/pdf-ref";
import { PdfStream } from "#src/objects/pdf-stream";
import { PdfString } from "#src/objects/pdf-string";

export type ObjectRole =
  | { kind: "catalog" }
  | { kind: "pages" }
  | { kind: "font" }
  | { kind: "page"; pageIndex: number }
  | { kind: "contents"; pageIndex: number }
  | { kind: "outlines" }
  | { kind: "info" };

export interface ObjectTableEntry {
  ref: PdfRef;
  role: ObjectRole;
  object: PdfObject;
}

export interface ObjectTable {
  /** Entries in emission order; entry i has object number i + 1 */
  entries: ObjectTableEntry[];
  root: PdfRef;
  info: PdfRef;
  /** Cross-reference size: highest object number + 1 */
  size: number;
}

export interface ObjectTableInput {
  pageSize: PageSize;
  /** Serialized content stream of each page, in page order */
  contents: readonly Uint8Array[];
  /** Resource name text operators select the font by, e.g. "F1" */
  fontResourceName: string;
  /** Standard 14 font the resource maps to */
  baseFont: string;
  producer: string;
  title?: string;
}

function roleKey(role: ObjectRole): string {
  return role.kind === "page" || role.kind === "contents"
    ? `${role.kind}:${role.pageIndex}`
    : role.kind;
}

/**
 * Every object of an N-page document, in emission order.
 */
export function planObjectRoles(pageCount: number): ObjectRole[] {
  const roles: ObjectRole[] = [{ kind: "catalog" }, { kind: "pages" }, { kind: "font" }];

  for (let pageIndex = 0; pageIndex < pageCount; pageIndex++) {
    roles.push({ kind: "page", pageIndex }, { kind: "contents", pageIndex });
  }

  roles.push({ kind: "outlines" }, { kind: "info" });

  return roles;
}

/**
 * Sequential object numbers for a planned list of roles.
 */
export class ObjectNumbering {
  private readonly refs = new Map<string, PdfRef>();

  constructor(readonly roles: readonly ObjectRole[]) {
    roles.forEach((role, index) => {
      this.refs.set(roleKey(role), PdfRef.of(index + 1));
    });
  }

  /**
   * @throws {Error} if the role was not planned
   */
  refOf(role: ObjectRole): PdfRef {
    const ref = this.refs.get(roleKey(role));

    if (!ref) {
      throw new Error(`No object planned for ${roleKey(role)}`);
    }

    return ref;
  }

  get size(): number {
    return this.roles.length + 1;
  }
}

function buildObject(role: ObjectRole, input: ObjectTableInput, numbering: ObjectNumbering): PdfObject {
  const fontRef = numbering.refOf({ kind: "font" });

  switch (role.kind) {
    case "catalog":
      return PdfDict.of({
        Type: PdfName.Catalog,
        Pages: numbering.refOf({ kind: "pages" }),
        Outlines: numbering.refOf({ kind: "outlines" }),
      });

    case "pages":
      return PdfDict.of({
        Type: PdfName.Pages,
        Kids: new PdfArray(
          input.contents.map((_, pageIndex) => numbering.refOf({ kind: "page", pageIndex })),
        ),
        Count: PdfNumber.of(input.contents.length),
      });

    case "font":
      return PdfDict.of({
        Type: PdfName.Font,
        Subtype: PdfName.of("Type1"),
        BaseFont: PdfName.of(input.baseFont),
        Name: PdfName.of(input.fontResourceName),
      });

    case "page":
      return PdfDict.of({
        Type: PdfName.Page,
        Parent: numbering.refOf({ kind: "pages" }),
        MediaBox: PdfArray.of(
          PdfNumber.of(0),
          PdfNumber.of(0),
          PdfNumber.of(input.pageSize.width),
          PdfNumber.of(input.pageSize.height),
        ),
        Resources: PdfDict.of({
          Font: new PdfDict([[input.fontResourceName, fontRef]]),
        }),
        Contents: numbering.refOf({ kind: "contents", pageIndex: role.pageIndex }),
      });

    case "contents": {
      const data = input.contents[role.pageIndex];

      if (!data) {
        throw new Error(`No content for page ${role.pageIndex + 1}`);
      }

      return new PdfStream([], data);
    }

    case "outlines":
      return PdfDict.of({
        Type: PdfName.Outlines,
        Count: PdfNumber.of(0),
      });

    case "info": {
      const info = PdfDict.of({ Producer: PdfString.fromString(input.producer) });

      if (input.title !== undefined) {
        info.set("Title", PdfString.fromString(input.title));
      }

      return info;
    }
  }
}

/**
 * Build the full object table: plan, number, then construct each object
 * with its references resolved through the numbering.
 */
export function buildObjectTable(input: ObjectTableInput): ObjectTable {
  const numbering = new ObjectNumbering(planObjectRoles(input.contents.length));

  const entries = numbering.roles.map(role => ({
    ref: numbering.refOf(role),
    role,
    object: buildObject(role, input, numbering),
  }));

  return {
    entries,
    root: numbering.refOf({ kind: "catalog" }),
    info: numbering.refOf({ kind: "info" }),
    size: numbering.size,
  };
}

import { sha256 } from "@noble/hashes/sha2.js";
import { bytesToHex } from "@noble/hashes/utils.js";
import { describe, expect, it } from "vitest";
import { PdfRef } from "#src/objects/pdf-ref";
import { MalformedDocumentError } from "#src/parser/errors";
import { buildPdf } from "#src/test-utils";
import { CyclicPageTreeError, DanglingReferenceError, PageIndexOutOfRangeError } from "./errors";
import { parsePdf } from "./pdf-document";

const CATALOG = "<< /Type /Catalog /Pages 2 0 R >>";

describe("PdfDocument", () => {
  it("computes the fingerprint from the bytes", async () => {
    const bytes = buildPdf([CATALOG, "<< /Type /Pages /Kids [] /Count 0 >>"]);
    const doc = await parsePdf(bytes);

    expect(doc.fingerprint).toBe(bytesToHex(sha256(bytes)));
    expect(doc.fingerprint).toHaveLength(64);
  });

  describe("resolve()", () => {
    it("follows one indirection", async () => {
      const doc = await parsePdf(buildPdf([CATALOG, "<< /Type /Pages /Kids [] /Count 0 >>"]));

      expect(doc.resolve(PdfRef.of(1, 0))).toBe(doc.catalog);
    });

    it("throws for an absent object", async () => {
      const doc = await parsePdf(buildPdf([CATALOG, "<< /Type /Pages /Kids [] /Count 0 >>"]));

      expect(() => doc.resolve(PdfRef.of(40, 0))).toThrow(DanglingReferenceError);
      expect(() => doc.resolve(PdfRef.of(40, 0))).toThrow("Dangling reference: 40 0 R");
    });
  });

  describe("deref()", () => {
    it("follows chains of references", async () => {
      const doc = await parsePdf(
        buildPdf([CATALOG, "<< /Type /Pages /Kids [] /Count 0 >>", "4 0 R", "42"]),
      );

      expect(doc.deref(PdfRef.of(3, 0))).toMatchObject({ type: "number", value: 42 });
    });

    it("returns null for a reference cycle", async () => {
      const doc = await parsePdf(
        buildPdf([CATALOG, "<< /Type /Pages /Kids [] /Count 0 >>", "4 0 R", "3 0 R"]),
      );

      expect(doc.deref(PdfRef.of(3, 0))).toBeNull();
    });
  });

  describe("page tree", () => {
    it("counts leaves across nested nodes", async () => {
      const doc = await parsePdf(
        buildPdf([
          CATALOG,
          "<< /Type /Pages /Kids [3 0 R 4 0 R] /Count 3 >>",
          "<< /Type /Pages /Parent 2 0 R /Kids [5 0 R 6 0 R] /Count 2 >>",
          "<< /Type /Page /Parent 2 0 R /MediaBox [0 0 30 30] >>",
          "<< /Type /Page /Parent 3 0 R /MediaBox [0 0 10 10] >>",
          "<< /Type /Page /Parent 3 0 R /MediaBox [0 0 20 20] >>",
        ]),
      );

      expect(doc.pageCount).toBe(3);
      expect([0, 1, 2].map(i => doc.page(i).mediaBox.x1)).toEqual([10, 20, 30]);
    });

    it("accepts direct kids and nodes without /Type", async () => {
      const doc = await parsePdf(
        buildPdf([
          CATALOG,
          "<< /Kids [<< /Kids [3 0 R] >> << /MediaBox [0 0 5 5] >>] >>",
          "<< /Type /Page /MediaBox [0 0 7 7] >>",
        ]),
      );

      expect(doc.pageCount).toBe(2);
      expect(doc.page(0).mediaBox.x1).toBe(7);
      expect(doc.page(1).mediaBox.x1).toBe(5);
    });

    it("detects cycles", async () => {
      const bytes = buildPdf([
        CATALOG,
        "<< /Type /Pages /Kids [3 0 R] /Count 1 >>",
        "<< /Type /Pages /Kids [2 0 R] /Count 1 >>",
      ]);

      await expect(parsePdf(bytes)).rejects.toThrow(CyclicPageTreeError);
    });

    it("allows the same page twice in separate branches", async () => {
      const doc = await parsePdf(
        buildPdf([CATALOG, "<< /Type /Pages /Kids [3 0 R 3 0 R] /Count 2 >>", "<< /Type /Page >>"]),
      );

      expect(doc.pageCount).toBe(2);
    });

    it("rejects out-of-range indices", async () => {
      const doc = await parsePdf(
        buildPdf([CATALOG, "<< /Type /Pages /Kids [3 0 R] /Count 1 >>", "<< /Type /Page >>"]),
      );

      expect(() => doc.page(1)).toThrow(PageIndexOutOfRangeError);
      expect(() => doc.page(-1)).toThrow("Page index -1 is out of range (document has 1 pages)");
      expect(() => doc.page(0.5)).toThrow(PageIndexOutOfRangeError);
    });

    it("returns the same page object for repeated lookups", async () => {
      const doc = await parsePdf(
        buildPdf([CATALOG, "<< /Type /Pages /Kids [3 0 R] /Count 1 >>", "<< /Type /Page >>"]),
      );

      expect(doc.page(0)).toBe(doc.page(0));
    });
  });

  it("reads document information", async () => {
    const doc = await parsePdf(
      buildPdf(
        [
          CATALOG,
          "<< /Type /Pages /Kids [] /Count 0 >>",
          "<< /Title (Quarterly report) /Author <FEFF00C9006D0069006C0065> >>",
        ],
        { trailer: "/Info 3 0 R" },
      ),
    );

    expect(doc.info).toEqual({ title: "Quarterly report", author: "Émile" });
  });

  it("surfaces unrecoverable files as MalformedDocumentError", async () => {
    await expect(parsePdf(new Uint8Array([1, 2, 3]))).rejects.toThrow(MalformedDocumentError);
  });
});

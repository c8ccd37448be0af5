import { describe, expect, it } from "vitest";
import { DocumentError } from "#src/document/errors";
import { buildPdf, buildSinglePagePdf, pixelAt } from "#src/test-utils";
import { ConfigError } from "./errors";
import { PdfRenderer } from "./pdf-renderer";

describe("PdfRenderer", () => {
  it("opens a document and renders its pages", async () => {
    const renderer = new PdfRenderer();
    const handle = await renderer.open(buildSinglePagePdf("1 0 0 rg 10 10 100 100 re f"));
    const { target } = await renderer.renderPage(handle, 0, 0.5);

    expect(renderer.pageCount(handle)).toBe(1);
    expect(target.width).toBe(100);
    expect(pixelAt(target, 25, 75)).toEqual([255, 0, 0, 255]);
  });

  it("reports page sizes after rotation", async () => {
    const renderer = new PdfRenderer();
    const handle = await renderer.open(
      buildSinglePagePdf("", { width: 300, height: 200, pageEntries: "/Rotate 90" }),
    );

    expect(renderer.pageSize(handle, 0)).toEqual({ width: 200, height: 300 });
  });

  it("reads document metadata", async () => {
    const renderer = new PdfRenderer();
    const handle = await renderer.open(
      buildPdf(
        [
          "<< /Type /Catalog /Pages 2 0 R >>",
          "<< /Type /Pages /Kids [3 0 R] /Count 1 >>",
          "<< /Type /Page /Parent 2 0 R >>",
          "<< /Title (Quarterly report) /Author (Test Author) >>",
        ],
        { trailer: "/Info 4 0 R" },
      ),
    );

    expect(renderer.metadata(handle)).toEqual({ title: "Quarterly report", author: "Test Author" });
  });

  it("keeps documents apart", async () => {
    const renderer = new PdfRenderer();
    const red = await renderer.open(buildSinglePagePdf("1 0 0 rg 0 0 200 200 re f"));
    const blue = await renderer.open(buildSinglePagePdf("0 0 1 rg 0 0 200 200 re f"));

    expect(red.id).not.toBe(blue.id);
    const redPage = await renderer.renderPage(red, 0, 0.1);
    const bluePage = await renderer.renderPage(blue, 0, 0.1);

    expect(pixelAt(redPage.target, 0, 0)).toEqual([255, 0, 0, 255]);
    expect(pixelAt(bluePage.target, 0, 0)).toEqual([0, 0, 255, 255]);
  });

  it("refuses closed handles", async () => {
    const renderer = new PdfRenderer();
    const handle = await renderer.open(buildSinglePagePdf(""));

    renderer.close(handle);
    renderer.close(handle);

    expect(() => renderer.pageCount(handle)).toThrow(DocumentError);
    expect(() => renderer.pageCount(handle)).toThrow(
      `Unknown or closed document handle ${handle.id}`,
    );
  });

  it("refuses a handle whose fingerprint does not match", async () => {
    const renderer = new PdfRenderer();
    const handle = await renderer.open(buildSinglePagePdf(""));

    expect(() => renderer.pageCount({ ...handle, fingerprint: "other" })).toThrow(DocumentError);
  });

  it("validates its options up front", () => {
    expect(() => new PdfRenderer({ cacheSize: 1.5 })).toThrow(ConfigError);
  });
});

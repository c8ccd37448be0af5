import { describe, expect, it } from "vitest";
import { PdfDict } from "#src/objects/pdf-dict";
import { buildPdf } from "#src/test-utils";
import { UndefinedResourceError } from "./errors";
import { parsePdf } from "./pdf-document";
import { ResourceScope, resource } from "./resources";

async function pageWith(pageResources: string, parentResources: string) {
  const doc = await parsePdf(
    buildPdf([
      "<< /Type /Catalog /Pages 2 0 R >>",
      `<< /Type /Pages /Kids [3 0 R] /Count 1 /Resources ${parentResources} >>`,
      `<< /Type /Page /Parent 2 0 R /Resources ${pageResources} >>`,
      "<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>",
      "<< /Type /Font /Subtype /Type1 /BaseFont /Courier >>",
    ]),
  );

  return doc.page(0);
}

function baseFont(value: unknown): string | undefined {
  return value instanceof PdfDict ? value.getName("BaseFont")?.value : undefined;
}

describe("resource()", () => {
  it("resolves a name from the page's own resources", async () => {
    const page = await pageWith("<< /Font << /F1 4 0 R >> >>", "<< >>");

    expect(baseFont(resource(page, "Font", "F1"))).toBe("Helvetica");
  });

  it("inherits a category the page does not define", async () => {
    const page = await pageWith("<< /XObject << >> >>", "<< /Font << /F1 5 0 R >> >>");

    expect(baseFont(resource(page, "Font", "F1"))).toBe("Courier");
  });

  it("takes the nearest dictionary per category", async () => {
    const page = await pageWith("<< /Font << /F1 4 0 R >> >>", "<< /Font << /F1 5 0 R /F2 5 0 R >> >>");

    expect(baseFont(resource(page, "Font", "F1"))).toBe("Helvetica");
    expect(() => resource(page, "Font", "F2")).toThrow(UndefinedResourceError);
  });

  it("throws for an undefined name", async () => {
    const page = await pageWith("<< >>", "<< >>");

    expect(() => resource(page, "XObject", "Im0")).toThrow("Undefined XObject resource /Im0");
  });
});

describe("ResourceScope", () => {
  it("lets form resources shadow the page", async () => {
    const page = await pageWith("<< /Font << /F1 4 0 R >> >>", "<< >>");
    const form = PdfDict.of({ Font: PdfDict.of({}) });
    const scope = ResourceScope.forPage(page).enter(form);

    expect(scope.find("Font", "F1")).toBeUndefined();
    expect(baseFont(ResourceScope.forPage(page).find("Font", "F1"))).toBe("Helvetica");
  });

  it("falls back to the page for categories the form lacks", async () => {
    const page = await pageWith("<< /Font << /F1 4 0 R >> >>", "<< >>");
    const scope = ResourceScope.forPage(page).enter(PdfDict.of({ XObject: PdfDict.of({}) }));

    expect(baseFont(scope.get("Font", "F1"))).toBe("Helvetica");
  });

  it("returns the same scope without form resources", async () => {
    const page = await pageWith("<< >>", "<< >>");
    const scope = ResourceScope.forPage(page);

    expect(scope.enter(undefined)).toBe(scope);
  });
});

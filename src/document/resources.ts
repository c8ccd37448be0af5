import type { RefResolver } from "#src/objects/pdf-ref";
import type { PdfDict } from "#src/objects/pdf-dict";
import type { PdfObject } from "#src/objects/pdf-object";
import { UndefinedResourceError } from "./errors";
import type { PdfPage } from "./pdf-page";

export type ResourceCategory =
  | "Font"
  | "XObject"
  | "ExtGState"
  | "ColorSpace"
  | "Pattern"
  | "Shading"
  | "Properties";

/**
 * Name lookup over a chain of resource dictionaries.
 *
 * For each category the nearest dictionary that defines that category
 * wins outright; a name missing from it is undefined even if a more
 * distant dictionary has it. Form XObjects push their own /Resources on
 * top with {@link ResourceScope.enter}.
 */
export class ResourceScope {
  constructor(
    private readonly chain: readonly PdfDict[],
    private readonly resolver: RefResolver,
  ) {}

  static forPage(page: PdfPage): ResourceScope {
    return new ResourceScope(page.resourceChain, page.document.resolver);
  }

  /**
   * Scope for a form XObject or Type3 glyph with its own /Resources.
   * Without one, the enclosing scope is returned unchanged.
   */
  enter(resources: PdfDict | undefined): ResourceScope {
    return resources ? new ResourceScope([resources, ...this.chain], this.resolver) : this;
  }

  /**
   * Resolved resource, or undefined when the name is not defined.
   */
  find(category: ResourceCategory, name: string): PdfObject | undefined {
    for (const resources of this.chain) {
      const dict = resources.getDict(category, this.resolver);

      if (dict) {
        const value = dict.get(name, this.resolver);

        return value === undefined || value.type === "null" ? undefined : value;
      }
    }

    return undefined;
  }

  /**
   * @throws {UndefinedResourceError} when the name is not defined
   */
  get(category: ResourceCategory, name: string): PdfObject {
    const value = this.find(category, name);

    if (value === undefined) {
      throw new UndefinedResourceError(category, name);
    }

    return value;
  }
}

/**
 * Look up a named resource for a page, honouring inheritance.
 *
 * @throws {UndefinedResourceError} when the name is not defined
 */
export function resource(page: PdfPage, category: ResourceCategory, name: string): PdfObject {
  return ResourceScope.forPage(page).get(category, name);
}

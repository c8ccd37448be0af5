/**
 * Substitute fonts for fonts a PDF does not embed.
 *
 * A font directory holds a `fonts.json` manifest mapping PDF base-font
 * names to font files beside it. Names without an entry use the `Arial`
 * entry.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { ConfigError } from "#src/api/errors";
import { type FontManifest, FontManifestSchema, parseConfig } from "#src/api/schemas";
import { parseFontProgram } from "./embedded-parser";
import type { FontProgram } from "./font-program";
import { stripSubsetTag } from "./standard-14";

const FALLBACK_ENTRY = "Arial";

export type FontFileReader = (fileName: string) => Promise<Uint8Array>;

export class FontDirectory {
  /** Parsed programs by file name; failures are cached as null */
  private readonly programs = new Map<string, Promise<FontProgram | null>>();

  constructor(
    private readonly manifest: FontManifest,
    private readonly readFontFile: FontFileReader,
  ) {}

  /**
   * Open a directory and validate its manifest.
   *
   * @throws {ConfigError} when `fonts.json` is missing, not JSON, or not a
   * map of names to file names
   */
  static async open(directory: string): Promise<FontDirectory> {
    const manifestPath = join(directory, "fonts.json");
    let text: string;

    try {
      text = await readFile(manifestPath, "utf8");
    } catch (error) {
      throw new ConfigError(`Cannot read ${manifestPath}: ${error instanceof Error ? error.message : String(error)}`);
    }

    let json: unknown;

    try {
      json = JSON.parse(text);
    } catch {
      throw new ConfigError(`${manifestPath} is not valid JSON`);
    }

    const manifest = parseConfig(FontManifestSchema, json, "font manifest");

    return new FontDirectory(manifest, async fileName => new Uint8Array(await readFile(join(directory, fileName))));
  }

  /**
   * File that stands in for a base font, or undefined when neither the
   * name nor the fallback entry is listed.
   */
  fileFor(baseFont: string): string | undefined {
    const name = stripSubsetTag(baseFont);

    return this.entry(name) ?? this.entry(baseFont) ?? this.entry(FALLBACK_ENTRY);
  }

  private entry(name: string): string | undefined {
    return Object.hasOwn(this.manifest, name) ? this.manifest[name] : undefined;
  }

  /**
   * Parsed substitute program. Unreadable or malformed files are logged
   * and give null, and each file is loaded once.
   */
  substitute(baseFont: string): Promise<FontProgram | null> {
    const fileName = this.fileFor(baseFont);

    if (fileName === undefined) {
      return Promise.resolve(null);
    }

    let program = this.programs.get(fileName);

    if (!program) {
      program = this.load(fileName);
      this.programs.set(fileName, program);
    }

    return program;
  }

  private async load(fileName: string): Promise<FontProgram | null> {
    try {
      return parseFontProgram(await this.readFontFile(fileName));
    } catch (e) {
      console.warn(`Failed to load substitute font ${fileName}:`, e);

      return null;
    }
  }
}

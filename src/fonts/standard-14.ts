/**
 * Metrics for the standard 14 fonts, used for non-embedded fonts without
 * a /Widths array.
 */

import metrics from "./data/standard-14-metrics.json";

export interface StandardMetrics {
  /** Canonical standard-14 name */
  name: string;
  ascent: number;
  descent: number;
  missingWidth: number;
  /** Width of a named glyph in 1/1000 em */
  width(glyphName: string): number;
}

interface MetricsEntry {
  ascent: number;
  descent: number;
  missingWidth: number;
  widths: Record<string, number>;
}

const FONTS: Record<string, MetricsEntry> = metrics.fonts;
const ALIASES: Record<string, string> = metrics.aliases;

/** Common names for the standard fonts, after style suffixes are removed */
const FAMILY_ALIASES: Record<string, string> = {
  Arial: "Helvetica",
  ArialMT: "Helvetica",
  Helvetica: "Helvetica",
  TimesNewRoman: "Times",
  TimesNewRomanPS: "Times",
  TimesNewRomanPSMT: "Times",
  Times: "Times",
  CourierNew: "Courier",
  CourierNewPS: "Courier",
  CourierNewPSMT: "Courier",
  Courier: "Courier",
  Symbol: "Symbol",
  SymbolMT: "Symbol",
  ZapfDingbats: "ZapfDingbats",
};

/**
 * Strip a subset tag (`ABCDEF+Name`).
 */
export function stripSubsetTag(name: string): string {
  return /^[A-Z]{6}\+/.test(name) ? name.slice(7) : name;
}

/**
 * Standard-14 name for a base font name, following the usual aliases
 * (`Arial,Bold` → `Helvetica-Bold`, `TimesNewRoman` → `Times-Roman`).
 */
export function standardFontName(baseFont: string): string | undefined {
  const name = stripSubsetTag(baseFont);

  if (name in FONTS) {
    return name;
  }

  if (name in ALIASES) {
    return ALIASES[name];
  }

  const match = /^([A-Za-z]+)(?:[,-](.*))?$/.exec(name);
  const family = match ? FAMILY_ALIASES[match[1]] : undefined;

  if (!match || !family) {
    return undefined;
  }

  const style = (match[2] ?? "").toLowerCase();
  const bold = style.includes("bold");
  const italic = style.includes("italic") || style.includes("oblique");

  switch (family) {
    case "Helvetica":
      return bold ? "Helvetica-Bold" : "Helvetica";
    case "Times":
      if (bold) {
        return italic ? "Times-BoldItalic" : "Times-Bold";
      }

      return italic ? "Times-Italic" : "Times-Roman";
    default:
      // Courier variants share metrics; Symbol and ZapfDingbats have no styles
      return family;
  }
}

/**
 * Metrics for a standard font, or undefined when the name is not one of
 * them or an alias.
 */
export function standardMetrics(baseFont: string): StandardMetrics | undefined {
  const name = standardFontName(baseFont);
  const entry = name === undefined ? undefined : FONTS[name];

  if (name === undefined || !entry) {
    return undefined;
  }

  return {
    name,
    ascent: entry.ascent,
    descent: entry.descent,
    missingWidth: entry.missingWidth,
    width: glyphName => entry.widths[glyphName] ?? entry.missingWidth,
  };
}

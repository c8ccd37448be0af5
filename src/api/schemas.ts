/**
 * Zod schemas for configuration that comes from outside the program.
 */

import { z } from "zod";
import { ConfigError } from "./errors";

// ─────────────────────────────────────────────────────────────────────────────
// Render service options
// ─────────────────────────────────────────────────────────────────────────────

export const BackendKindSchema = z.enum(["cpu", "gpu"]);
export type BackendKind = z.infer<typeof BackendKindSchema>;

/**
 * Plain-data render service options. Callbacks and devices are passed
 * beside these and are not validated.
 */
export const RenderServiceConfigSchema = z.object({
  backend: BackendKindSchema.default("cpu"),
  /** Rendered pages kept in the LRU cache */
  cacheSize: z.number().int().min(0).default(8),
  /** Page background as `#rgb`, `#rrggbb` or `#rrggbbaa` */
  background: z
    .string()
    .regex(/^#?([0-9a-fA-F]{3}|[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/, "expected a hex colour")
    .default("#ffffff"),
  /** Directory holding `fonts.json` and substitute font files */
  fontDirectory: z.string().min(1).optional(),
  /** Cancel an in-flight render when the same page is requested at another scale */
  supersede: z.boolean().default(true),
});
export type RenderServiceConfig = z.infer<typeof RenderServiceConfigSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Font directory manifest
// ─────────────────────────────────────────────────────────────────────────────

/**
 * `fonts.json`: PDF base-font name → font file name in the same directory.
 * An `Arial` entry serves every font without its own.
 */
export const FontManifestSchema = z.record(z.string().min(1), z.string().min(1));
export type FontManifest = z.infer<typeof FontManifestSchema>;

/**
 * Parse with a schema, raising {@link ConfigError} on failure.
 */
export function parseConfig<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.output<T> {
  const result = schema.safeParse(value);

  if (!result.success) {
    throw new ConfigError(`Invalid ${what}`, result.error.issues);
  }

  return result.data;
}

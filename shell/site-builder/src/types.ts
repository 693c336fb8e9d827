import type { DroppedItem, ResolvedItem } from "@folio/collections";
import type { SiteConfig } from "@folio/config";
import type { StaticFile } from "@folio/content";
import type { RenderedPage, SiteModel } from "@folio/render";
import { z, type Logger, type ProgressCallback } from "@folio/utils";

/**
 * A file produced by a generator plugin
 */
export interface GeneratedFile {
  /** POSIX path relative to the destination */
  path: string;
  content: string;
}

/**
 * What a generator plugin sees once every page is rendered
 */
export interface PluginContext {
  config: SiteConfig;
  site: SiteModel;
  /** Rendered items, in the same order as `pages` */
  items: readonly ResolvedItem[];
  pages: readonly RenderedPage[];
  staticFiles: readonly StaticFile[];
  sourceDir: string;
  logger: Logger;
}

/**
 * Generator plugin: enabled when its name or an alias is listed under
 * `plugins` (and `whitelist` in safe mode)
 */
export interface SitePlugin {
  readonly name: string;
  readonly aliases: readonly string[];
  generate(context: PluginContext): GeneratedFile[] | Promise<GeneratedFile[]>;
}

/**
 * Site builder options schema
 */
export const SiteBuilderOptionsSchema = z.object({
  source: z
    .string()
    .optional()
    .describe("Source directory; defaults to the `source` setting"),
  configFiles: z
    .array(z.string())
    .optional()
    .describe("Settings files merged in order; defaults to <source>/_config.yml"),
  overrides: z
    .record(z.unknown())
    .optional()
    .describe("Settings applied on top of the files"),
  cleanBeforeBuild: z.boolean().default(true),
  now: z.date().optional().describe("Build time; defaults to the clock"),
});

export type SiteBuilderOptions = z.input<typeof SiteBuilderOptionsSchema> & {
  /** Use these settings instead of reading files */
  config?: SiteConfig;
  onProgress?: ProgressCallback;
};

/**
 * One file written to the destination
 */
export interface BuildOutput {
  path: string;
  source: "page" | "static" | "generated";
}

/**
 * Build result schema
 */
export const BuildResultSchema = z.object({
  success: z.boolean(),
  destination: z.string(),
  pagesBuilt: z.number(),
  filesCopied: z.number(),
  generatedFiles: z.number(),
  errors: z.array(z.string()),
  warnings: z.array(z.string()),
  dropped: z.array(
    z.object({
      relativePath: z.string(),
      collection: z.string(),
      reason: z.string(),
    }),
  ),
  outputs: z.array(
    z.object({
      path: z.string(),
      source: z.enum(["page", "static", "generated"]),
    }),
  ),
});

export type BuildResult = z.infer<typeof BuildResultSchema>;

export type { DroppedItem };

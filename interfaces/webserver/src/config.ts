import { z } from "@folio/utils";

/**
 * Preview server configuration schema
 */
export const previewServerConfigSchema = z.object({
  outputDir: z.string().describe("Directory holding the built site"),
  port: z.number().int().min(0).max(65535).default(4000),
  hostname: z.string().default("localhost"),
  baseurl: z
    .string()
    .default("")
    .describe("Path prefix the site is published under, e.g. /blog"),
});

export type PreviewServerConfig = z.input<typeof previewServerConfigSchema>;
export type PreviewServerSettings = z.output<typeof previewServerConfigSchema>;

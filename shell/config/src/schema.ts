import { z } from "@folio/utils";
import { expandPermalinkStyle } from "./permalink-styles";

/**
 * Social handles rendered by the built-in theme, in display order
 */
export const SOCIAL_NETWORKS = [
  "github",
  "gitlab",
  "linkedin",
  "twitter",
  "medium",
  "stackoverflow",
  "kaggle",
  "behance",
  "dribbble",
  "facebook",
  "instagram",
  "soundcloud",
  "spotify",
  "tumblr",
  "twitch",
  "vimeo",
  "youtube",
  "keybase",
] as const;

export type SocialNetwork = (typeof SOCIAL_NETWORKS)[number];

// YAML reads unquoted phone numbers and ids as numbers
const stringish = z
  .union([z.string(), z.number()])
  .transform((value) => String(value));

export const authorSchema = z
  .object({
    name: z.string().optional(),
    email: z.string().optional(),
    image: z.string().optional(),
    mobile: stringish.optional(),
    website: z.string().optional(),
  })
  .passthrough();

export const collectionDefinitionSchema = z
  .object({
    output: z
      .boolean()
      .default(true)
      .describe("Render a page for every item of the collection"),
    permalink: z
      .string()
      .optional()
      .describe("Permalink pattern, e.g. /projects/:name"),
    sort_by: z
      .string()
      .optional()
      .describe("Front matter field used to order the collection"),
  })
  .passthrough();

// `collections: [projects]` is shorthand for `collections: { projects: {} }`
const collectionsSchema = z.preprocess((value) => {
  if (Array.isArray(value)) {
    return Object.fromEntries(value.map((name) => [String(name), {}]));
  }
  if (typeof value === "object" && value !== null) {
    // An empty YAML mapping entry (`projects:`) arrives as null
    return Object.fromEntries(
      Object.entries(value).map(([name, definition]) => [
        name,
        definition ?? {},
      ]),
    );
  }
  return value ?? {};
}, z.record(collectionDefinitionSchema));

export const frontMatterDefaultSchema = z.object({
  scope: z
    .object({
      path: z.string().default(""),
      type: z.string().optional(),
    })
    .default({}),
  values: z.record(z.unknown()).default({}),
});

export const analyticsSchema = z
  .object({
    enabled: z.boolean().default(false),
    google: z
      .object({
        tracking_id: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const buyMeACoffeeSchema = z
  .object({
    enabled: z.boolean().default(false),
    username: z.string().optional(),
    color: z.string().default("#FFDD00"),
    message: z.string().default(""),
    description: z.string().default(""),
  })
  .passthrough();

export const liquidSchema = z
  .object({
    strict_variables: z
      .boolean()
      .default(false)
      .describe("Fail on undefined variables, missing layouts and includes"),
    strict_filters: z
      .boolean()
      .default(false)
      .describe("Fail on unknown filters"),
  })
  .passthrough();

function normalizeBaseUrl(value: string): string {
  const trimmed = value.trim().replace(/\/+$/, "");
  if (trimmed.length === 0) {
    return "";
  }
  return trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
}

/**
 * Site configuration schema
 * Unknown keys are kept and exposed to templates as `site.*`
 */
export const siteConfigSchema = z
  .object({
    title: z.string().trim().min(1, "must not be empty"),
    description: z.string().trim().default(""),
    url: z
      .string()
      .default("")
      .transform((value) => value.trim().replace(/\/+$/, "")),
    baseurl: z.string().default("").transform(normalizeBaseUrl),
    repository: z.string().optional(),
    remote_theme: z.string().optional(),
    open_new_tab: z.boolean().default(false),
    author: authorSchema.default({}),
    plugins: z.array(z.string()).default([]),
    whitelist: z.array(z.string()).default([]),
    safe: z
      .boolean()
      .default(false)
      .describe("Only run plugins that are also whitelisted"),
    nav_exclude: z.array(z.string()).default([]),
    permalink: z
      .string()
      .default("date")
      .transform(expandPermalinkStyle)
      .describe("Posts permalink pattern or style name"),
    collections: collectionsSchema,
    defaults: z.array(frontMatterDefaultSchema).default([]),
    analytics: analyticsSchema.default({}),
    buymeacoffee: buyMeACoffeeSchema.default({}),
    disqus: z
      .object({ shortname: z.string().optional() })
      .passthrough()
      .optional(),
    exclude: z.array(z.string()).default([]),
    include: z.array(z.string()).default([]),
    source: z.string().default("."),
    destination: z.string().default("_site"),
    drafts: z.boolean().default(false),
    future: z.boolean().default(false),
    strict_front_matter: z.boolean().default(false),
    liquid: liquidSchema.default({}),
    unknown_collections: z
      .enum(["warn", "error"])
      .default("warn")
      .describe("Drop items of undeclared collections with a warning, or fail"),
    environment: z.string().default("development"),
  })
  .passthrough();

export type SiteConfig = z.output<typeof siteConfigSchema>;
export type SiteConfigInput = z.input<typeof siteConfigSchema>;
export type CollectionDefinition = z.output<typeof collectionDefinitionSchema>;
export type FrontMatterDefault = z.output<typeof frontMatterDefaultSchema>;
export type AuthorInfo = z.output<typeof authorSchema>;

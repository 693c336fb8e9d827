import { readFile } from "fs/promises";
import { basename } from "path";
import {
  ConfigError,
  fromYaml,
  getErrorMessage,
  isPlainRecord,
  notFoundError,
  parseError,
  validationError,
  type Logger,
  type ZodIssue,
} from "@folio/utils";
import { siteConfigSchema, type SiteConfig } from "./schema";

export type ConfigOverrides = Record<string, unknown>;

export interface ConfigLoadOptions {
  /** Applied after the files, e.g. from the environment and CLI flags */
  overrides?: ConfigOverrides | ConfigOverrides[];
  logger?: Logger;
}

/**
 * Merge mappings recursively; arrays and scalars from `override` replace
 */
export function mergeConfig(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = result[key];
    result[key] =
      isPlainRecord(existing) && isPlainRecord(value)
        ? mergeConfig(existing, value)
        : value;
  }
  return result;
}

/**
 * Recursively freeze a value in place
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}

function parseDocument(text: string, source: string): Record<string, unknown> {
  let document: unknown;
  try {
    document = fromYaml(text, source);
  } catch (error) {
    throw new ConfigError(
      parseError(source, "YAML", getErrorMessage(error)),
      { source },
    );
  }

  // An empty file is an empty mapping; validation then reports the title
  if (document === null || document === undefined) {
    return {};
  }

  if (!isPlainRecord(document)) {
    throw new ConfigError(`Configuration in ${source} must be a mapping`, {
      source,
    });
  }

  return document;
}

function toOverrideList(
  overrides: ConfigLoadOptions["overrides"],
): ConfigOverrides[] {
  if (!overrides) {
    return [];
  }
  return Array.isArray(overrides) ? overrides : [overrides];
}

/**
 * Validate a merged settings mapping and freeze the result
 */
export function validateConfig(
  raw: Record<string, unknown>,
  source = "configuration",
): SiteConfig {
  const result = siteConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      validationError(source, formatIssues(result.error.issues)),
      { source, issues: result.error.issues },
    );
  }
  return deepFreeze(result.data);
}

/**
 * Parse one YAML settings document
 */
export function parseConfig(
  yamlText: string,
  options: ConfigLoadOptions & { filename?: string } = {},
): SiteConfig {
  const source = options.filename ?? "_config.yml";
  const merged = toOverrideList(options.overrides).reduce(
    (acc, override) => mergeConfig(acc, override),
    parseDocument(yamlText, source),
  );
  return validateConfig(merged, source);
}

/**
 * Read and merge one or more YAML settings files, later files winning
 */
export async function loadConfig(
  paths: string | string[],
  options: ConfigLoadOptions = {},
): Promise<SiteConfig> {
  const files = Array.isArray(paths) ? paths : [paths];
  if (files.length === 0) {
    throw new ConfigError("No configuration file given");
  }

  const logger = options.logger?.child("ConfigLoader");
  let merged: Record<string, unknown> = {};

  for (const file of files) {
    let text: string;
    try {
      text = await readFile(file, "utf-8");
    } catch (error) {
      throw new ConfigError(notFoundError(file, "Configuration file"), {
        source: file,
        cause: getErrorMessage(error),
      });
    }
    logger?.debug(`Loaded configuration from ${file}`);
    merged = mergeConfig(merged, parseDocument(text, basename(file)));
  }

  for (const override of toOverrideList(options.overrides)) {
    merged = mergeConfig(merged, override);
  }

  return validateConfig(merged, files.map((file) => basename(file)).join(", "));
}

/**
 * Settings taken from the environment
 *
 * - FOLIO_ENV sets `environment` (templates enable analytics in "production")
 * - SITE_URL sets `url`
 * - SITE_BASEURL sets `baseurl`
 */
export function resolveConfigOverrides(
  env: Record<string, string | undefined>,
): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (env["FOLIO_ENV"]) {
    overrides["environment"] = env["FOLIO_ENV"];
  }
  if (env["SITE_URL"]) {
    overrides["url"] = env["SITE_URL"];
  }
  if (env["SITE_BASEURL"] !== undefined) {
    overrides["baseurl"] = env["SITE_BASEURL"];
  }
  return overrides;
}

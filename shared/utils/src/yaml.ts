import * as yaml from "js-yaml";

/**
 * Parse YAML string to an unknown value
 * Throws js-yaml's YAMLException on syntax errors
 */
export function fromYaml(yamlContent: string, filename?: string): unknown {
  return yaml.load(yamlContent, filename ? { filename } : {});
}

/**
 * Narrow a parsed value to a plain mapping
 */
export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

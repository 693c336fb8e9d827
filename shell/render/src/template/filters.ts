import {
  capitalize,
  escapeHtml,
  escapeXml,
  joinUrl,
  markdownToHtml,
  slugify,
  stripHtml,
  toDate,
  toShortDateString,
} from "@folio/utils";
import { toText } from "./expression";

/**
 * URL settings filters resolve against
 */
export interface FilterContext {
  url: string;
  baseurl: string;
}

export type FilterFunction = (
  value: unknown,
  args: readonly unknown[],
  context: FilterContext,
) => unknown;

const ABSOLUTE_URL = /^[a-z][a-z0-9+.-]*:|^\/\//i;

export function relativeUrl(input: string, baseurl: string): string {
  if (ABSOLUTE_URL.test(input)) {
    return input;
  }
  return joinUrl(baseurl, input);
}

export function absoluteUrl(input: string, context: FilterContext): string {
  if (ABSOLUTE_URL.test(input)) {
    return input;
  }
  return `${context.url}${relativeUrl(input, context.baseurl)}`;
}

/**
 * "2024-03-01T00:00:00+00:00"
 */
export function toXmlSchemaDate(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "+00:00");
}

function isBlank(value: unknown): boolean {
  return (
    value === null ||
    value === undefined ||
    value === false ||
    value === "" ||
    (Array.isArray(value) && value.length === 0)
  );
}

function sizeOf(value: unknown): number {
  if (typeof value === "string" || Array.isArray(value)) {
    return value.length;
  }
  if (typeof value === "object" && value !== null && !(value instanceof Date)) {
    return Object.keys(value).length;
  }
  return 0;
}

function formatDate(
  value: unknown,
  format: (date: Date) => string,
): string {
  const date = toDate(value);
  return date ? format(date) : "";
}

/**
 * Named filters available to templates
 */
export class FilterRegistry {
  private readonly filters = new Map<string, FilterFunction>();

  register(name: string, filter: FilterFunction): this {
    this.filters.set(name, filter);
    return this;
  }

  get(name: string): FilterFunction | undefined {
    return this.filters.get(name);
  }

  has(name: string): boolean {
    return this.filters.has(name);
  }

  list(): string[] {
    return [...this.filters.keys()].sort();
  }
}

export function createDefaultFilters(): FilterRegistry {
  return new FilterRegistry()
    .register("upcase", (value) => toText(value).toUpperCase())
    .register("downcase", (value) => toText(value).toLowerCase())
    .register("capitalize", (value) => capitalize(toText(value)))
    .register("escape", (value) => escapeHtml(toText(value)))
    .register("xml_escape", (value) => escapeXml(toText(value)))
    .register("strip_html", (value) => stripHtml(toText(value)))
    .register("strip", (value) => toText(value).trim())
    .register("markdownify", (value) => markdownToHtml(toText(value)))
    .register("slugify", (value) => slugify(toText(value)))
    .register("relative_url", (value, _args, context) =>
      relativeUrl(toText(value), context.baseurl),
    )
    .register("absolute_url", (value, _args, context) =>
      absoluteUrl(toText(value), context),
    )
    .register("date_to_string", (value) =>
      formatDate(value, toShortDateString),
    )
    .register("date_to_xmlschema", (value) =>
      formatDate(value, toXmlSchemaDate),
    )
    .register("jsonify", (value) => JSON.stringify(value ?? null))
    .register("size", (value) => sizeOf(value))
    .register("join", (value, args) => {
      const separator = args[0] === undefined ? " " : toText(args[0]);
      return Array.isArray(value)
        ? value.map(toText).join(separator)
        : toText(value);
    })
    .register("default", (value, args) => (isBlank(value) ? args[0] : value))
    .register("append", (value, args) => toText(value) + toText(args[0]))
    .register("prepend", (value, args) => toText(args[0]) + toText(value));
}

import { TemplateResolutionError } from "@folio/utils";

export type Literal = string | number | boolean | null;

export type PathSegment = string | number;

export type ValueExpression =
  | { type: "literal"; value: Literal }
  | { type: "path"; segments: PathSegment[]; source: string };

export interface FilterCall {
  name: string;
  args: ValueExpression[];
}

export interface OutputExpression {
  value: ValueExpression;
  filters: FilterCall[];
}

const IDENTIFIER = /^[A-Za-z_][\w-]*/;
const NUMBER = /^-?\d+(\.\d+)?$/;

/**
 * Split on a separator outside quoted strings
 */
export function splitOutsideQuotes(text: string, separator: string): string[] {
  const parts: string[] = [];
  let quote: string | null = null;
  let current = "";

  for (const char of text) {
    if (quote) {
      if (char === quote) {
        quote = null;
      }
      current += char;
    } else if (char === '"' || char === "'") {
      quote = char;
      current += char;
    } else if (char === separator) {
      parts.push(current);
      current = "";
    } else {
      current += char;
    }
  }

  parts.push(current);
  return parts;
}

function invalid(source: string, template: string): TemplateResolutionError {
  return new TemplateResolutionError(
    `Invalid expression "${source}" in ${template}`,
    { expression: source, template },
  );
}

function parsePath(source: string, template: string): PathSegment[] {
  const segments: PathSegment[] = [];
  let rest = source;

  const head = IDENTIFIER.exec(rest);
  if (!head) {
    throw invalid(source, template);
  }
  segments.push(head[0]);
  rest = rest.slice(head[0].length);

  while (rest.length > 0) {
    if (rest.startsWith(".")) {
      const match = IDENTIFIER.exec(rest.slice(1));
      if (!match) {
        throw invalid(source, template);
      }
      segments.push(match[0]);
      rest = rest.slice(1 + match[0].length);
      continue;
    }

    const index = /^\[\s*(-?\d+|"[^"]*"|'[^']*')\s*\]/.exec(rest);
    if (!index?.[1]) {
      throw invalid(source, template);
    }
    const key = index[1];
    segments.push(/^-?\d+$/.test(key) ? Number(key) : key.slice(1, -1));
    rest = rest.slice(index[0].length);
  }

  return segments;
}

/**
 * Parse a literal or a variable path
 */
export function parseValue(text: string, template: string): ValueExpression {
  const source = text.trim();

  if (
    source.length >= 2 &&
    (source.startsWith('"') || source.startsWith("'")) &&
    source.endsWith(source.charAt(0))
  ) {
    return { type: "literal", value: source.slice(1, -1) };
  }
  if (NUMBER.test(source)) {
    return { type: "literal", value: Number(source) };
  }
  if (source === "true" || source === "false") {
    return { type: "literal", value: source === "true" };
  }
  if (source === "nil" || source === "null") {
    return { type: "literal", value: null };
  }

  return { type: "path", segments: parsePath(source, template), source };
}

/**
 * Parse the inside of an output tag: `page.title | upcase | append: "!"`
 */
export function parseOutput(text: string, template: string): OutputExpression {
  const [valuePart = "", ...filterParts] = splitOutsideQuotes(text, "|");
  if (valuePart.trim().length === 0) {
    throw invalid(text.trim(), template);
  }

  const filters = filterParts.map((part): FilterCall => {
    const colon = part.indexOf(":");
    const name = (colon === -1 ? part : part.slice(0, colon)).trim();
    if (!IDENTIFIER.test(name)) {
      throw invalid(text.trim(), template);
    }
    const args =
      colon === -1
        ? []
        : splitOutsideQuotes(part.slice(colon + 1), ",").map((arg) =>
            parseValue(arg, template),
          );
    return { name, args };
  });

  return { value: parseValue(valuePart, template), filters };
}

/**
 * Look a path up in a scope; undefined when any step is missing
 *
 * Arrays and strings answer `size`; arrays also `first` and `last`.
 */
export function resolvePath(
  scope: Record<string, unknown>,
  segments: readonly PathSegment[],
): unknown {
  let current: unknown = scope;

  for (const segment of segments) {
    if (current === null || current === undefined) {
      return undefined;
    }

    if (Array.isArray(current)) {
      if (typeof segment === "number") {
        current = current.at(segment);
      } else if (segment === "size") {
        current = current.length;
      } else if (segment === "first") {
        current = current[0];
      } else if (segment === "last") {
        current = current.at(-1);
      } else {
        return undefined;
      }
      continue;
    }

    if (typeof current === "string") {
      if (segment !== "size") {
        return undefined;
      }
      current = current.length;
      continue;
    }

    if (typeof current === "object" && !(current instanceof Date)) {
      const key = String(segment);
      current = Object.prototype.hasOwnProperty.call(current, key)
        ? Reflect.get(current, key)
        : undefined;
      continue;
    }

    return undefined;
  }

  return current;
}

/**
 * Text form of a value placed in output
 */
export function toText(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }
  if (typeof value === "string") {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map(toText).join("");
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

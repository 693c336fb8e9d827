import { TemplateResolutionError } from "@folio/utils";
import {
  parseOutput,
  parseValue,
  type OutputExpression,
  type ValueExpression,
} from "./expression";

export type TemplateNode =
  | { type: "text"; value: string }
  | { type: "output"; expression: OutputExpression; source: string }
  | {
      type: "include";
      name: string;
      params: Array<[string, ValueExpression]>;
      source: string;
    };

const INCLUDE_PARAM = /([\w-]+)\s*=\s*("[^"]*"|'[^']*'|[^\s]+)/g;

function endTagFor(
  source: string,
  name: "raw" | "comment",
  from: number,
): { start: number; end: number; trimBefore: boolean; trimAfter: boolean } | undefined {
  const pattern = new RegExp(`\\{%(-?)\\s*end${name}\\s*(-?)%\\}`, "g");
  pattern.lastIndex = from;
  const match = pattern.exec(source);
  if (!match) {
    return undefined;
  }
  return {
    start: match.index,
    end: match.index + match[0].length,
    trimBefore: match[1] === "-",
    trimAfter: match[2] === "-",
  };
}

function parseInclude(markup: string, template: string): TemplateNode {
  const [name = "", ...rest] = markup.trim().split(/\s+/);
  if (name.length === 0) {
    throw new TemplateResolutionError(
      `Include tag without a file name in ${template}`,
      { template },
    );
  }

  const params: Array<[string, ValueExpression]> = [];
  for (const match of rest.join(" ").matchAll(INCLUDE_PARAM)) {
    const [, key, value] = match;
    if (key && value) {
      params.push([key, parseValue(value, template)]);
    }
  }

  return { type: "include", name, params, source: markup.trim() };
}

/**
 * Split a template into text, output and include nodes
 *
 * `{% raw %}` and `{% comment %}` blocks are resolved here. `{{-` and
 * `-}}` (and the tag forms) trim whitespace on that side.
 *
 * @throws TemplateResolutionError for unclosed or unknown tags
 */
export function parseTemplate(source: string, template: string): TemplateNode[] {
  const nodes: TemplateNode[] = [];
  const tagStart = /\{\{|\{%/g;
  let trimNext = false;
  let position = 0;

  const pushText = (text: string, trimEnd: boolean): void => {
    let value = trimNext ? text.replace(/^\s+/, "") : text;
    if (trimEnd) {
      value = value.replace(/\s+$/, "");
    }
    trimNext = false;
    if (value.length > 0) {
      nodes.push({ type: "text", value });
    }
  };

  let match: RegExpExecArray | null;
  while ((match = tagStart.exec(source)) !== null) {
    const start = match.index;
    const isOutput = match[0] === "{{";
    const closing = isOutput ? "}}" : "%}";
    const close = source.indexOf(closing, start + 2);
    if (close === -1) {
      throw new TemplateResolutionError(
        `Unclosed ${isOutput ? "output" : "tag"} "${source.slice(start, start + 20)}" in ${template}`,
        { template },
      );
    }

    let inner = source.slice(start + 2, close);
    const trimBefore = inner.startsWith("-");
    let trimAfter = inner.endsWith("-");
    inner = inner.slice(trimBefore ? 1 : 0, trimAfter ? -1 : undefined);

    pushText(source.slice(position, start), trimBefore);
    position = close + 2;

    if (isOutput) {
      nodes.push({
        type: "output",
        expression: parseOutput(inner, template),
        source: inner.trim(),
      });
    } else {
      const markup = inner.trim();
      const tag = /^\w+/.exec(markup)?.[0] ?? "";

      if (tag === "raw" || tag === "comment") {
        const end = endTagFor(source, tag, position);
        if (!end) {
          throw new TemplateResolutionError(
            `Unclosed {% ${tag} %} block in ${template}`,
            { template },
          );
        }
        if (tag === "raw") {
          trimNext = trimAfter;
          pushText(source.slice(position, end.start), end.trimBefore);
        }
        trimAfter = end.trimAfter;
        position = end.end;
      } else if (tag === "include") {
        nodes.push(parseInclude(markup.slice("include".length), template));
      } else {
        throw new TemplateResolutionError(
          `Unknown tag "${tag || markup}" in ${template}`,
          { template, tag: tag || markup },
        );
      }
    }

    trimNext = trimAfter;
    tagStart.lastIndex = position;
  }

  pushText(source.slice(position), false);
  return nodes;
}

/**
 * Whether text contains anything the template engine would act on
 */
export function hasTemplateSyntax(source: string): boolean {
  return /\{\{|\{%/.test(source);
}

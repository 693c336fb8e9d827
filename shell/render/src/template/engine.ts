import { TemplateResolutionError, notFoundError } from "@folio/utils";
import { resolvePath, toText, type ValueExpression } from "./expression";
import type { FilterContext, FilterRegistry } from "./filters";
import { parseTemplate, type TemplateNode } from "./parser";

export const MAX_INCLUDE_DEPTH = 10;

export type TemplateScope = Record<string, unknown>;

/**
 * What an include name resolves to: template text from `_includes`, or a
 * built-in component rendered to HTML
 */
export type IncludeSource =
  | { type: "template"; name: string; text: string }
  | {
      type: "component";
      name: string;
      render: (scope: TemplateScope, params: Record<string, unknown>) => string;
    };

export interface TemplateEngineOptions {
  filters: FilterRegistry;
  filterContext: FilterContext;
  /** Undefined variables and missing includes throw instead of rendering "" */
  strictVariables?: boolean;
  /** Unknown filters throw instead of passing the value through */
  strictFilters?: boolean;
  resolveInclude?: (name: string) => IncludeSource | undefined;
}

export interface RenderOptions {
  /** Template name used in messages, usually the source path */
  name: string;
  /** Collects lenient-mode problems */
  warnings?: string[];
}

interface RenderState {
  name: string;
  warnings: string[];
  depth: number;
}

/**
 * Renders the Liquid subset used by layouts, includes and content:
 * output tags with filters, `include`, `raw` and `comment`
 */
export class TemplateEngine {
  private readonly cache = new Map<string, TemplateNode[]>();

  constructor(private readonly options: TemplateEngineOptions) {}

  render(source: string, scope: TemplateScope, options: RenderOptions): string {
    return this.renderNodes(source, scope, {
      name: options.name,
      warnings: options.warnings ?? [],
      depth: 0,
    });
  }

  private parse(source: string, name: string): TemplateNode[] {
    const key = `${name}\u0000${source}`;
    const cached = this.cache.get(key);
    if (cached) {
      return cached;
    }
    const nodes = parseTemplate(source, name);
    this.cache.set(key, nodes);
    return nodes;
  }

  private renderNodes(
    source: string,
    scope: TemplateScope,
    state: RenderState,
  ): string {
    let output = "";
    for (const node of this.parse(source, state.name)) {
      switch (node.type) {
        case "text":
          output += node.value;
          break;
        case "output":
          output += toText(this.evaluateOutput(node, scope, state));
          break;
        case "include":
          output += this.renderInclude(node, scope, state);
          break;
      }
    }
    return output;
  }

  private evaluateOutput(
    node: Extract<TemplateNode, { type: "output" }>,
    scope: TemplateScope,
    state: RenderState,
  ): unknown {
    const { value, filters } = node.expression;
    const hasDefault = filters.some((filter) => filter.name === "default");
    let result = this.evaluate(value, scope, state, hasDefault);

    for (const call of filters) {
      const filter = this.options.filters.get(call.name);
      const args = call.args.map((arg) => this.evaluate(arg, scope, state, false));

      if (!filter) {
        const message = `unknown filter "${call.name}" in {{ ${node.source} }}`;
        if (this.options.strictFilters) {
          throw new TemplateResolutionError(
            `Unknown filter "${call.name}" in ${state.name}`,
            { template: state.name, filter: call.name },
          );
        }
        state.warnings.push(message);
        continue;
      }

      result = filter(result, args, this.options.filterContext);
    }

    return result;
  }

  private evaluate(
    expression: ValueExpression,
    scope: TemplateScope,
    state: RenderState,
    allowUndefined: boolean,
  ): unknown {
    if (expression.type === "literal") {
      return expression.value;
    }

    const value = resolvePath(scope, expression.segments);
    if (value === undefined && !allowUndefined) {
      if (this.options.strictVariables) {
        throw new TemplateResolutionError(
          `Undefined variable "${expression.source}" in ${state.name}`,
          { template: state.name, variable: expression.source },
        );
      }
      state.warnings.push(`undefined variable "${expression.source}"`);
    }
    return value;
  }

  private renderInclude(
    node: Extract<TemplateNode, { type: "include" }>,
    scope: TemplateScope,
    state: RenderState,
  ): string {
    if (state.depth >= MAX_INCLUDE_DEPTH) {
      throw new TemplateResolutionError(
        `Include "${node.name}" nested more than ${MAX_INCLUDE_DEPTH} levels deep in ${state.name}`,
        { template: state.name, include: node.name },
      );
    }

    const include = this.options.resolveInclude?.(node.name);
    if (!include) {
      if (this.options.strictVariables) {
        throw new TemplateResolutionError(
          `${notFoundError(node.name, "Include")} (used in ${state.name})`,
          { template: state.name, include: node.name },
        );
      }
      state.warnings.push(`include "${node.name}" not found`);
      return "";
    }

    const params: Record<string, unknown> = {};
    for (const [key, expression] of node.params) {
      params[key] = this.evaluate(expression, scope, state, false);
    }

    if (include.type === "component") {
      return include.render(scope, params);
    }

    return this.renderNodes(
      include.text,
      { ...scope, include: params },
      {
        name: `_includes/${include.name}`,
        warnings: state.warnings,
        depth: state.depth + 1,
      },
    );
  }
}

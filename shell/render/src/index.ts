export {
  PageRenderer,
  writeRenderedPage,
  layoutNameFor,
  type PageRendererOptions,
} from "./page-renderer";
export type {
  SiteModel,
  RenderContext,
  RenderedPage,
  NavigationItem,
} from "./types";
export { toPageData, buildExcerpt, excerptFor } from "./page-data";
export { createSiteScope } from "./site-scope";
export { HeadCollector, type HeadProps } from "./head-collector";
export { createHTMLShell, type HTMLShellOptions } from "./html-shell";
export {
  TemplateEngine,
  MAX_INCLUDE_DEPTH,
  type TemplateEngineOptions,
  type TemplateScope,
  type IncludeSource,
  type RenderOptions,
} from "./template/engine";
export {
  FilterRegistry,
  createDefaultFilters,
  relativeUrl,
  absoluteUrl,
  toXmlSchemaDate,
  type FilterFunction,
  type FilterContext,
} from "./template/filters";
export { parseTemplate, hasTemplateSyntax, type TemplateNode } from "./template/parser";
export { toText } from "./template/expression";
export {
  BUILTIN_LAYOUTS,
  BUILTIN_INCLUDES,
  authorLinks,
  siteHref,
  type BuiltinLayout,
  type BuiltinInclude,
  type SocialLink,
} from "./theme";

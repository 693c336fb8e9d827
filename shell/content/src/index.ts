export type {
  ContentItem,
  ContentKind,
  FrontMatter,
  StaticFile,
  TemplateFile,
} from "./types";
export {
  parseFrontMatter,
  hasFrontMatter,
  getString,
  getStringList,
  type ParsedFrontMatter,
} from "./front-matter";
export {
  applyFrontMatterDefaults,
  matchesDefaultScope,
  scopeTypeOf,
} from "./defaults";
export { loadDataFiles, type DataLoadOptions } from "./data-loader";
export {
  ContentScanner,
  DEFAULT_EXCLUDES,
  type ScanResult,
  type ScanOptions,
  type ContentScannerOptions,
} from "./content-scanner";

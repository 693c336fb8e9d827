/**
 * Folio Utils Package
 *
 * Shared utilities used across the Folio site generator.
 */

// Logger
export { Logger, LogLevel, parseLogLevel, type LoggerOptions } from "./logger";

// Test utilities
export { createSilentLogger } from "./test-utils";

// Markdown utilities
export {
  isMarkdownExtension,
  markdownToHtml,
  extractExcerpt,
  stripHtml,
} from "./markdown";

// YAML utilities
export { fromYaml, isPlainRecord } from "./yaml";

// String utilities
export { slugify, capitalize, joinUrl } from "./string-utils";

// Escaping
export { escapeHtml, escapeXml } from "./escape";

// Path matching
export { globToRegExp, matchesGlob, matchesAnyGlob } from "./glob";

// Dates
export {
  toDate,
  toISODateString,
  toShortDateString,
  toRFC822Date,
  dayOfYear,
} from "./date";

// Sorting
export { sortByKey } from "./sort";

// Scheduling
export { BatchingDebounce } from "./debounce";

// Progress
export {
  ProgressReporter,
  type ProgressCallback,
  type ProgressNotification,
} from "./progress";

// Errors
export {
  FolioError,
  ConfigError,
  ContentParseError,
  TemplateResolutionError,
  SiteBuildError,
} from "./build-errors";
export { getErrorMessage } from "./error";
export {
  notFoundError,
  validationError,
  parseError,
  duplicateError,
} from "./errors";

// Zod
export { z, type ZodIssue, type ZodOutput } from "./zod";

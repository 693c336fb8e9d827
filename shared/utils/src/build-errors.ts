/**
 * Base error class for site build failures
 */
export class FolioError extends Error {
  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "FolioError";
  }
}

/**
 * Malformed or missing site settings; always fatal
 */
export class ConfigError extends FolioError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
    this.name = "ConfigError";
  }
}

/**
 * Malformed front matter or data file
 */
export class ContentParseError extends FolioError {
  constructor(
    message: string,
    public readonly sourcePath: string,
    context?: Record<string, unknown>,
  ) {
    super(message, { ...context, sourcePath });
    this.name = "ContentParseError";
  }
}

/**
 * Undefined variable, unknown filter or tag, missing layout or include
 */
export class TemplateResolutionError extends FolioError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
    this.name = "TemplateResolutionError";
  }
}

/**
 * Failure while writing the output tree
 */
export class SiteBuildError extends FolioError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
    this.name = "SiteBuildError";
  }
}

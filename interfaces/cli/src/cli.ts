import { join, resolve } from "path";
import {
  loadConfig,
  resolveConfigOverrides,
  type ConfigOverrides,
  type SiteConfig,
} from "@folio/config";
import { feedPlugin } from "@folio/feed-plugin";
import {
  SiteBuilder,
  type BuildResult,
  type SitePlugin,
} from "@folio/site-builder";
import { sitemapPlugin } from "@folio/sitemap-plugin";
import { Logger, LogLevel, getErrorMessage, parseLogLevel } from "@folio/utils";
import { PreviewServer } from "@folio/webserver";
import packageJson from "../package.json";
import { CliUsageError, parseCliArgs, type CliOptions } from "./args";
import { SiteWatcher } from "./watcher";

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export interface CliDeps {
  io?: CliIO;
  env?: Record<string, string | undefined>;
  cwd?: string;
  /** Generator plugins; sitemap and feed by default */
  plugins?: readonly SitePlugin[];
  logger?: Logger;
  /** Build time passed to every build */
  now?: Date;
  /** Resolves when `serve` should shut down; SIGINT or SIGTERM by default */
  waitForShutdown?: () => Promise<void>;
}

export const HELP_TEXT = `folio v${packageJson.version}

Usage:
  folio build [options]   Build the site into the destination directory
  folio serve [options]   Build, then serve the output on a local port

Options:
  -s, --source DIR        Site source directory (default: .)
  -d, --destination DIR   Output directory (default: <source>/_site)
  -c, --config FILES      Comma separated settings files, later ones win
  -D, --drafts            Include drafts
      --future            Include posts dated in the future
      --strict            Fail on bad front matter, undefined variables and unknown filters
  -P, --port PORT         Preview port (serve only, default: 4000)
  -w, --watch             Rebuild on changes (serve only)
  -V, --verbose           Debug logging
  -q, --quiet             Only log warnings and errors
  -h, --help              Show this help message
  -v, --version           Show version information

Environment:
  FOLIO_ENV               Sets site.environment (analytics only run in "production")
  FOLIO_LOG_LEVEL         Log level when neither --verbose nor --quiet is given
  SITE_URL, SITE_BASEURL  Override url and baseurl
`;

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

function waitForSignal(): Promise<void> {
  return new Promise((done) => {
    process.once("SIGINT", () => done());
    process.once("SIGTERM", () => done());
  });
}

/**
 * Settings overrides taken from command line flags
 */
export function flagOverrides(options: CliOptions, cwd: string): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (options.destination !== undefined) {
    overrides["destination"] = resolve(cwd, options.destination);
  }
  if (options.drafts) {
    overrides["drafts"] = true;
  }
  if (options.future) {
    overrides["future"] = true;
  }
  if (options.strict) {
    overrides["strict_front_matter"] = true;
    overrides["liquid"] = { strict_variables: true, strict_filters: true };
  }
  return overrides;
}

/**
 * Run the `folio` command line
 *
 * @returns the process exit code
 */
export async function runCli(
  argv: readonly string[],
  deps: CliDeps = {},
): Promise<number> {
  const io = deps.io ?? defaultIO;

  try {
    const command = parseCliArgs(argv);
    switch (command.name) {
      case "help":
        io.stdout(HELP_TEXT);
        return 0;
      case "version":
        io.stdout(`folio v${packageJson.version}\n`);
        return 0;
      case "build":
        await runBuild(command.options, deps, io);
        return 0;
      case "serve":
        await runServe(command.options, deps, io);
        return 0;
    }
  } catch (error) {
    if (error instanceof CliUsageError) {
      io.stderr(`${error.name}: ${error.message}\nRun "folio --help" for usage\n`);
      return 2;
    }
    const name = error instanceof Error ? error.name : "Error";
    io.stderr(`${name}: ${getErrorMessage(error)}\n`);
    return 1;
  }
}

interface SiteSession {
  sourceDir: string;
  config: SiteConfig;
  logger: Logger;
  build: () => Promise<BuildResult>;
}

async function openSite(options: CliOptions, deps: CliDeps): Promise<SiteSession> {
  const cwd = deps.cwd ?? process.cwd();
  const env = deps.env ?? process.env;
  const logger = deps.logger ?? Logger.getInstance();
  const level = options.verbose
    ? LogLevel.DEBUG
    : options.quiet
      ? LogLevel.WARN
      : parseLogLevel(env["FOLIO_LOG_LEVEL"] ?? "");
  if (level !== undefined) {
    logger.setLevel(level);
  }

  const sourceDir = resolve(cwd, options.source ?? ".");
  const files =
    options.config?.map((file) => resolve(cwd, file)) ?? [join(sourceDir, "_config.yml")];
  const overrides = [resolveConfigOverrides(env), flagOverrides(options, cwd)];

  const config = await loadConfig(files, { overrides, logger });
  const builder = SiteBuilder.createFresh({
    logger,
    plugins: deps.plugins ?? [sitemapPlugin(), feedPlugin()],
  });

  return {
    sourceDir,
    config,
    logger,
    build: () =>
      builder.build({
        source: sourceDir,
        config,
        ...(deps.now ? { now: deps.now } : {}),
      }),
  };
}

function report(result: BuildResult, io: CliIO): void {
  for (const warning of result.warnings) {
    io.stderr(`warning: ${warning}\n`);
  }
  for (const error of result.errors) {
    io.stderr(`error: ${error}\n`);
  }
  io.stdout(
    `Built ${result.pagesBuilt} pages, copied ${result.filesCopied} files and generated ${result.generatedFiles} files into ${result.destination}\n`,
  );
}

async function runBuild(options: CliOptions, deps: CliDeps, io: CliIO): Promise<void> {
  const site = await openSite(options, deps);
  report(await site.build(), io);
}

async function runServe(options: CliOptions, deps: CliDeps, io: CliIO): Promise<void> {
  const site = await openSite(options, deps);
  const result = await site.build();
  report(result, io);

  const server = new PreviewServer(
    {
      outputDir: result.destination,
      baseurl: site.config.baseurl,
      ...(options.port !== undefined ? { port: options.port } : {}),
    },
    site.logger,
  );
  const url = await server.start();
  io.stdout(`Serving ${url}\n`);

  const watcher = options.watch
    ? new SiteWatcher({
        sourceDir: site.sourceDir,
        destination: result.destination,
        logger: site.logger,
        onChange: async () => {
          report(await site.build(), io);
        },
      })
    : undefined;
  watcher?.start();

  try {
    await (deps.waitForShutdown ?? waitForSignal)();
  } finally {
    await watcher?.stop();
    await server.stop();
  }
  io.stdout("Stopped\n");
}

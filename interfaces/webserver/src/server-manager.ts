import type { EventEmitter } from "events";
import { existsSync } from "fs";
import { readFile } from "fs/promises";
import { join, relative, resolve } from "path";
import { serve, type ServerType } from "@hono/node-server";
import { serveStatic } from "@hono/node-server/serve-static";
import { Hono } from "hono";
import { etag } from "hono/etag";
import { Logger, SiteBuildError, getErrorMessage } from "@folio/utils";
import {
  previewServerConfigSchema,
  type PreviewServerConfig,
  type PreviewServerSettings,
} from "./config";

export interface PreviewAppOptions {
  /** Path prefix stripped from requests, e.g. /blog */
  baseurl?: string;
}

/**
 * Map a request path onto a file in the output directory
 *
 * Extensionless paths try `<path>/index.html`, then `<path>.html`.
 */
export function resolveCleanPath(outputDir: string, path: string): string {
  const lastSegment = path.slice(path.lastIndexOf("/") + 1);
  if (lastSegment.includes(".")) {
    return path;
  }
  const trimmed = path.replace(/\/+$/, "");
  if (trimmed === "") {
    return "/index.html";
  }
  if (path.endsWith("/") || existsSync(join(outputDir, trimmed, "index.html"))) {
    return `${trimmed}/index.html`;
  }
  return `${trimmed}.html`;
}

function stripBaseUrl(path: string, baseurl: string): string | null {
  if (!baseurl) {
    return path;
  }
  if (path === baseurl) {
    return "/";
  }
  return path.startsWith(`${baseurl}/`) ? path.slice(baseurl.length) : null;
}

/**
 * Hono app serving a built site with clean URLs and no caching
 */
export function createPreviewApp(
  outputDir: string,
  options: PreviewAppOptions = {},
): Hono {
  const root = resolve(outputDir);
  const baseurl = (options.baseurl ?? "").replace(/\/+$/, "");
  const app = new Hono();

  app.use("/*", etag());

  // No caching for preview
  app.use("/*", async (c, next) => {
    await next();
    c.header("Cache-Control", "no-cache, no-store, must-revalidate");
  });

  app.use(
    "/*",
    serveStatic({
      // serveStatic resolves its root against the working directory
      root: relative(process.cwd(), root) || ".",
      rewriteRequestPath: (path) => {
        const local = stripBaseUrl(path, baseurl);
        // A path outside the base URL maps to a file that cannot exist
        return local === null ? "/.folio-outside-baseurl" : resolveCleanPath(root, local);
      },
    }),
  );

  app.notFound(async (c) => {
    const notFoundPath = join(root, "404.html");
    if (existsSync(notFoundPath)) {
      return c.html(await readFile(notFoundPath, "utf-8"), 404);
    }
    return c.text("Not Found", 404);
  });

  return app;
}

/**
 * Runs the preview app on @hono/node-server
 */
export class PreviewServer {
  private readonly logger: Logger;
  private readonly config: PreviewServerSettings;
  private server: ServerType | null = null;

  constructor(config: PreviewServerConfig, logger: Logger = Logger.getInstance()) {
    this.logger = logger.child("PreviewServer");
    this.config = previewServerConfigSchema.parse(config);
  }

  get url(): string {
    return `http://${this.config.hostname}:${this.config.port}${this.config.baseurl}/`;
  }

  isRunning(): boolean {
    return this.server !== null;
  }

  /**
   * @throws SiteBuildError when the output directory does not exist
   */
  async start(port: number = this.config.port): Promise<string> {
    if (this.server) {
      this.logger.warn("Preview server already running");
      return this.url;
    }

    const outputDir = resolve(this.config.outputDir);
    if (!existsSync(outputDir)) {
      throw new SiteBuildError(`No build found in ${outputDir}. Run folio build first.`, {
        outputDir,
      });
    }

    this.config.port = port;
    const app = createPreviewApp(outputDir, { baseurl: this.config.baseurl });

    await new Promise<void>((resolveStart, rejectStart) => {
      const server = serve(
        { fetch: app.fetch, port, hostname: this.config.hostname },
        (info) => {
          this.config.port = info.port;
          this.server = server;
          resolveStart();
        },
      );
      const events: EventEmitter = server;
      events.once("error", (error: Error) => {
        rejectStart(
          new SiteBuildError(
            `Preview server failed to start on port ${port}: ${getErrorMessage(error)}`,
            { port },
          ),
        );
      });
    });

    this.logger.info(`Preview server started at ${this.url}`);
    return this.url;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      this.logger.warn("Preview server not running");
      return;
    }

    this.server = null;
    await new Promise<void>((resolveStop, rejectStop) => {
      server.close((error) => {
        if (error) {
          rejectStop(error);
        } else {
          resolveStop();
        }
      });
    });
    this.logger.info("Preview server stopped");
  }
}

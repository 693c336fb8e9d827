import { isAbsolute, relative, resolve, sep } from "path";
import type { FSWatcher } from "chokidar";
import chokidar from "chokidar";
import { BatchingDebounce, type Logger, getErrorMessage } from "@folio/utils";

export interface SiteWatcherOptions {
  sourceDir: string;
  /** Output directory; changes below it are ignored */
  destination: string;
  logger: Logger;
  /** Called with the changed paths, relative to the source */
  onChange: (paths: string[]) => Promise<void>;
  /** Quiet period before a rebuild */
  delayMs?: number;
}

export const WATCH_DELAY_MS = 500;

/**
 * Watches a site source tree and rebuilds after changes settle
 *
 * Rebuilds never overlap: changes arriving during a rebuild are batched
 * into the next one.
 */
export class SiteWatcher {
  private watcher?: FSWatcher | undefined;
  private readonly sourceDir: string;
  private readonly destination: string;
  private readonly logger: Logger;
  private readonly debounce: BatchingDebounce<string>;
  private running: Promise<void> | undefined;
  private queued: string[] = [];

  constructor(private readonly options: SiteWatcherOptions) {
    this.sourceDir = resolve(options.sourceDir);
    this.destination = resolve(options.destination);
    this.logger = options.logger.child("SiteWatcher");
    this.debounce = new BatchingDebounce(
      (paths) => this.schedule(paths),
      options.delayMs ?? WATCH_DELAY_MS,
    );
  }

  /**
   * Whether a path takes no part in the build: the destination and
   * dot-files
   */
  isIgnored(path: string): boolean {
    const absolute = resolve(this.sourceDir, path);
    const fromDestination = relative(this.destination, absolute);
    if (fromDestination === "" || (!fromDestination.startsWith("..") && !isAbsolute(fromDestination))) {
      return true;
    }
    const fromSource = relative(this.sourceDir, absolute);
    return fromSource.split(sep).some((segment) => segment.startsWith(".") && segment !== "..");
  }

  start(): void {
    if (this.watcher) {
      this.logger.debug("Already watching");
      return;
    }

    this.watcher = chokidar.watch(this.sourceDir, {
      ignored: (path: string) => this.isIgnored(path),
      ignoreInitial: true,
      persistent: true,
    });
    this.watcher
      .on("all", (_event, path) => this.notify(path))
      .on("error", (error) => {
        this.logger.error(`Watcher error: ${getErrorMessage(error)}`);
      });
    this.logger.info(`Watching ${this.sourceDir} for changes`);
  }

  /**
   * Record one changed path
   */
  notify(path: string): void {
    if (this.isIgnored(path)) {
      return;
    }
    const relativePath = isAbsolute(path) ? relative(this.sourceDir, path) : path;
    this.logger.debug(`Change detected: ${relativePath}`);
    this.debounce.trigger(relativePath.split(sep).join("/"));
  }

  /**
   * Resolves once the current rebuild, and any queued after it, finish
   */
  async idle(): Promise<void> {
    while (this.running) {
      await this.running;
    }
  }

  async stop(): Promise<void> {
    this.debounce.dispose();
    if (this.watcher) {
      const watcher = this.watcher;
      this.watcher = undefined;
      await watcher.close();
      this.logger.info("Stopped watching");
    }
    await this.idle();
  }

  isWatching(): boolean {
    return this.watcher !== undefined;
  }

  private schedule(paths: string[]): void {
    if (this.running) {
      this.queued.push(...paths.filter((path) => !this.queued.includes(path)));
      return;
    }
    this.running = this.rebuild(paths);
  }

  private async rebuild(paths: string[]): Promise<void> {
    let batch = paths;
    while (batch.length > 0) {
      this.logger.info(`Rebuilding after changes to ${batch.join(", ")}`);
      try {
        await this.options.onChange(batch);
      } catch (error) {
        this.logger.error(`Rebuild failed: ${getErrorMessage(error)}`);
      }
      batch = this.queued;
      this.queued = [];
    }
    this.running = undefined;
  }
}

/**
 * @folio/cli - `folio build` and `folio serve`
 */
export { runCli, flagOverrides, HELP_TEXT, type CliDeps, type CliIO } from "./cli";
export {
  parseCliArgs,
  cliOptionsSchema,
  CliUsageError,
  type CliCommand,
  type CliOptions,
} from "./args";
export { SiteWatcher, WATCH_DELAY_MS, type SiteWatcherOptions } from "./watcher";

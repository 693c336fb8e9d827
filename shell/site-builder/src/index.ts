/**
 * @folio/site-builder
 *
 * Build orchestration: settings, scan, collections, rendering, plugins,
 * output.
 */
export { SiteBuilder, type SiteBuilderDeps } from "./site-builder";
export { PluginRegistry, type PluginSelection } from "./plugin-registry";
export { buildNavigation } from "./navigation";
export { groupByTerms } from "./taxonomy";
export {
  cleanDestination,
  copyStaticFile,
  writeOutputFile,
} from "./output-writer";
export {
  SiteBuilderOptionsSchema,
  BuildResultSchema,
  type SiteBuilderOptions,
  type BuildResult,
  type BuildOutput,
  type SitePlugin,
  type PluginContext,
  type GeneratedFile,
} from "./types";

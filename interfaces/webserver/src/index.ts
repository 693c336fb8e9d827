/**
 * @folio/webserver - preview server for a built site
 */
export {
  PreviewServer,
  createPreviewApp,
  resolveCleanPath,
  type PreviewAppOptions,
} from "./server-manager";
export {
  previewServerConfigSchema,
  type PreviewServerConfig,
} from "./config";

/**
 * @folio/test-utils
 *
 * Shared test helpers: loggers and throwaway site trees.
 */

export {
  createSilentLogger,
  createMockLogger,
} from "./mock-logger";

export { createTempSite, type TempSite, type SiteFiles } from "./temp-site";

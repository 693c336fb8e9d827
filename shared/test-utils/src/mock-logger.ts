import { vi } from "vitest";
import { createSilentLogger, type Logger } from "@folio/utils";

export { createSilentLogger };

/**
 * Create a Logger whose methods are vitest spies
 *
 * `child()` returns the same logger, so calls made through child
 * loggers can be asserted on the returned instance.
 *
 * @example
 * ```typescript
 * const logger = createMockLogger();
 * const aggregator = new CollectionAggregator({ logger, collections: {} });
 * aggregator.aggregate(items);
 *
 * expect(logger.warn).toHaveBeenCalledWith(expect.stringContaining("unknown"));
 * ```
 */
export function createMockLogger(): Logger {
  const logger = createSilentLogger();

  vi.spyOn(logger, "silly");
  vi.spyOn(logger, "verbose");
  vi.spyOn(logger, "debug");
  vi.spyOn(logger, "info");
  vi.spyOn(logger, "warn");
  vi.spyOn(logger, "error");
  vi.spyOn(logger, "child").mockReturnValue(logger);

  return logger;
}

/**
 * Single point of control for the zod version used by every package.
 *
 * Avoid wildcard exports here: they make TypeScript load all of zod's
 * types and slow down the type-check considerably.
 */

export { z } from "zod";

export type { ZodIssue, output as ZodOutput } from "zod";

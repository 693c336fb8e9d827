/**
 * Standardized error message utilities for consistent error formatting
 */

/**
 * Creates a not found error message
 */
export const notFoundError = (item: string, type: string): string => {
  return `${type} "${item}" not found`;
};

/**
 * Creates a validation error message
 */
export const validationError = (field: string, reason: string): string => {
  return `Validation failed for ${field}: ${reason}`;
};

/**
 * Creates a parse error message
 */
export const parseError = (
  source: string,
  what: string,
  reason?: string,
): string => {
  return `Failed to parse ${what} in ${source}${reason ? `: ${reason}` : ""}`;
};

/**
 * Creates a duplicate error message
 */
export const duplicateError = (
  item: string,
  type: string,
  first: string,
  second: string,
): string => {
  return `Duplicate ${type} "${item}" produced by ${first} and ${second}`;
};

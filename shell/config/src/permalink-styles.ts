/**
 * Named permalink styles accepted by the `permalink` setting
 */
export const PERMALINK_STYLES: Readonly<Record<string, string>> = {
  date: "/:categories/:year/:month/:day/:title:output_ext",
  pretty: "/:categories/:year/:month/:day/:title/",
  ordinal: "/:categories/:year/:y_day/:title:output_ext",
  none: "/:categories/:title:output_ext",
};

/**
 * Expand a style name into its pattern; patterns pass through
 */
export function expandPermalinkStyle(value: string): string {
  return Object.hasOwn(PERMALINK_STYLES, value)
    ? PERMALINK_STYLES[value] ?? value
    : value;
}

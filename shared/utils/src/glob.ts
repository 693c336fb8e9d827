/**
 * fnmatch-style path matching for include/exclude lists.
 *
 * - `*` matches within one path segment
 * - `**` matches across segments
 * - `?` matches one character, `[abc]` a character class
 * - a pattern without a slash also matches the base name
 * - a pattern naming a directory matches everything below it
 */

const cache = new Map<string, RegExp>();

function escapeRegExp(char: string): string {
  return /[.+^${}()|\\]/.test(char) ? `\\${char}` : char;
}

export function globToRegExp(pattern: string): RegExp {
  const cached = cache.get(pattern);
  if (cached) {
    return cached;
  }

  let source = "";
  for (let i = 0; i < pattern.length; i++) {
    const char = pattern.charAt(i);
    if (char === "*") {
      if (pattern.charAt(i + 1) === "*") {
        // "**/" may also match zero directories
        if (pattern.charAt(i + 2) === "/") {
          source += "(?:.*/)?";
          i += 2;
        } else {
          source += ".*";
          i += 1;
        }
      } else {
        source += "[^/]*";
      }
    } else if (char === "?") {
      source += "[^/]";
    } else if (char === "[") {
      const close = pattern.indexOf("]", i + 1);
      if (close === -1) {
        source += "\\[";
      } else {
        const body = pattern.slice(i + 1, close).replace(/^!/, "^");
        source += `[${body.replace(/\\/g, "\\\\")}]`;
        i = close;
      }
    } else {
      source += escapeRegExp(char);
    }
  }

  const regex = new RegExp(`^${source}$`);
  cache.set(pattern, regex);
  return regex;
}

/**
 * Test a relative POSIX path against one pattern
 */
export function matchesGlob(path: string, pattern: string): boolean {
  const normalizedPath = path.replace(/^\.?\/+/, "");
  const normalizedPattern = pattern.replace(/^\.?\/+/, "").replace(/\/+$/, "");

  if (normalizedPattern.length === 0) {
    return false;
  }

  if (
    normalizedPath === normalizedPattern ||
    normalizedPath.startsWith(`${normalizedPattern}/`)
  ) {
    return true;
  }

  const regex = globToRegExp(normalizedPattern);
  if (regex.test(normalizedPath)) {
    return true;
  }

  if (!normalizedPattern.includes("/")) {
    return normalizedPath.split("/").some((segment) => regex.test(segment));
  }

  return false;
}

/**
 * Test a path against a list of patterns
 */
export function matchesAnyGlob(path: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => matchesGlob(path, pattern));
}

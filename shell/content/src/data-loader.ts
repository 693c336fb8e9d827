import { readdir, readFile } from "fs/promises";
import { extname, join } from "path";
import {
  ContentParseError,
  fromYaml,
  getErrorMessage,
  parseError,
} from "@folio/utils";

const DATA_EXTENSIONS = new Set([".yml", ".yaml", ".json"]);

export interface DataLoadOptions {
  /**
   * Called for a file that fails to parse; the file is then left out.
   * Without it the error is thrown.
   */
  onError?: (error: ContentParseError) => void;
  /** Prefix for reported paths, e.g. "_data" */
  basePath?: string;
}

function parseDataFile(text: string, extension: string, path: string): unknown {
  try {
    return extension === ".json" ? JSON.parse(text) : fromYaml(text, path);
  } catch (error) {
    throw new ContentParseError(
      parseError(path, "data file", getErrorMessage(error)),
      path,
    );
  }
}

/**
 * Load `_data` files into a record keyed by base name
 *
 * `_data/timeline.yml` becomes `data.timeline`; nested directories become
 * nested records (`_data/people/team.json` → `data.people.team`).
 * A missing directory yields an empty record.
 */
export async function loadDataFiles(
  dir: string,
  options: DataLoadOptions = {},
): Promise<Record<string, unknown>> {
  const basePath = options.basePath ?? "_data";
  const entries = await readdir(dir, { withFileTypes: true }).catch(
    () => null,
  );
  if (!entries) {
    return {};
  }

  const data: Record<string, unknown> = {};
  const sorted = [...entries].sort((a, b) =>
    a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
  );

  for (const entry of sorted) {
    if (entry.name.startsWith(".")) {
      continue;
    }
    const relativePath = `${basePath}/${entry.name}`;

    if (entry.isDirectory()) {
      data[entry.name] = await loadDataFiles(join(dir, entry.name), {
        ...options,
        basePath: relativePath,
      });
      continue;
    }

    const extension = extname(entry.name).toLowerCase();
    if (!entry.isFile() || !DATA_EXTENSIONS.has(extension)) {
      continue;
    }

    const text = await readFile(join(dir, entry.name), "utf-8");
    try {
      data[entry.name.slice(0, -extension.length)] = parseDataFile(
        text,
        extension,
        relativePath,
      );
    } catch (error) {
      if (options.onError && error instanceof ContentParseError) {
        options.onError(error);
        continue;
      }
      throw error;
    }
  }

  return data;
}

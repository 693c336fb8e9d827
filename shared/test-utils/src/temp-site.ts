import { mkdtemp, mkdir, readFile, rm, writeFile, readdir } from "fs/promises";
import { tmpdir } from "os";
import { dirname, join, relative } from "path";

export type SiteFiles = Record<string, string | Buffer>;

export interface TempSite {
  /** Absolute path of the site source root */
  root: string;
  /** Absolute path of a file inside the site */
  path(relativePath: string): string;
  /** Add or replace files after creation */
  write(files: SiteFiles): Promise<void>;
  /** Read a file relative to the root as UTF-8 */
  read(relativePath: string): Promise<string>;
  /** Every file below a directory, as sorted POSIX paths relative to it */
  list(relativeDir?: string): Promise<string[]>;
  cleanup(): Promise<void>;
}

async function writeFiles(root: string, files: SiteFiles): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const fullPath = join(root, relativePath);
    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, content);
  }
}

async function listFiles(dir: string, base: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(fullPath, base)));
    } else {
      files.push(relative(base, fullPath).split("\\").join("/"));
    }
  }
  return files.sort();
}

/**
 * Create a throwaway site source tree in the OS temp directory
 *
 * @example
 * ```typescript
 * const site = await createTempSite({
 *   "_config.yml": "title: Test Site\n",
 *   "index.md": "---\ntitle: Home\n---\nHello",
 * });
 * // ... build into site.path("_site")
 * await site.cleanup();
 * ```
 */
export async function createTempSite(files: SiteFiles = {}): Promise<TempSite> {
  const root = await mkdtemp(join(tmpdir(), "folio-site-"));
  await writeFiles(root, files);

  return {
    root,
    path: (relativePath: string): string => join(root, relativePath),
    write: (more: SiteFiles): Promise<void> => writeFiles(root, more),
    read: (relativePath: string): Promise<string> =>
      readFile(join(root, relativePath), "utf-8"),
    list: (relativeDir = ""): Promise<string[]> => {
      const dir = join(root, relativeDir);
      return listFiles(dir, dir);
    },
    cleanup: (): Promise<void> => rm(root, { recursive: true, force: true }),
  };
}

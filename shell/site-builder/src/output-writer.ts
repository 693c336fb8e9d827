import { copyFile, mkdir, rm, writeFile } from "fs/promises";
import { dirname, isAbsolute, join, relative, resolve } from "path";
import type { StaticFile } from "@folio/content";
import { ConfigError, SiteBuildError, getErrorMessage } from "@folio/utils";

function isInside(parent: string, child: string): boolean {
  const path = relative(parent, child);
  return path === "" || (!path.startsWith("..") && !isAbsolute(path));
}

function targetPath(destination: string, outputPath: string): string {
  return join(destination, ...outputPath.split("/"));
}

/**
 * Remove the destination directory before a build
 *
 * @throws ConfigError when the destination is the source root or one of
 * its ancestors
 */
export async function cleanDestination(
  destination: string,
  sourceDir: string,
): Promise<void> {
  const target = resolve(destination);
  if (isInside(target, resolve(sourceDir))) {
    throw new ConfigError(
      `Refusing to clean destination ${target}: it contains the source directory`,
      { destination: target, source: sourceDir },
    );
  }
  await rm(target, { recursive: true, force: true });
}

/**
 * Write one file below the destination, creating directories
 *
 * @returns the absolute path written
 */
export async function writeOutputFile(
  destination: string,
  outputPath: string,
  content: string | Buffer,
): Promise<string> {
  const target = targetPath(destination, outputPath);
  try {
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content);
  } catch (error) {
    throw new SiteBuildError(`Failed to write ${outputPath}: ${getErrorMessage(error)}`, {
      outputPath,
    });
  }
  return target;
}

/**
 * Copy a static file byte-for-byte to the same relative path
 */
export async function copyStaticFile(
  destination: string,
  file: StaticFile,
): Promise<string> {
  const target = targetPath(destination, file.relativePath);
  try {
    await mkdir(dirname(target), { recursive: true });
    await copyFile(file.sourcePath, target);
  } catch (error) {
    throw new SiteBuildError(
      `Failed to copy ${file.relativePath}: ${getErrorMessage(error)}`,
      { sourcePath: file.sourcePath },
    );
  }
  return target;
}

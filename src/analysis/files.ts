/**
 * Selection of files worth sending for review.
 */

import { readdir } from "fs/promises";
import * as path from "path";
import { LoadedConfig, createDefaultConfig } from "../config/loader";

export const REVIEWABLE_EXTENSIONS = new Set([
  ".py",
  ".js",
  ".ts",
  ".jsx",
  ".tsx",
  ".java",
  ".go",
  ".rs",
  ".rb",
  ".php",
]);

const SKIPPED_DIRECTORIES = new Set(["node_modules", "venv", "__pycache__", "dist", "build"]);

/**
 * Check if a file has an extension we review.
 */
export function isReviewableFile(filename: string): boolean {
  const dot = filename.lastIndexOf(".");
  if (dot === -1) {
    return false;
  }
  return REVIEWABLE_EXTENSIONS.has(filename.substring(dot).toLowerCase());
}

function isSkippedDirectory(name: string): boolean {
  return name.startsWith(".") || SKIPPED_DIRECTORIES.has(name);
}

/**
 * Walk a directory and return reviewable files, sorted. Dot-directories,
 * dependency and build output directories, and paths ignored by the config
 * (relative to `rootDir`) are skipped.
 */
export async function collectReviewFiles(
  rootDir: string,
  config: LoadedConfig = createDefaultConfig()
): Promise<string[]> {
  const found: string[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!isSkippedDirectory(entry.name)) {
          await walk(fullPath);
        }
      } else if (entry.isFile() && isReviewableFile(entry.name)) {
        const relative = path.relative(rootDir, fullPath);
        if (!config.isFileIgnored(relative)) {
          found.push(fullPath);
        }
      }
    }
  }

  await walk(rootDir);
  return found.sort();
}

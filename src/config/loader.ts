/**
 * Configuration loader.
 *
 * Loads .codecritic.yml from a directory or a string, applies defaults and
 * exposes the ignore matcher. Invalid values are replaced by their defaults
 * with a warning; a file that fails to parse yields the default config.
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { minimatch } from "minimatch";
import { logger, errorMessage } from "../logger";
import { isReviewType } from "../review/types";
import {
  CONFIG_FILE_NAME,
  CodecriticConfig,
  DEFAULT_FILES_CONFIG,
  DEFAULT_REVIEW_CONFIG,
  RequiredFilesConfig,
  RequiredReviewConfig,
} from "./schema";

/**
 * The loaded and resolved configuration with helper methods.
 */
export interface LoadedConfig {
  /**
   * The validated configuration as written (or empty if no file found).
   */
  raw: CodecriticConfig;

  review: RequiredReviewConfig;

  files: RequiredFilesConfig;

  /**
   * Check if a file should be skipped.
   * @param filePath - Path relative to the repository root
   */
  isFileIgnored(filePath: string): boolean;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function positiveInteger(value: unknown, field: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === "number" && Number.isInteger(value) && value > 0) {
    return value;
  }
  logger.warn(`[Config] Ignoring invalid ${field}, expected a positive integer`, { value });
  return undefined;
}

/**
 * Keep only the recognised, well-typed parts of a parsed YAML document.
 */
export function validateConfig(parsed: unknown): CodecriticConfig {
  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    logger.warn(`[Config] ${CONFIG_FILE_NAME} must contain a mapping, using defaults`);
    return {};
  }

  const result: CodecriticConfig = {};

  if (typeof parsed.version === "number") {
    result.version = parsed.version;
  }

  if (isPlainObject(parsed.review)) {
    const type = parsed.review.type;
    if (typeof type === "string" && isReviewType(type)) {
      result.review = { type };
    } else if (type !== undefined) {
      logger.warn("[Config] Ignoring unknown review.type", { value: type });
    }
  }

  if (isPlainObject(parsed.files)) {
    const files = parsed.files;
    const ignore = Array.isArray(files.ignore)
      ? files.ignore.filter((pattern): pattern is string => typeof pattern === "string")
      : undefined;

    result.files = {
      ignore,
      max_files: positiveInteger(files.max_files, "files.max_files"),
      max_patch_chars: positiveInteger(files.max_patch_chars, "files.max_patch_chars"),
    };
  }

  return result;
}

/**
 * Build a LoadedConfig from validated raw configuration.
 */
function buildLoadedConfig(rawConfig: CodecriticConfig): LoadedConfig {
  const review: RequiredReviewConfig = {
    type: rawConfig.review?.type ?? DEFAULT_REVIEW_CONFIG.type,
  };

  const files: RequiredFilesConfig = {
    ignore: rawConfig.files?.ignore ?? DEFAULT_FILES_CONFIG.ignore,
    max_files: rawConfig.files?.max_files ?? DEFAULT_FILES_CONFIG.max_files,
    max_patch_chars: rawConfig.files?.max_patch_chars ?? DEFAULT_FILES_CONFIG.max_patch_chars,
  };

  function isFileIgnored(filePath: string): boolean {
    const normalizedPath = filePath.replace(/\\/g, "/");
    return files.ignore.some((pattern) => minimatch(normalizedPath, pattern, { dot: true }));
  }

  return {
    raw: rawConfig,
    review,
    files,
    isFileIgnored,
  };
}

/**
 * Load configuration from a YAML string. Does not touch the filesystem.
 */
export function loadConfigFromString(yamlContent: string): LoadedConfig {
  try {
    return buildLoadedConfig(validateConfig(yaml.load(yamlContent)));
  } catch (err) {
    logger.warn(`[Config] Failed to parse ${CONFIG_FILE_NAME}, using defaults`, {
      error: errorMessage(err),
    });
    return createDefaultConfig();
  }
}

/**
 * Load configuration from a directory (normally a repository root).
 */
export function loadConfig(rootDir: string): LoadedConfig {
  const configPath = path.join(rootDir, CONFIG_FILE_NAME);
  if (!fs.existsSync(configPath)) {
    return createDefaultConfig();
  }
  return loadConfigFromString(fs.readFileSync(configPath, "utf-8"));
}

/**
 * Default configuration, used when no file is available.
 */
export function createDefaultConfig(): LoadedConfig {
  return buildLoadedConfig({});
}

/**
 * Configuration schema for .codecritic.yml files.
 *
 * The file is optional and lives at the repository root. It tunes which
 * files are reviewed and how the model is asked.
 */

import { ReviewType } from "../review/types";

/**
 * Review options.
 */
export interface CodecriticReviewConfig {
  /**
   * Review type used by the pull request integration and the CLI default.
   * Default: "full"
   */
  type?: ReviewType;
}

/**
 * File selection options.
 */
export interface CodecriticFilesConfig {
  /**
   * Glob patterns for files that should never be reviewed.
   * Example: ["dist/**", "vendor/**"]
   */
  ignore?: string[];

  /**
   * Maximum number of files reviewed per pull request.
   * Default: 20
   */
  max_files?: number;

  /**
   * Patches longer than this are truncated before review.
   * Default: 4000
   */
  max_patch_chars?: number;
}

export interface CodecriticConfig {
  version?: number;
  review?: CodecriticReviewConfig;
  files?: CodecriticFilesConfig;
}

export type RequiredReviewConfig = Required<CodecriticReviewConfig>;
export type RequiredFilesConfig = Required<CodecriticFilesConfig>;

export const DEFAULT_REVIEW_CONFIG: RequiredReviewConfig = {
  type: "full",
};

export const DEFAULT_FILES_CONFIG: RequiredFilesConfig = {
  ignore: [],
  max_files: 20,
  max_patch_chars: 4000,
};

export const CONFIG_FILE_NAME = ".codecritic.yml";

#!/usr/bin/env node
/**
 * Command line interface.
 *
 * Usage:
 *   codecritic review <path> [--type full|security|quick] [--output report.md|report.json] [--verbose]
 *   codecritic check "<code>" [--language python]
 *   codecritic languages
 *   codecritic version
 */

import chalk from "chalk";
import { stat, writeFile } from "fs/promises";
import * as path from "path";
import { parseArgs } from "util";
import { config } from "./env";
import { CodeAnalyzer } from "./analysis/analyzer";
import { listSupportedLanguages } from "./analysis/detector";
import { collectReviewFiles } from "./analysis/files";
import { qualityLabel, scoreFileReview } from "./analysis/scoring";
import { loadConfig } from "./config/loader";
import { ConfigurationError } from "./errors";
import { createLlmClient, resolveLlmSettings } from "./integrations/llm";
import { errorMessage } from "./logger";
import { formatLineRange, renderJsonReport, renderMarkdownReport } from "./report";
import { FileReview, ReviewResult, ReviewType, Severity, isReviewType } from "./review/types";
import { VERSION } from "./version";

export const EXIT_OK = 0;
export const EXIT_CRITICAL = 1;
export const EXIT_USAGE = 2;

const USAGE = `Usage:
  codecritic review <path> [--type full|security|quick] [--output <file.json|file.md>] [--verbose]
  codecritic check "<code>" [--language <language>]
  codecritic languages
  codecritic version`;

export interface CliDeps {
  createAnalyzer(): CodeAnalyzer;
  print(line: string): void;
}

const defaultDeps: CliDeps = {
  createAnalyzer: () => new CodeAnalyzer(createLlmClient(resolveLlmSettings(config))),
  print: (line) => console.log(line),
};

const SEVERITY_COLORS: Record<Severity, (text: string) => string> = {
  critical: (text) => chalk.bgRed.white.bold(text),
  high: (text) => chalk.red.bold(text),
  medium: (text) => chalk.yellow(text),
  low: (text) => chalk.blue(text),
  info: (text) => chalk.gray(text),
};

function scoreColor(score: number): (text: string) => string {
  if (score >= 75) return chalk.green;
  if (score >= 40) return chalk.yellow;
  return chalk.red;
}

export function formatFileReview(review: FileReview): string[] {
  const score = scoreFileReview(review);
  const lines: string[] = [];

  lines.push(
    `${chalk.bold(review.filename)} ${chalk.dim(`(${review.language}, ${review.linesOfCode} lines)`)} ` +
      scoreColor(score)(`${score}/100`)
  );
  if (review.summary) {
    lines.push(chalk.dim(`  ${review.summary}`));
  }
  if (review.issues.length === 0) {
    lines.push(chalk.green("  ✓ No issues found"));
  }

  for (const issue of review.issues) {
    const location = formatLineRange(issue);
    const where = location ? chalk.dim(` line ${location}`) : "";
    lines.push(`  ${SEVERITY_COLORS[issue.severity](` ${issue.severity.toUpperCase()} `)} ${issue.title}${where}`);
    lines.push(`    ${issue.description}`);
    if (issue.suggestion) {
      lines.push(chalk.cyan(`    → ${issue.suggestion}`));
    }
  }
  return lines;
}

export function formatReviewResult(result: ReviewResult): string[] {
  const lines: string[] = [];
  for (const file of result.files) {
    lines.push(...formatFileReview(file), "");
  }

  const score = result.overallScore ?? 100;
  const breakdown = result.severityBreakdown;
  lines.push(chalk.bold("Summary"));
  lines.push(`  Score: ${scoreColor(score)(`${score}/100 (${qualityLabel(score)})`)}`);
  lines.push(
    `  Issues: ${result.totalIssues} ` +
      chalk.dim(
        `(critical ${breakdown.critical}, high ${breakdown.high}, medium ${breakdown.medium}, low ${breakdown.low}, info ${breakdown.info})`
      )
  );
  if (result.overallSummary) {
    lines.push(`  ${result.overallSummary}`);
  }
  lines.push(chalk.dim(`  Reviewed ${result.files.length} file(s) in ${result.reviewTimeMs} ms`));
  return lines;
}

function resolveReviewType(value: string | undefined, fallback: ReviewType): ReviewType | null {
  if (value === undefined) {
    return fallback;
  }
  return isReviewType(value) ? value : null;
}

async function writeReport(result: ReviewResult, output: string, deps: CliDeps): Promise<void> {
  const ext = path.extname(output).toLowerCase();
  if (ext === ".json") {
    await writeFile(output, renderJsonReport(result), "utf-8");
  } else if (ext === ".md") {
    await writeFile(output, renderMarkdownReport(result), "utf-8");
  } else {
    deps.print(chalk.yellow("⚠️ Unsupported output format. Use .json or .md"));
    return;
  }
  deps.print(chalk.green(`✅ Results saved to ${output}`));
}

async function runReview(
  target: string | undefined,
  options: { type?: string; output?: string; verbose?: boolean },
  deps: CliDeps
): Promise<number> {
  if (!target) {
    deps.print(chalk.red("Missing path to review"));
    deps.print(USAGE);
    return EXIT_USAGE;
  }

  let isDirectory: boolean;
  try {
    isDirectory = (await stat(target)).isDirectory();
  } catch (err) {
    deps.print(chalk.red(`❌ Path not found: ${target} (${errorMessage(err)})`));
    return EXIT_USAGE;
  }

  const repoConfig = isDirectory ? loadConfig(target) : undefined;
  const reviewType = resolveReviewType(options.type, repoConfig?.review.type ?? "full");
  if (!reviewType) {
    deps.print(chalk.red(`Unknown review type "${options.type}". Use full, security or quick.`));
    return EXIT_USAGE;
  }

  if (options.verbose) {
    deps.print(chalk.bold.cyan(`codecritic ${VERSION}`));
  }

  const analyzer = deps.createAnalyzer();
  deps.print(chalk.cyan(`🔍 Starting ${reviewType} review...`));

  let result: ReviewResult;
  if (repoConfig) {
    const files = await collectReviewFiles(target, repoConfig);
    if (files.length === 0) {
      deps.print(chalk.yellow("⚠️ No supported files found to review."));
      return EXIT_OK;
    }
    deps.print(chalk.dim(`Found ${files.length} file(s) to review`));
    result = await analyzer.reviewMultiple(files, reviewType);
  } else {
    result = await analyzer.reviewSingleFile(target, reviewType);
  }

  deps.print("");
  for (const line of formatReviewResult(result)) {
    deps.print(line);
  }

  if (options.output) {
    await writeReport(result, options.output, deps);
  }

  return result.severityBreakdown.critical > 0 ? EXIT_CRITICAL : EXIT_OK;
}

async function runCheck(code: string | undefined, language: string, deps: CliDeps): Promise<number> {
  if (!code) {
    deps.print(chalk.red("Missing code snippet"));
    deps.print(USAGE);
    return EXIT_USAGE;
  }

  const analyzer = deps.createAnalyzer();
  const review = await analyzer.reviewCode({ code, language, reviewType: "quick" });
  for (const line of formatFileReview(review)) {
    deps.print(line);
  }
  return review.issues.some((issue) => issue.severity === "critical") ? EXIT_CRITICAL : EXIT_OK;
}

function runLanguages(deps: CliDeps): number {
  deps.print(chalk.bold("Supported languages"));
  for (const language of listSupportedLanguages()) {
    deps.print(`  ${language.name.padEnd(12)} ${chalk.dim(language.extensions.join(", "))}`);
  }
  return EXIT_OK;
}

export async function main(argv: string[], deps: CliDeps = defaultDeps): Promise<number> {
  let parsed;
  try {
    parsed = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        type: { type: "string", short: "t" },
        output: { type: "string", short: "o" },
        verbose: { type: "boolean", short: "v" },
        language: { type: "string", short: "l" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (err) {
    deps.print(chalk.red(errorMessage(err)));
    deps.print(USAGE);
    return EXIT_USAGE;
  }

  const { values, positionals } = parsed;
  const [command, argument] = positionals;

  if (values.help || !command) {
    deps.print(USAGE);
    return command || values.help ? EXIT_OK : EXIT_USAGE;
  }

  try {
    switch (command) {
      case "review":
        return await runReview(argument, values, deps);
      case "check":
        return await runCheck(argument, values.language ?? "python", deps);
      case "languages":
        return runLanguages(deps);
      case "version":
        deps.print(`codecritic ${VERSION}`);
        return EXIT_OK;
      default:
        deps.print(chalk.red(`Unknown command "${command}"`));
        deps.print(USAGE);
        return EXIT_USAGE;
    }
  } catch (err) {
    if (err instanceof ConfigurationError) {
      deps.print(chalk.red(`❌ Configuration error: ${err.message}`));
      deps.print(chalk.dim("Set your API key in the environment or a .env file"));
      return EXIT_USAGE;
    }
    deps.print(chalk.red(`❌ ${errorMessage(err)}`));
    return EXIT_USAGE;
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = EXIT_USAGE;
    }
  );
}

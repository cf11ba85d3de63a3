/**
 * Markdown and JSON renderings of a review, used by the CLI `--output` flag
 * and by pull request comments.
 */

import { qualityLabel, scoreFileReview } from "./analysis/scoring";
import { FileReview, Issue, ReviewResult, SEVERITIES, Severity } from "./review/types";

export const SEVERITY_ICONS: Record<Severity, string> = {
  critical: "🔴",
  high: "🟠",
  medium: "🟡",
  low: "🔵",
  info: "⚪",
};

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/**
 * "12", "12-15", or undefined when the issue has no line information.
 */
export function formatLineRange(issue: Issue): string | undefined {
  if (issue.lineStart === undefined) {
    return undefined;
  }
  if (issue.lineEnd !== undefined && issue.lineEnd !== issue.lineStart) {
    return `${issue.lineStart}-${issue.lineEnd}`;
  }
  return String(issue.lineStart);
}

function renderIssue(issue: Issue, language: string): string {
  let body = `#### ${SEVERITY_ICONS[issue.severity]} [${issue.severity.toUpperCase()}] ${issue.title}\n\n`;
  body += `- **Category:** ${issue.category}\n`;
  const lines = formatLineRange(issue);
  if (lines) {
    body += `- **Lines:** ${lines}\n`;
  }
  body += `\n${issue.description}\n`;

  if (issue.codeSnippet) {
    body += `\n\`\`\`${language}\n${issue.codeSnippet}\n\`\`\`\n`;
  }
  if (issue.suggestion) {
    body += `\n**Suggestion:** ${issue.suggestion}\n`;
  }
  if (issue.suggestedCode) {
    body += `\n\`\`\`${language}\n${issue.suggestedCode}\n\`\`\`\n`;
  }
  return body;
}

function renderFile(file: FileReview): string {
  const score = scoreFileReview(file);
  let body = `### \`${file.filename}\`\n\n`;
  body += `_${file.language}, ${file.linesOfCode} lines, score ${score}/100_\n\n`;

  if (file.summary) {
    body += `${file.summary}\n\n`;
  }

  if (file.issues.length === 0) {
    body += `_No issues found._\n`;
    return body;
  }

  body += file.issues.map((issue) => renderIssue(issue, file.language)).join("\n");
  return body;
}

export interface MarkdownReportOptions {
  title?: string;
}

export function renderMarkdownReport(result: ReviewResult, options: MarkdownReportOptions = {}): string {
  const title = options.title ?? "Code Review Report";
  const breakdown = result.severityBreakdown;

  let body = `## ${title}\n\n`;
  if (result.overallScore !== undefined) {
    body += `**Quality Score: ${result.overallScore}/100 (${qualityLabel(result.overallScore)})**\n\n`;
  }
  body += `Files reviewed: ${result.files.length} · Issues: ${result.totalIssues} · Review time: ${result.reviewTimeMs} ms\n\n`;

  if (result.overallSummary) {
    body += `> ${result.overallSummary}\n\n`;
  }

  body += `| Severity | Count |\n|---|---|\n`;
  for (const severity of SEVERITIES) {
    body += `| ${SEVERITY_ICONS[severity]} ${capitalize(severity)} | ${breakdown[severity]} |\n`;
  }
  body += `\n`;

  body += result.files.map(renderFile).join("\n");
  return body;
}

export function renderJsonReport(result: ReviewResult): string {
  return JSON.stringify(result, null, 2);
}

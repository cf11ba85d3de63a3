/**
 * Pull request comment builder.
 */

import { renderMarkdownReport } from "../../report";
import { ReviewResult } from "../../review/types";

export const COMMENT_TITLE = "🤖 codecritic review";
export const COMMENT_FOOTER = "---\n_Automated code review by codecritic. Findings are model-generated; verify before acting._";

export function buildReviewCommentBody(result: ReviewResult, skippedFiles = 0): string {
  let body = renderMarkdownReport(result, { title: COMMENT_TITLE });
  if (skippedFiles > 0) {
    body += `\n_${skippedFiles} file(s) were not reviewed (no patch, unsupported type, ignored, or over the file limit)._\n`;
  }
  return `${body}\n${COMMENT_FOOTER}\n`;
}

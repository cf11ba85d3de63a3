/**
 * Prompt builder for code reviews.
 */

import { ReviewType } from "../../review/types";
import { PromptPair, ReviewRequest } from "./types";

const REVIEWER_PERSONA =
  "You are an expert code reviewer. Analyze code for bugs, security issues, performance problems and best practices.";

const REVIEW_FOCUS: Record<ReviewType, string> = {
  full: "Perform a comprehensive review covering security, bugs, performance, style and best practices.",
  security:
    "Focus on security vulnerabilities only: injection, XSS, hardcoded secrets, authentication and authorization flaws, unsafe deserialization.",
  quick: "List only the 3-5 most important issues. Be brief.",
};

/**
 * The response shape the parser expects. Identical for every review type.
 */
export const RESPONSE_FORMAT = `{
  "summary": "brief overall assessment",
  "quality_score": 85,
  "issues": [
    {
      "title": "short issue name",
      "description": "what is wrong and why it matters",
      "severity": "critical" | "high" | "medium" | "low" | "info",
      "category": "security" | "bug" | "performance" | "style" | "best_practice" | "documentation",
      "line_start": 1,
      "line_end": 1,
      "code_snippet": "the offending code",
      "suggestion": "how to fix it",
      "suggested_code": "the fixed code"
    }
  ]
}`;

export function buildSystemPrompt(reviewType: ReviewType): string {
  return `${REVIEWER_PERSONA} ${REVIEW_FOCUS[reviewType]} Always respond with valid JSON only, no markdown.`;
}

export function buildReviewPrompt(request: ReviewRequest): PromptPair {
  const { code, language, filename, reviewType } = request;

  const user = `Review this ${language} code from file: ${filename}

\`\`\`${language}
${code}
\`\`\`

Respond ONLY with a JSON object in this exact format (no markdown, no extra text):

${RESPONSE_FORMAT}

Use "line_start"/"line_end" for the 1-based lines the issue refers to. Omit optional fields you cannot fill. Return an empty "issues" array if the code has no problems.`;

  return { system: buildSystemPrompt(reviewType), user };
}

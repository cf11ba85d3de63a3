import { formatLineRange, renderJsonReport, renderMarkdownReport } from "../src/report";
import { buildReviewCommentBody, COMMENT_FOOTER } from "../src/integrations/github";
import { Issue, ReviewResult } from "../src/review/types";

const injection: Issue = {
  title: "SQL injection",
  description: "User input is concatenated into SQL.",
  severity: "critical",
  category: "security",
  lineStart: 4,
  lineEnd: 6,
  codeSnippet: "cur.execute(q + name)",
  suggestion: "Use query parameters",
  suggestedCode: "cur.execute(q, (name,))",
};

function sampleResult(): ReviewResult {
  const result = new ReviewResult("abc12345", new Date("2026-01-01T00:00:00Z"));
  result.addFileReview({
    filename: "app.py",
    language: "python",
    linesOfCode: 10,
    issues: [injection],
    summary: "Builds SQL by hand",
  });
  result.addFileReview({ filename: "ok.js", language: "javascript", linesOfCode: 3, issues: [] });
  result.reviewTimeMs = 42;
  result.overallScore = 75;
  result.overallSummary = "Found 1 issue: 1 critical. ⚠️ Critical issues require immediate attention!";
  return result;
}

describe("formatLineRange", () => {
  it("should format single lines and ranges", () => {
    expect(formatLineRange(injection)).toBe("4-6");
    expect(formatLineRange({ ...injection, lineEnd: undefined })).toBe("4");
    expect(formatLineRange({ ...injection, lineEnd: 4 })).toBe("4");
    expect(formatLineRange({ ...injection, lineStart: undefined })).toBeUndefined();
  });
});

describe("renderMarkdownReport", () => {
  const lines = renderMarkdownReport(sampleResult()).split("\n");

  it("should start with the title, score and stats", () => {
    expect(lines[0]).toBe("## Code Review Report");
    expect(lines).toContain("**Quality Score: 75/100 (Good)**");
    expect(lines).toContain("Files reviewed: 2 · Issues: 1 · Review time: 42 ms");
    expect(lines).toContain("> Found 1 issue: 1 critical. ⚠️ Critical issues require immediate attention!");
  });

  it("should include a severity table", () => {
    expect(lines).toContain("| 🔴 Critical | 1 |");
    expect(lines).toContain("| 🟠 High | 0 |");
    expect(lines).toContain("| ⚪ Info | 0 |");
  });

  it("should render each issue with its details", () => {
    expect(lines).toContain("### `app.py`");
    expect(lines).toContain("_python, 10 lines, score 75/100_");
    expect(lines).toContain("Builds SQL by hand");
    expect(lines).toContain("#### 🔴 [CRITICAL] SQL injection");
    expect(lines).toContain("- **Category:** security");
    expect(lines).toContain("- **Lines:** 4-6");
    expect(lines).toContain("**Suggestion:** Use query parameters");
    expect(lines).toContain("cur.execute(q, (name,))");
  });

  it("should mark files without issues", () => {
    expect(lines).toContain("### `ok.js`");
    expect(lines).toContain("_No issues found._");
  });

  it("should accept a custom title", () => {
    expect(renderMarkdownReport(sampleResult(), { title: "PR review" }).startsWith("## PR review\n")).toBe(true);
  });
});

describe("renderJsonReport", () => {
  it("should serialize the review result", () => {
    const json = JSON.parse(renderJsonReport(sampleResult()));

    expect(json.id).toBe("abc12345");
    expect(json.timestamp).toBe("2026-01-01T00:00:00.000Z");
    expect(json.totalIssues).toBe(1);
    expect(json.overallScore).toBe(75);
    expect(json.severityBreakdown).toEqual({ critical: 1, high: 0, medium: 0, low: 0, info: 0 });
    expect(json.files[0].issues[0].lineStart).toBe(4);
    expect(json.files[1].issues).toEqual([]);
  });
});

describe("buildReviewCommentBody", () => {
  it("should wrap the report with the comment title and footer", () => {
    const body = buildReviewCommentBody(sampleResult());

    expect(body.startsWith("## 🤖 codecritic review\n")).toBe(true);
    expect(body.endsWith(`\n${COMMENT_FOOTER}\n`)).toBe(true);
    expect(body).not.toContain("were not reviewed");
  });

  it("should mention skipped files", () => {
    const body = buildReviewCommentBody(sampleResult(), 2);

    expect(body).toContain(
      "_2 file(s) were not reviewed (no patch, unsupported type, ignored, or over the file limit)._"
    );
  });
});

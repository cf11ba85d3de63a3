/**
 * HTTP tests against an in-process server on an ephemeral port.
 */

import { Server } from "http";
import { CodeAnalyzer } from "../src/analysis/analyzer";
import { listSupportedLanguages } from "../src/analysis/detector";
import { TransportError } from "../src/errors";
import { createWebhooks, registerEventHandlers } from "../src/integrations/github";
import { AppDeps, WEBHOOK_PATH, createApp, validateReviewBody } from "../src/server";
import { VERSION } from "../src/version";
import { EMPTY_REVIEW, FakeLlmClient, FakePullRequestGateway, reviewJson } from "./helpers/fakes";

const WEBHOOK_SECRET = "test-secret";

interface RunningServer {
  server: Server;
  baseUrl: string;
}

function start(deps: AppDeps): Promise<RunningServer> {
  return new Promise((resolve, reject) => {
    const server = createApp(deps).listen(0, "127.0.0.1", () => {
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new Error("Server is not listening on a TCP port"));
        return;
      }
      resolve({ server, baseUrl: `http://127.0.0.1:${address.port}` });
    });
  });
}

function stop(running: RunningServer): Promise<void> {
  return new Promise((resolve, reject) => {
    running.server.close((err) => (err ? reject(err) : resolve()));
  });
}

function postJson(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  });
}

const pullRequestPayload = {
  action: "opened",
  number: 12,
  installation: { id: 4242 },
  repository: {
    name: "shop",
    full_name: "octo-org/shop",
    owner: { login: "octo-org" },
  },
  pull_request: {
    head: { ref: "feature/cart", sha: "abc123" },
  },
};

describe("validateReviewBody", () => {
  it("should accept a minimal body and default the review type", () => {
    expect(validateReviewBody({ code: "x = 1" })).toEqual({
      ok: true,
      value: { code: "x = 1", filename: undefined, language: undefined, reviewType: "full" },
    });
  });

  it("should let a forced type win over the body", () => {
    const result = validateReviewBody({ code: "x", review_type: "quick" }, "security");

    expect(result.ok && result.value.reviewType).toBe("security");
  });

  it("should reject bad input", () => {
    expect(validateReviewBody(null)).toEqual({ ok: false, error: "Request body must be a JSON object" });
    expect(validateReviewBody({ code: "" })).toEqual({ ok: false, error: "code must be a non-empty string" });
    expect(validateReviewBody({ code: "x", filename: 3 })).toEqual({ ok: false, error: "filename must be a string" });
    expect(validateReviewBody({ code: "x", review_type: "deep" })).toEqual({
      ok: false,
      error: "review_type must be one of: full, security, quick",
    });
  });
});

describe("HTTP API", () => {
  const client = new FakeLlmClient((request) => {
    if (request.code.includes("explode")) {
      throw new TransportError("LLM request failed: upstream down", { status: 503 });
    }
    return reviewJson(
      [{ title: "Missing docstring", description: "f has no docstring", severity: "medium", category: "documentation" }],
      "Tiny function"
    );
  });
  const gateway = new FakePullRequestGateway([{ filename: "src/cart.py", patch: "+total = 0" }]);
  const webhooks = createWebhooks(WEBHOOK_SECRET);
  const gatewayCalls: Array<number | undefined> = [];
  let running: RunningServer;

  beforeAll(async () => {
    const analyzer = new CodeAnalyzer(client);
    registerEventHandlers(webhooks, {
      analyzer,
      gatewayFor: (installationId) => {
        gatewayCalls.push(installationId);
        return gateway;
      },
    });
    running = await start({ analyzer, webhooks });
  });

  afterAll(async () => {
    await stop(running);
  });

  it("GET /health reports status, provider and webhook state", async () => {
    const res = await fetch(`${running.baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: "healthy",
      version: VERSION,
      llmProvider: "groq",
      model: "test-model",
      webhooks: "enabled",
    });
  });

  it("POST /api/review returns the file review", async () => {
    const res = await postJson(`${running.baseUrl}/api/review`, {
      code: "def f():\n    return 1\n",
      filename: "f.py",
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      id: expect.stringMatching(/^[0-9a-f]{8}$/),
      filename: "f.py",
      language: "python",
      linesOfCode: 2,
      totalIssues: 1,
      qualityScore: 92,
      summary: "Tiny function",
      issues: [
        { title: "Missing docstring", description: "f has no docstring", severity: "medium", category: "documentation" },
      ],
      reviewTimeMs: expect.any(Number),
    });
  });

  it("POST /api/review/security forces the review type", async () => {
    const before = client.requests.length;

    const res = await postJson(`${running.baseUrl}/api/review/security`, { code: "x = 1", review_type: "quick" });

    expect(res.status).toBe(200);
    expect(client.requests[before].reviewType).toBe("security");
  });

  it("POST /api/review/quick forces the review type", async () => {
    const before = client.requests.length;

    await postJson(`${running.baseUrl}/api/review/quick`, { code: "x = 1" });

    expect(client.requests[before].reviewType).toBe("quick");
  });

  it("POST /api/review rejects an invalid body", async () => {
    const res = await postJson(`${running.baseUrl}/api/review`, { filename: "a.py" });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "code must be a non-empty string" });
  });

  it("POST /api/review answers 500 when the model call fails", async () => {
    const res = await postJson(`${running.baseUrl}/api/review`, { code: "explode()" });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "Review failed: LLM request failed: upstream down" });
  });

  it("GET /api/languages lists supported languages", async () => {
    const res = await fetch(`${running.baseUrl}/api/languages`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ languages: listSupportedLanguages() });
  });

  it("GET /api/detect-language detects from filename or code", async () => {
    const byName = await fetch(`${running.baseUrl}/api/detect-language?filename=main.go`);
    expect(await byName.json()).toEqual({ language: "go", filename: "main.go" });

    const byCode = await fetch(`${running.baseUrl}/api/detect-language?code=${encodeURIComponent("const a = 1")}`);
    expect(await byCode.json()).toEqual({ language: "javascript", filename: null });
  });

  it("GET /api/detect-language requires a parameter", async () => {
    const res = await fetch(`${running.baseUrl}/api/detect-language`);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Provide either filename or code parameter" });
  });

  describe("webhook", () => {
    function deliver(payload: string, headers: Record<string, string>): Promise<Response> {
      return fetch(`${running.baseUrl}${WEBHOOK_PATH}`, {
        method: "POST",
        headers: { "content-type": "application/json", "x-github-delivery": "delivery-1", ...headers },
        body: payload,
      });
    }

    it("rejects a delivery without a signature", async () => {
      const res = await deliver(JSON.stringify(pullRequestPayload), { "x-github-event": "pull_request" });

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: "Invalid signature" });
    });

    it("rejects a delivery with a wrong signature", async () => {
      const payload = JSON.stringify(pullRequestPayload);
      const signature = await createWebhooks("other-secret").sign(payload);

      const res = await deliver(payload, { "x-github-event": "pull_request", "x-hub-signature-256": signature });

      expect(res.status).toBe(401);
    });

    it("rejects an unknown event name", async () => {
      const payload = JSON.stringify(pullRequestPayload);
      const signature = await webhooks.sign(payload);

      const res = await deliver(payload, { "x-github-event": "not_an_event", "x-hub-signature-256": signature });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Unknown or missing event name" });
    });

    it("acknowledges a signed pull request event and posts a review", async () => {
      const payload = JSON.stringify(pullRequestPayload);
      const signature = await webhooks.sign(payload);
      const commentPosted = gateway.nextComment();

      const res = await deliver(payload, { "x-github-event": "pull_request", "x-hub-signature-256": signature });

      expect(res.status).toBe(202);
      expect(await res.json()).toEqual({ ok: true });

      const comment = await commentPosted;
      expect(comment).toContain("### `src/cart.py`");
      expect(gatewayCalls).toEqual([4242]);
    });
  });
});

describe("HTTP API without webhooks", () => {
  let running: RunningServer;

  beforeAll(async () => {
    running = await start({
      analyzer: new CodeAnalyzer(new FakeLlmClient(() => EMPTY_REVIEW)),
      rateLimit: { windowMs: 60_000, limit: 2 },
    });
  });

  afterAll(async () => {
    await stop(running);
  });

  it("answers 503 on the webhook route", async () => {
    const res = await fetch(`${running.baseUrl}${WEBHOOK_PATH}`, { method: "POST", body: "{}" });

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({ error: "Webhooks not configured" });
  });

  it("reports webhooks as disabled", async () => {
    const res = await fetch(`${running.baseUrl}/health`);

    expect(await res.json()).toMatchObject({ webhooks: "disabled" });
  });

  it("rate limits clients but not the health check", async () => {
    // The webhook request above used one slot of the two
    const allowed = await fetch(`${running.baseUrl}/api/languages`);
    const limited = await fetch(`${running.baseUrl}/api/languages`);
    const health = await fetch(`${running.baseUrl}/health`);

    expect(allowed.status).toBe(200);
    expect(limited.status).toBe(429);
    expect(await limited.json()).toEqual({ error: "Too many requests, please try again later" });
    expect(health.status).toBe(200);
  });
});

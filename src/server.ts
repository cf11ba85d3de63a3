/**
 * HTTP surface: review endpoints, language utilities and the GitHub webhook.
 */

import express, { Express, NextFunction, Request, Response } from "express";
import bodyParser from "body-parser";
import rateLimit from "express-rate-limit";
import { randomUUID } from "crypto";
import { Webhooks } from "@octokit/webhooks";
import { CodeAnalyzer } from "./analysis/analyzer";
import { detectLanguage, listSupportedLanguages } from "./analysis/detector";
import { scoreFileReview } from "./analysis/scoring";
import { httpStatusOf } from "./errors";
import { isWebhookEventName } from "./integrations/github";
import { errorMessage, logger } from "./logger";
import { ReviewType, isReviewType } from "./review/types";
import { VERSION } from "./version";

export const WEBHOOK_PATH = "/webhook/github";

export interface AppDeps {
  analyzer: CodeAnalyzer;
  /** Signature-verifying webhook receiver; the webhook route answers 503 without it. */
  webhooks?: Webhooks;
  rateLimit?: { windowMs: number; limit: number };
}

interface ReviewBody {
  code: string;
  filename?: string;
  language?: string;
  reviewType: ReviewType;
}

type Validation<T> = { ok: true; value: T } | { ok: false; error: string };

function optionalStringField(body: Record<string, unknown>, field: string): Validation<string | undefined> {
  const value = body[field];
  if (value === undefined || value === null) {
    return { ok: true, value: undefined };
  }
  if (typeof value !== "string") {
    return { ok: false, error: `${field} must be a string` };
  }
  return { ok: true, value: value || undefined };
}

/**
 * Validate a review request body. `forcedType` overrides any review_type sent.
 */
export function validateReviewBody(body: unknown, forcedType?: ReviewType): Validation<ReviewBody> {
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    return { ok: false, error: "Request body must be a JSON object" };
  }
  const fields: Record<string, unknown> = { ...body };

  if (typeof fields.code !== "string" || fields.code.length === 0) {
    return { ok: false, error: "code must be a non-empty string" };
  }

  const filename = optionalStringField(fields, "filename");
  if (!filename.ok) return filename;
  const language = optionalStringField(fields, "language");
  if (!language.ok) return language;

  let reviewType: ReviewType = "full";
  if (forcedType) {
    reviewType = forcedType;
  } else if (fields.review_type !== undefined) {
    if (typeof fields.review_type !== "string" || !isReviewType(fields.review_type)) {
      return { ok: false, error: "review_type must be one of: full, security, quick" };
    }
    reviewType = fields.review_type;
  }

  return {
    ok: true,
    value: { code: fields.code, filename: filename.value, language: language.value, reviewType },
  };
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function queryValue(value: unknown): string | undefined {
  return typeof value === "string" && value ? value : undefined;
}

export function createApp(deps: AppDeps): Express {
  const { analyzer, webhooks } = deps;
  const app = express();

  app.set("trust proxy", 1);

  app.use(
    rateLimit({
      windowMs: deps.rateLimit?.windowMs ?? 60 * 1000,
      limit: deps.rateLimit?.limit ?? 60,
      message: { error: "Too many requests, please try again later" },
      standardHeaders: true,
      legacyHeaders: false,
      skip: (req) => req.path === "/health",
    })
  );

  // JSON parsing for all routes except the webhook, which needs the raw body
  app.use((req: Request, res: Response, next: NextFunction) => {
    if (req.path === WEBHOOK_PATH) {
      next();
    } else {
      bodyParser.json({ limit: "1mb" })(req, res, next);
    }
  });

  app.get("/", (_req: Request, res: Response) => {
    res.status(200).json({
      name: "codecritic",
      version: VERSION,
      description: "LLM-backed code review",
      health: "/health",
    });
  });

  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).json({
      status: "healthy",
      version: VERSION,
      llmProvider: analyzer.provider,
      model: analyzer.model,
      webhooks: webhooks ? "enabled" : "disabled",
    });
  });

  function reviewHandler(forcedType?: ReviewType) {
    return async (req: Request, res: Response): Promise<void> => {
      const validation = validateReviewBody(req.body, forcedType);
      if (!validation.ok) {
        res.status(400).json({ error: validation.error });
        return;
      }

      const started = Date.now();
      const id = randomUUID().slice(0, 8);
      const { code, filename, language, reviewType } = validation.value;

      // Abort the model call if the client goes away first
      const controller = new AbortController();
      res.on("close", () => {
        if (!res.writableFinished) {
          controller.abort();
        }
      });

      try {
        const review = await analyzer.reviewCode(
          { code, filename, language, reviewType },
          { signal: controller.signal }
        );

        res.status(200).json({
          id,
          filename: review.filename,
          language: review.language,
          linesOfCode: review.linesOfCode,
          totalIssues: review.issues.length,
          qualityScore: scoreFileReview(review),
          summary: review.summary ?? null,
          issues: review.issues,
          reviewTimeMs: Date.now() - started,
        });
      } catch (error) {
        logger.error("Review request failed", { reviewId: id, reviewType, error: errorMessage(error) });
        if (!res.headersSent) {
          res.status(500).json({ error: `Review failed: ${errorMessage(error)}` });
        }
      }
    };
  }

  app.post("/api/review", reviewHandler());
  app.post("/api/review/quick", reviewHandler("quick"));
  app.post("/api/review/security", reviewHandler("security"));

  app.get("/api/languages", (_req: Request, res: Response) => {
    res.status(200).json({ languages: listSupportedLanguages() });
  });

  app.get("/api/detect-language", (req: Request, res: Response) => {
    const filename = queryValue(req.query.filename);
    const code = queryValue(req.query.code);
    if (!filename && !code) {
      res.status(400).json({ error: "Provide either filename or code parameter" });
      return;
    }
    res.status(200).json({ language: detectLanguage({ filename, code }), filename: filename ?? null });
  });

  // Webhook endpoint: verify, acknowledge, then process in the background
  app.post(WEBHOOK_PATH, bodyParser.raw({ type: "*/*", limit: "5mb" }), async (req: Request, res: Response) => {
    if (!webhooks) {
      res.status(503).json({ error: "Webhooks not configured" });
      return;
    }

    const payload = Buffer.isBuffer(req.body) ? req.body.toString("utf8") : "";
    const id = headerValue(req.headers["x-github-delivery"]) ?? "unknown";
    const name = headerValue(req.headers["x-github-event"]);
    const signature = headerValue(req.headers["x-hub-signature-256"]);

    let verified = false;
    if (payload && signature) {
      try {
        verified = await webhooks.verify(payload, signature);
      } catch (err) {
        logger.warn("Webhook signature check errored", { deliveryId: id, error: errorMessage(err) });
      }
    }
    if (!verified || !signature) {
      logger.error("Webhook signature verification failed", { deliveryId: id, event: name });
      res.status(401).json({ error: "Invalid signature" });
      return;
    }

    if (!name || !isWebhookEventName(name)) {
      res.status(400).json({ error: "Unknown or missing event name" });
      return;
    }

    res.status(202).json({ ok: true });

    logger.info("Processing webhook", { deliveryId: id, event: name });
    webhooks.verifyAndReceive({ id, name, payload, signature }).catch((err: unknown) => {
      logger.error("Webhook processing failed", { deliveryId: id, event: name, error: errorMessage(err) });
    });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = httpStatusOf(err) ?? 500;
    if (status >= 500) {
      logger.error("Unhandled request error", { error: errorMessage(err) });
    }
    res.status(status).json({ error: status >= 500 ? "Internal server error" : errorMessage(err) });
  });

  return app;
}

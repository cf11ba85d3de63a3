/**
 * GitHub webhook event handlers.
 */

import { EmitterWebhookEventName, Webhooks, emitterEventNames } from "@octokit/webhooks";
import { CodeAnalyzer } from "../../analysis/analyzer";
import { errorMessage, logger } from "../../logger";
import { reviewPullRequest } from "./review";
import { PullRequestGateway } from "./types";

export interface WebhookDeps {
  analyzer: CodeAnalyzer;
  /** Gateway authenticated for the installation that sent the event. */
  gatewayFor(installationId?: number): PullRequestGateway;
}

export function isWebhookEventName(name: string): name is EmitterWebhookEventName {
  return emitterEventNames.some((eventName) => eventName === name);
}

export function createWebhooks(secret: string): Webhooks {
  return new Webhooks({ secret });
}

export function registerEventHandlers(webhooks: Webhooks, deps: WebhookDeps): void {
  webhooks.on(
    ["pull_request.opened", "pull_request.synchronize", "pull_request.reopened"],
    async ({ id, name, payload }) => {
      const installationId = payload.installation?.id;
      logger.info("[GitHub App] Received event", {
        deliveryId: id,
        event: name,
        action: payload.action,
        repo: payload.repository.full_name,
        pullNumber: payload.number,
      });

      const outcome = await reviewPullRequest(
        {
          owner: payload.repository.owner.login,
          repo: payload.repository.name,
          pullNumber: payload.number,
          headRef: payload.pull_request.head.ref,
          headSha: payload.pull_request.head.sha,
          installationId,
        },
        { analyzer: deps.analyzer, gateway: deps.gatewayFor(installationId) }
      );

      logger.info("[GitHub App] Pull request handled", { deliveryId: id, ...outcome });
    }
  );

  webhooks.onError((error) => {
    logger.error("[GitHub App] Webhook handler error", {
      event: error.event?.name,
      error: errorMessage(error),
    });
  });
}

/**
 * GitHub API client creation and the Octokit-backed pull request gateway.
 */

import { Octokit } from "octokit";
import { createAppAuth } from "@octokit/auth-app";
import { config } from "../../env";
import { ConfigurationError, httpStatusOf } from "../../errors";
import { logger } from "../../logger";
import { CONFIG_FILE_NAME } from "../../config/schema";
import { PrFilePatch, PullRequestGateway, PullRequestRef } from "./types";

const MAX_FILES_PER_PAGE = 100;

/**
 * Create an Octokit client. Authenticates as the GitHub App installation when
 * the app is configured and an installation is known, else with GITHUB_TOKEN.
 */
export function createOctokit(installationId?: number): Octokit {
  if (installationId && config.GITHUB_APP_ID && config.GITHUB_PRIVATE_KEY) {
    return new Octokit({
      authStrategy: createAppAuth,
      auth: {
        appId: Number(config.GITHUB_APP_ID),
        privateKey: config.GITHUB_PRIVATE_KEY,
        installationId,
      },
    });
  }

  if (config.GITHUB_TOKEN) {
    return new Octokit({ auth: config.GITHUB_TOKEN });
  }

  throw new ConfigurationError(
    "GitHub access not configured. Set GITHUB_APP_ID and GITHUB_PRIVATE_KEY, or GITHUB_TOKEN."
  );
}

export class OctokitPullRequestGateway implements PullRequestGateway {
  constructor(private readonly octokit: Octokit) {}

  /**
   * All files of the pull request, following pagination. GitHub itself stops
   * listing at 3000 files.
   */
  async listFiles(ref: PullRequestRef): Promise<PrFilePatch[]> {
    const files = await this.octokit.paginate("GET /repos/{owner}/{repo}/pulls/{pull_number}/files", {
      owner: ref.owner,
      repo: ref.repo,
      pull_number: ref.pullNumber,
      per_page: MAX_FILES_PER_PAGE,
    });

    return files.map((f) => ({
      filename: f.filename,
      patch: f.patch,
      status: f.status,
    }));
  }

  async fetchConfig(ref: PullRequestRef): Promise<string | null> {
    try {
      const response = await this.octokit.request("GET /repos/{owner}/{repo}/contents/{path}", {
        owner: ref.owner,
        repo: ref.repo,
        path: CONFIG_FILE_NAME,
        ref: ref.headRef,
      });

      const data = response.data;
      if (Array.isArray(data) || !("content" in data) || typeof data.content !== "string") {
        return null;
      }
      return Buffer.from(data.content, "base64").toString("utf-8");
    } catch (error) {
      if (httpStatusOf(error) === 404) {
        return null;
      }
      throw error;
    }
  }

  async postComment(ref: PullRequestRef, body: string): Promise<void> {
    await this.octokit.request("POST /repos/{owner}/{repo}/issues/{issue_number}/comments", {
      owner: ref.owner,
      repo: ref.repo,
      issue_number: ref.pullNumber,
      body,
    });
    logger.info("[GitHub] Posted review comment", {
      repo: `${ref.owner}/${ref.repo}`,
      pullNumber: ref.pullNumber,
    });
  }
}

export function createPullRequestGateway(installationId?: number): PullRequestGateway {
  return new OctokitPullRequestGateway(createOctokit(installationId));
}

import type { Octokit } from "octokit";
import type { RepoInfo } from "./github.mts";
import { describeError, type DeployLog } from "./log.mts";

export type DeploymentState = "queued" | "in_progress" | "success" | "failure";

export interface StatusReporter {
  report(state: DeploymentState, detail?: string): Promise<void>;
}

export type StatusTarget = {
  repoInfo: RepoInfo;
  deploymentId: number;
  commitSha: string;
  environmentUrl: string;
  serverUrl?: string;
};

export const STATUS_TIMEOUT_MS = 10_000;

/**
 * Creates a user-friendly description for a deployment status.
 * @param state The deployment state being reported.
 * @param detail An optional error message to include in the description.
 * @returns A descriptive string, within GitHub's 140 character limit.
 */
export function getDeploymentStatusDescription(
  state: DeploymentState,
  detail?: string | null
): string {
  let description: string;
  switch (state) {
    case "queued":
      description = "Waiting for the deployment target...";
      break;
    case "in_progress":
      description = "Deploying...";
      break;
    case "success":
      description = "Deployment successful!";
      break;
    default:
      description = `Deployment failed${detail != null ? `: ${detail}` : "."}`;
  }
  return description.length > 140
    ? `${description.slice(0, 139)}…`
    : description;
}

/**
 * Posts deployment status updates for one deployment. Reporting is
 * best-effort: a failed post is logged and never rethrown or retried, so it
 * cannot replace the error that is being reported.
 * @param octokit A client authenticated for the repository.
 * @param target The deployment the statuses belong to.
 * @param log The invocation's log collector.
 */
export function createStatusReporter(
  octokit: Octokit,
  target: StatusTarget,
  log: DeployLog
): StatusReporter {
  const serverUrl = target.serverUrl ?? "https://github.com";
  const logUrl = `${serverUrl}/${target.repoInfo.owner}/${target.repoInfo.repo}/commit/${target.commitSha}`;

  return {
    async report(state, detail) {
      try {
        await octokit.rest.repos.createDeploymentStatus({
          owner: target.repoInfo.owner,
          repo: target.repoInfo.repo,
          deployment_id: target.deploymentId,
          state,
          environment_url: target.environmentUrl,
          log_url: logUrl,
          description: getDeploymentStatusDescription(state, detail),
          request: { signal: AbortSignal.timeout(STATUS_TIMEOUT_MS) },
        });
        log.debug(
          `Reported deployment ${target.deploymentId} as "${state}"`
        );
      } catch (err) {
        log.error(
          `Failed to report deployment ${target.deploymentId} as "${state}": ${describeError(err)}`
        );
      }
    },
  };
}

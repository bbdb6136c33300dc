import type { Transporter } from "nodemailer";
import type { DeployConfig, GitHubCredentials } from "./config.mts";
import { dispatch } from "./dispatch.mts";
import { runDeployment, type DeploymentJob, type DeploymentOutcome } from "./deploy.mts";
import { createOctokit, getAccessToken, parseRepoInfo } from "./github.mts";
import { DeployLog, describeError } from "./log.mts";
import { sendTranscript } from "./notify.mts";
import { parseAssetId, pruneReleaseAssets } from "./retention.mts";
import { createStatusReporter } from "./status.mts";
import { validateWebhook, type WebhookEvent } from "./webhook.mts";

export type HandlerResponse = {
  statusCode: number;
  body: string;
};

export type ExecuteOptions = {
  token: string;
  secret: string;
  recipients: readonly string[];
  log: DeployLog;
  transport: Transporter;
  mailFrom: string;
  apiUrl?: string;
  fetch?: typeof fetch;
  prune?: boolean;
  lockTimeoutMs?: number;
  /** Aborts a deployment that is still waiting for the webroot lock. */
  signal?: AbortSignal;
};

/**
 * Runs one deployment end to end: status reporting, the deployment itself,
 * release asset pruning after success and the single transcript mail.
 */
export async function executeDeployment(
  job: DeploymentJob,
  options: ExecuteOptions
): Promise<DeploymentOutcome> {
  const { log } = options;
  const repoInfo = parseRepoInfo(job.repository);
  const octokit = createOctokit(options.token, {
    baseUrl: options.apiUrl,
    fetch: options.fetch,
  });

  const outcome = await runDeployment(job, {
    token: options.token,
    secret: options.secret,
    log,
    fetch: options.fetch,
    lockTimeoutMs: options.lockTimeoutMs,
    signal: options.signal,
    reporter: createStatusReporter(
      octokit,
      {
        repoInfo,
        deploymentId: job.deploymentId,
        commitSha: job.commitSha,
        environmentUrl: job.deployUrl,
      },
      log
    ),
    afterSuccess:
      options.prune === false
        ? undefined
        : async () => {
            await pruneReleaseAssets(
              octokit,
              repoInfo,
              job.environment,
              parseAssetId(job.artifact.url),
              log
            );
          },
  });

  await sendTranscript(
    options.transport,
    options.mailFrom,
    {
      repository: job.repository,
      environment: job.environment,
      commitSha: job.commitSha,
      succeeded: outcome.state === "success",
      recipients: options.recipients,
    },
    log
  );
  return outcome;
}

export type HandlerDeps = {
  config: DeployConfig;
  credentials: GitHubCredentials;
  transport: Transporter;
  mailFrom: string;
  fetch?: typeof fetch;
  graceMs?: number;
  signal?: AbortSignal;
  execute?: typeof executeDeployment;
};

/**
 * Creates the webhook handler. Deployments run detached: the sender gets 202
 * when one is still running after the grace period, so GitHub's delivery
 * timeout is never hit, while start-up failures still come back as 500.
 */
export function createHandler(deps: HandlerDeps) {
  const execute = deps.execute ?? executeDeployment;

  async function innerHandler(
    log: DeployLog,
    event: WebhookEvent
  ): Promise<HandlerResponse> {
    const validated = validateWebhook(event, deps.config);
    if (!validated.ok) {
      return { statusCode: validated.error.code, body: validated.error.message };
    }
    const request = validated.value;
    console.debug(
      `[${log.reqId}] Processing deployment ${request.deploymentId} of ${request.repository} to ${request.environment}`
    );

    const identity = deps.config.repositories[request.repository];
    const token = await getAccessToken(
      parseRepoInfo(request.repository),
      deps.credentials,
      { baseUrl: deps.config.apiUrl, fetch: deps.fetch }
    );

    const task = execute(
      {
        webroot: request.webroot,
        repository: request.repository,
        environment: request.environment,
        deployUrl: request.deployUrl,
        deploymentId: request.deploymentId,
        commitSha: request.commitSha,
        artifact: request.artifact,
      },
      {
        token,
        secret: identity.secret,
        recipients: request.logRecipients,
        log,
        transport: deps.transport,
        mailFrom: deps.mailFrom,
        apiUrl: deps.config.apiUrl,
        fetch: deps.fetch,
        signal: deps.signal,
      }
    );

    const result = await dispatch(
      task,
      (err) => {
        console.error(
          `[${log.reqId}] Deployment ${request.deploymentId} crashed: ${describeError(err)}`
        );
      },
      deps.graceMs
    );

    switch (result.state) {
      case "running":
        return {
          statusCode: 202,
          body: `Deployment ${request.deploymentId} accepted.`,
        };
      case "settled":
        return result.value.state === "success"
          ? {
              statusCode: 200,
              body: `Deployment ${request.deploymentId} succeeded.`,
            }
          : {
              statusCode: 500,
              body: `Deployment ${request.deploymentId} failed: ${describeError(result.value.error)}`,
            };
      default:
        throw result.error;
    }
  }

  return async function handler(
    event: WebhookEvent
  ): Promise<HandlerResponse> {
    const log = new DeployLog();
    try {
      const response = await innerHandler(log, event);
      if (response.statusCode < 400) {
        console.debug(`[${log.reqId}] ${response.body}`);
      } else {
        console.error(`[${log.reqId}] ${response.body}`);
      }
      return response;
    } catch (err) {
      console.error(`[${log.reqId}] ${describeError(err)}`);
      return { statusCode: 500, body: describeError(err) };
    }
  };
}

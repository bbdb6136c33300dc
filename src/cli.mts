import { Command, InvalidArgumentError } from "commander";
import { pathToFileURL } from "url";
import { ConfigError } from "./config.mts";
import type { DeploymentJob } from "./deploy.mts";
import { executeDeployment, type ExecuteOptions } from "./deployment.mts";
import { DeployLog } from "./log.mts";
import { createMailTransport } from "./notify.mts";
import { abortOnShutdown } from "./shutdown.mts";
import { CHECKSUM_PATTERN } from "./webhook.mts";

export type Invocation = {
  job: DeploymentJob;
  recipients: string[];
  lockTimeoutMs: number;
  prune: boolean;
};

function parseDeploymentId(value: string): number {
  const id = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(id) || id <= 0) {
    throw new InvalidArgumentError("Not a positive integer.");
  }
  return id;
}

function parseCommitSha(value: string): string {
  if (!/^[0-9a-f]{40}$/i.test(value)) {
    throw new InvalidArgumentError("Not a 40 character commit hash.");
  }
  return value.toLowerCase();
}

function parseChecksum(value: string): string {
  if (!CHECKSUM_PATTERN.test(value)) {
    throw new InvalidArgumentError('Expected "sha256=" followed by 64 hex digits.');
  }
  return value;
}

function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError("Not a positive number of seconds.");
  }
  return seconds * 1000;
}

/**
 * Builds the `deploy` command. `onInvoke` receives the parsed invocation.
 */
export function createProgram(
  onInvoke: (invocation: Invocation) => Promise<void>
): Command {
  return new Command("deploy")
    .description("Publish a signed release artifact to a webroot")
    .argument("<webroot>", "path of the webroot symlink")
    .argument("<repository>", "repository full name (owner/repo)")
    .argument("<environment>", "deployment environment")
    .argument("<deploy_url>", "public URL of the environment")
    .argument("<deployment_id>", "GitHub deployment id", parseDeploymentId)
    .argument("<commit_sha>", "commit being deployed", parseCommitSha)
    .argument("<artifact_url>", "release asset API URL")
    .argument("<artifact_checksum>", "sha256 HMAC of the artifact", parseChecksum)
    .argument("[log_recipients...]", "addresses to mail the log transcript to")
    .option("--lock-timeout <seconds>", "how long to wait for the webroot lock", parseSeconds, 300_000)
    .option("--no-prune", "keep outdated release assets")
    .action(
      async (
        webroot: string,
        repository: string,
        environment: string,
        deployUrl: string,
        deploymentId: number,
        commitSha: string,
        artifactUrl: string,
        artifactChecksum: string,
        recipients: string[],
        options: { lockTimeout: number; prune: boolean }
      ) => {
        await onInvoke({
          job: {
            webroot,
            repository,
            environment,
            deployUrl,
            deploymentId,
            commitSha,
            artifact: { url: artifactUrl, checksum: artifactChecksum },
          },
          recipients,
          lockTimeoutMs: options.lockTimeout,
          prune: options.prune,
        });
      }
    );
}

/**
 * Reads the credentials the deployment contract requires from the environment.
 */
export function readEnvironment(
  env: NodeJS.ProcessEnv = process.env
): Pick<ExecuteOptions, "token" | "secret" | "mailFrom" | "apiUrl"> & {
  smtpUrl?: string;
} {
  const { GITHUB_TOKEN, DEPLOYMENT_KEY, GITHUB_API_URL, SMTP_URL, MAIL_FROM } =
    env;
  if (GITHUB_TOKEN == null || GITHUB_TOKEN === "") {
    throw new ConfigError("Missing GITHUB_TOKEN environment variable.");
  }
  if (DEPLOYMENT_KEY == null || DEPLOYMENT_KEY === "") {
    throw new ConfigError("Missing DEPLOYMENT_KEY environment variable.");
  }
  return {
    token: GITHUB_TOKEN,
    secret: DEPLOYMENT_KEY,
    apiUrl: GITHUB_API_URL,
    smtpUrl: SMTP_URL != null && SMTP_URL !== "" ? SMTP_URL : undefined,
    mailFrom: MAIL_FROM ?? "site-deployer@localhost",
  };
}

async function main() {
  const controller = new AbortController();
  const detach = abortOnShutdown(controller);
  const program = createProgram(async ({ job, recipients, lockTimeoutMs, prune }) => {
    const env = readEnvironment();
    const outcome = await executeDeployment(job, {
      ...env,
      recipients,
      log: new DeployLog(),
      transport: createMailTransport(env.smtpUrl),
      lockTimeoutMs,
      prune,
      signal: controller.signal,
    });
    process.exitCode = outcome.state === "success" ? 0 : 1;
  });
  try {
    await program.parseAsync();
  } finally {
    detach();
  }
}

if (process.argv[1] != null && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
}

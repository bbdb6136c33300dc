import type { Stats } from "fs";
import { lstat, mkdir, readlink, realpath, rename, rm, symlink } from "fs/promises";
import path from "path";
import { withArtifact } from "./artifact.mts";
import { extractArchive, listArchive, toTar } from "./archive.mts";
import { withLock } from "./lock.mts";
import { describeError, type DeployLog } from "./log.mts";
import type { StatusReporter } from "./status.mts";

/** Deployments give up waiting for a busy target after five minutes. */
export const DEPLOY_LOCK_TIMEOUT_MS = 300_000;

export class WebrootError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WebrootError";
  }
}

/**
 * Everything needed to publish one artifact to one webroot.
 */
export type DeploymentJob = Readonly<{
  webroot: string;
  repository: string;
  environment: string;
  deployUrl: string;
  deploymentId: number;
  commitSha: string;
  artifact: Readonly<{ url: string; checksum: string }>;
}>;

export type DeploymentContext = {
  token?: string;
  secret: string;
  log: DeployLog;
  reporter: StatusReporter;
  fetch?: typeof fetch;
  lockTimeoutMs?: number;
  lockPollMs?: number;
  signal?: AbortSignal;
  now?: () => Date;
  /** Runs after a successful deployment; its failure does not change the outcome. */
  afterSuccess?: () => Promise<void>;
};

export type DeploymentOutcome =
  | { state: "success"; versionDir: string }
  | { state: "failure"; error: unknown };

function pad(n: number, len = 2): string {
  return String(n).padStart(len, "0");
}

/**
 * Names the directory a deployment is extracted into:
 * `{YYYYMMDDhhmmss}_{sha}_{deploymentId}`, in UTC.
 */
export function versionDirName(
  time: Date,
  commitSha: string,
  deploymentId: number
): string {
  const timestamp =
    pad(time.getUTCFullYear(), 4) +
    pad(time.getUTCMonth() + 1) +
    pad(time.getUTCDate()) +
    pad(time.getUTCHours()) +
    pad(time.getUTCMinutes()) +
    pad(time.getUTCSeconds());
  return `${timestamp}_${commitSha}_${deploymentId}`;
}

/**
 * Whether `child` lies strictly inside `parent` (and is not `parent` itself).
 */
export function isStrictlyInside(parent: string, child: string): boolean {
  const relative = path.relative(parent, child);
  return (
    relative !== "" &&
    !relative.startsWith(`..${path.sep}`) &&
    relative !== ".." &&
    !path.isAbsolute(relative)
  );
}

/**
 * Resolves where the webroot symlink currently points.
 * @returns The absolute target, or null when there is no webroot yet.
 * @throws WebrootError when the webroot exists but is not a symlink.
 */
export async function currentVersion(webroot: string): Promise<string | null> {
  let stats: Stats;
  try {
    stats = await lstat(webroot);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return null;
    }
    throw err;
  }
  if (!stats.isSymbolicLink()) {
    throw new WebrootError(
      `${webroot} exists but is not a symlink; refusing to replace it`
    );
  }
  return path.resolve(path.dirname(webroot), await readlink(webroot));
}

/**
 * Points `webroot` at `versionDir` in a single rename. The link is relative
 * so the base directory can be moved as a whole.
 */
export async function swapSymlink(
  webroot: string,
  versionDir: string
): Promise<void> {
  const base = path.dirname(webroot);
  const temporary = path.join(
    base,
    `.${path.basename(webroot)}.${process.pid}.link`
  );
  await rm(temporary, { force: true });
  await symlink(path.relative(base, versionDir), temporary);
  try {
    await rename(temporary, webroot);
  } catch (err) {
    await rm(temporary, { force: true });
    throw err;
  }
}

/**
 * Deletes a superseded version directory, but only when its real path lies
 * strictly inside the real base directory. Anything else is left alone.
 * @returns Whether the directory was removed.
 */
export async function removePreviousVersion(
  base: string,
  previous: string,
  current: string,
  log: DeployLog
): Promise<boolean> {
  let resolvedBase: string;
  let resolvedPrevious: string;
  try {
    resolvedBase = await realpath(base);
    resolvedPrevious = await realpath(previous);
  } catch (err) {
    log.warn(`Previous deployment ${previous} cannot be resolved: ${describeError(err)}`);
    return false;
  }

  if (!isStrictlyInside(resolvedBase, resolvedPrevious)) {
    log.warn(
      `Previous deployment ${resolvedPrevious} is outside of ${resolvedBase}; not removing it`
    );
    return false;
  }
  if (resolvedPrevious === (await realpath(current))) {
    log.warn(`Previous deployment ${resolvedPrevious} is the current one; not removing it`);
    return false;
  }

  log.info(`Removing previous deployment ${resolvedPrevious}`);
  await rm(resolvedPrevious, { recursive: true, force: true });
  return true;
}

async function publish(job: DeploymentJob, ctx: DeploymentContext) {
  const { log } = ctx;
  const webroot = path.resolve(job.webroot);
  const base = path.dirname(webroot);
  const name = path.basename(webroot);

  const previous = await currentVersion(webroot);
  log.debug(
    previous != null
      ? `Current deployment: ${previous}`
      : `No current deployment at ${webroot}`
  );

  const versionDir = path.join(
    base,
    versionDirName((ctx.now ?? (() => new Date()))(), job.commitSha, job.deploymentId)
  );
  const download = path.join(base, `.${name}_${job.deploymentId}.download`);
  const scratch = path.join(base, `.${name}_${job.deploymentId}.tar`);
  let created = false;

  try {
    await withArtifact(
      {
        url: job.artifact.url,
        destination: download,
        checksum: job.artifact.checksum,
        secret: ctx.secret,
        token: ctx.token,
        fetch: ctx.fetch,
        log,
      },
      async (file) => {
        try {
          const archive = await toTar(file, scratch);
          const entries = await listArchive(archive);
          log.info(`Archive contains ${entries.length} entries`);

          await mkdir(versionDir, { mode: 0o755 });
          created = true;
          await extractArchive(archive, versionDir);
          log.info(`Extracted artifact into ${versionDir}`);
        } finally {
          await rm(scratch, { force: true });
        }
      }
    );

    await swapSymlink(webroot, versionDir);
  } catch (err) {
    if (created) {
      await rm(versionDir, { recursive: true, force: true });
    }
    throw err;
  }
  log.info(`Published ${webroot} -> ${path.basename(versionDir)}`);

  if (previous != null) {
    await removePreviousVersion(base, previous, versionDir, log);
  }
  return versionDir;
}

/**
 * Publishes an artifact to a webroot. Reports `queued` straight away and
 * `in_progress` once the target's lock is held, so a waiting deployment is
 * visible as such. The result is returned, never thrown: a failure has
 * already been reported as the `failure` status when this resolves.
 * @param job The deployment to perform.
 * @param ctx Credentials, log collector, status reporter and tuning knobs.
 */
export async function runDeployment(
  job: DeploymentJob,
  ctx: DeploymentContext
): Promise<DeploymentOutcome> {
  const { log, reporter } = ctx;
  log.info(
    `Deploying ${job.repository}@${job.commitSha} (deployment ${job.deploymentId}) to ${job.environment} at ${job.webroot}`
  );
  await reporter.report("queued");

  let versionDir: string;
  try {
    versionDir = await withLock(
      `${path.resolve(job.webroot)}.lock`,
      {
        timeoutMs: ctx.lockTimeoutMs ?? DEPLOY_LOCK_TIMEOUT_MS,
        pollMs: ctx.lockPollMs,
        signal: ctx.signal,
        log,
      },
      async () => {
        await reporter.report("in_progress");
        return publish(job, ctx);
      }
    );
  } catch (err) {
    log.error(`Deployment ${job.deploymentId} failed: ${describeError(err)}`);
    await reporter.report("failure", describeError(err));
    return { state: "failure", error: err };
  }

  log.info(`Deployment ${job.deploymentId} succeeded`);
  await reporter.report("success");

  if (ctx.afterSuccess != null) {
    try {
      await ctx.afterSuccess();
    } catch (err) {
      log.error(`Post-deployment cleanup failed: ${describeError(err)}`);
    }
  }
  return { state: "success", versionDir };
}

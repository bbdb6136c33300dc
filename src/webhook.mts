import { z } from "zod";
import type { DeployConfig, RepositoryIdentity } from "./config.mts";
import { verifySignature } from "./signature.mts";

/**
 * The parts of an inbound HTTP request the webhook needs. Header names are
 * lower-case; the body is kept raw so the signature covers the exact bytes.
 */
export type WebhookEvent = {
  httpMethod: string;
  headers: Record<string, string | undefined>;
  body: Buffer | null;
};

/**
 * A request that cannot (or need not) be acted on. `code` is the HTTP status
 * returned to the sender; 200 marks a benign no-op.
 */
export class RequestError {
  constructor(
    public readonly message: string = "",
    public readonly code: number = 500
  ) {}
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

function fail(message: string, code: number): Result<never, RequestError> {
  return { ok: false, error: new RequestError(message, code) };
}

export type Person = Readonly<{
  name?: string;
  email?: string;
  username?: string;
}>;

export type ArtifactRef = Readonly<{
  name: string;
  url: string;
  checksum: string;
}>;

export type DeploymentRequest = Readonly<{
  repository: string;
  environment: string;
  deploymentId: number;
  commitSha: string;
  artifact: ArtifactRef;
  pusher: Person | null;
  authors: readonly Person[];
  deployUrl: string;
  webroot: string;
  logRecipients: readonly string[];
}>;

export const DEPLOYMENT_STATUS_EVENT = "deployment_status";
export const CHECKSUM_PATTERN = /^sha256=[0-9a-f]{64}$/;
const COMMIT_SHA_PATTERN = /^[0-9a-f]{40}$/i;

const personSchema = z.object({
  name: z.string().nullish(),
  email: z.string().nullish(),
  username: z.string().nullish(),
});

/**
 * Shape of `deployment.payload` as written by the release workflow.
 */
export const deploymentPayloadSchema = z.object({
  artifact: z.object({
    name: z.string().min(1),
    url: z.string().url(),
    checksum: z.string().length(71),
  }),
  pusher: personSchema.nullish(),
  authors: z.array(personSchema).default([]),
});

const emailSchema = z.string().email();

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Builds the pattern a release asset API URL must match for a repository.
 * @param apiUrl The REST API base URL, without trailing slash.
 * @param repository The repository full name (`owner/repo`).
 */
export function assetUrlPattern(apiUrl: string, repository: string): RegExp {
  return new RegExp(
    `^${escapeRegExp(apiUrl)}/repos/${escapeRegExp(repository)}/releases/assets/\\d+$`
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function field(value: unknown, ...path: string[]): unknown {
  let current = value;
  for (const key of path) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

function toPerson(value: z.infer<typeof personSchema>): Person {
  return Object.freeze({
    name: value.name ?? undefined,
    email: value.email ?? undefined,
    username: value.username ?? undefined,
  });
}

/**
 * Merges recipient lists in order, dropping duplicates and blanks.
 */
export function mergeRecipients(
  ...lists: ReadonlyArray<readonly (string | null | undefined)[]>
): string[] {
  const merged: string[] = [];
  for (const list of lists) {
    for (const address of list) {
      if (address != null && address !== "" && !merged.includes(address)) {
        merged.push(address);
      }
    }
  }
  return merged;
}

/**
 * Authenticates and validates a `deployment_status` webhook. Each check
 * short-circuits with the status code the sender should see. Other event
 * types and non-pending statuses are 200 no-ops: GitHub sends several status
 * updates per deployment and only the pending one deploys.
 * @param event The inbound request.
 * @param config The loaded deployment configuration.
 * @returns The validated deployment request, or the reason it was rejected.
 */
export function validateWebhook(
  event: WebhookEvent,
  config: DeployConfig
): Result<DeploymentRequest, RequestError> {
  if (event.httpMethod.toUpperCase() !== "POST") {
    return fail(`Method ${event.httpMethod} is not allowed.`, 405);
  }

  const contentType = (event.headers["content-type"] ?? "")
    .split(";")[0]
    .trim()
    .toLowerCase();
  if (contentType !== "application/json") {
    return fail(`Unsupported content type "${contentType}".`, 415);
  }

  const body = event.body ?? Buffer.alloc(0);
  const signature = event.headers["x-hub-signature-256"];
  if (signature == null) {
    return fail("Request is missing the x-hub-signature-256 header.", 403);
  }
  const identities: RepositoryIdentity[] = verifySignature(
    body,
    signature,
    Object.values(config.repositories)
  );
  if (identities.length === 0) {
    return fail("Invalid signature.", 403);
  }

  let payload: unknown;
  try {
    payload = JSON.parse(body.toString("utf8"));
  } catch {
    return fail("Request body is not valid JSON.", 400);
  }
  if (!isRecord(payload)) {
    return fail("Request body is not a JSON object.", 400);
  }

  const eventType = event.headers["x-github-event"];
  if (eventType !== DEPLOYMENT_STATUS_EVENT) {
    return fail(`Skipped: ignored event "${eventType ?? ""}".`, 200);
  }

  const repositoryName = field(payload, "repository", "full_name");
  if (
    typeof repositoryName !== "string" ||
    !Object.hasOwn(config.repositories, repositoryName)
  ) {
    return fail(`Unknown repository "${String(repositoryName)}".`, 400);
  }
  const identity = identities.find(({ name }) => name === repositoryName);
  if (identity == null) {
    return fail(`Signature does not belong to ${repositoryName}.`, 403);
  }

  const environment = field(payload, "deployment", "environment");
  if (
    typeof environment !== "string" ||
    !Object.hasOwn(identity.environments, environment)
  ) {
    return fail(
      `Unknown environment "${String(environment)}" for ${repositoryName}.`,
      400
    );
  }
  const environmentConfig = identity.environments[environment];

  const task = field(payload, "deployment", "task");
  if (task !== "deploy") {
    return fail(`Unsupported deployment task "${String(task)}".`, 400);
  }

  const deploymentId = field(payload, "deployment", "id");
  if (
    typeof deploymentId !== "number" ||
    !Number.isSafeInteger(deploymentId) ||
    deploymentId <= 0
  ) {
    return fail("Deployment id is missing or not an integer.", 400);
  }

  const commitSha = field(payload, "deployment", "sha");
  if (typeof commitSha !== "string" || !COMMIT_SHA_PATTERN.test(commitSha)) {
    return fail("Deployment sha is not a 40 character commit hash.", 400);
  }

  const statusEnvironment = field(payload, "deployment_status", "environment");
  if (statusEnvironment !== environment) {
    return fail(
      `Deployment status environment "${String(statusEnvironment)}" does not match "${environment}".`,
      400
    );
  }

  const state = field(payload, "deployment_status", "state");
  if (state !== "pending") {
    return fail(`Skipped: deployment status is "${String(state)}".`, 200);
  }

  const parsed = deploymentPayloadSchema.safeParse(
    field(payload, "deployment", "payload")
  );
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    return fail(`Invalid deployment payload: ${issues}`, 400);
  }
  const { artifact, pusher, authors } = parsed.data;

  if (!assetUrlPattern(config.apiUrl, repositoryName).test(artifact.url)) {
    return fail(`Unexpected artifact url ${artifact.url}.`, 400);
  }

  if (!CHECKSUM_PATTERN.test(artifact.checksum)) {
    return fail("Artifact checksum is not a sha256 HMAC digest.", 400);
  }

  const pusherEmail = pusher?.email;
  return ok(
    Object.freeze({
      repository: repositoryName,
      environment,
      deploymentId,
      commitSha: commitSha.toLowerCase(),
      artifact: Object.freeze({ ...artifact }),
      pusher: pusher != null ? toPerson(pusher) : null,
      authors: Object.freeze(authors.map(toPerson)),
      deployUrl: environmentConfig.deployUrl,
      webroot: environmentConfig.webroot,
      logRecipients: Object.freeze(
        mergeRecipients(
          config.logRecipients,
          identity.logRecipients,
          environmentConfig.logRecipients,
          pusherEmail != null && emailSchema.safeParse(pusherEmail).success
            ? [pusherEmail]
            : []
        )
      ),
    })
  );
}

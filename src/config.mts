import { readFileSync } from "fs";
import { z } from "zod";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const emailList = z.array(z.string().email()).default([]);

const environmentSchema = z
  .object({
    deployUrl: z.string().url(),
    webroot: z.string().startsWith("/", "webroot must be an absolute path"),
    logRecipients: emailList,
  })
  .strict();

const repositorySchema = z
  .object({
    secret: z.string().min(16, "secret must be at least 16 characters"),
    logRecipients: emailList,
    environments: z
      .record(z.string().min(1), environmentSchema)
      .refine((environments) => Object.keys(environments).length > 0, {
        message: "at least one environment is required",
      }),
  })
  .strict();

const configSchema = z
  .object({
    apiUrl: z
      .string()
      .url()
      .default("https://api.github.com")
      .transform((url) => url.replace(/\/+$/, "")),
    logRecipients: emailList,
    repositories: z.record(
      z.string().regex(/^[\w.-]+\/[\w.-]+$/, "expected owner/repo"),
      repositorySchema
    ),
  })
  .strict();

export type EnvironmentConfig = Readonly<{
  deployUrl: string;
  webroot: string;
  logRecipients: readonly string[];
}>;

export type RepositoryIdentity = Readonly<{
  name: string;
  secret: string;
  logRecipients: readonly string[];
  environments: Readonly<Record<string, EnvironmentConfig>>;
}>;

export type DeployConfig = Readonly<{
  apiUrl: string;
  logRecipients: readonly string[];
  repositories: Readonly<Record<string, RepositoryIdentity>>;
}>;

/**
 * Validates a parsed configuration document and freezes the result.
 * @param raw The parsed JSON document.
 * @returns The validated configuration.
 */
export function parseConfig(raw: unknown): DeployConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid deployment configuration: ${issues}`);
  }

  const secrets = new Set<string>();
  const repositories: Record<string, RepositoryIdentity> = {};
  for (const [name, repository] of Object.entries(result.data.repositories)) {
    if (secrets.has(repository.secret)) {
      throw new ConfigError(
        `Invalid deployment configuration: repositories.${name}.secret is shared with another repository`
      );
    }
    secrets.add(repository.secret);

    const environments: Record<string, EnvironmentConfig> = {};
    for (const [envName, env] of Object.entries(repository.environments)) {
      environments[envName] = Object.freeze({
        deployUrl: env.deployUrl,
        webroot: env.webroot,
        logRecipients: Object.freeze([...env.logRecipients]),
      });
    }
    repositories[name] = Object.freeze({
      name,
      secret: repository.secret,
      logRecipients: Object.freeze([...repository.logRecipients]),
      environments: Object.freeze(environments),
    });
  }

  return Object.freeze({
    apiUrl: result.data.apiUrl,
    logRecipients: Object.freeze([...result.data.logRecipients]),
    repositories: Object.freeze(repositories),
  });
}

/**
 * Reads and validates the deployment configuration file. Fails loudly on
 * anything unexpected so a broken configuration never serves a request.
 * @param path Path to the JSON configuration file.
 */
export function loadConfig(path: string): DeployConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new ConfigError(
      `Unable to read deployment configuration ${path}: ${
        err instanceof Error ? err.message : String(err)
      }`
    );
  }
  return parseConfig(raw);
}

export type GitHubCredentials =
  | { kind: "token"; token: string }
  | { kind: "app"; clientId: string; privateKey: string };

export type Settings = Readonly<{
  port: number;
  configPath: string;
  credentials: GitHubCredentials;
  smtpUrl?: string;
  mailFrom: string;
}>;

/**
 * Reads process settings from the environment.
 * @param env The environment to read, `process.env` by default.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const {
    PORT,
    DEPLOY_CONFIG,
    GITHUB_TOKEN,
    GITHUB_APP_CLIENT_ID,
    GITHUB_APP_PRIVATE_KEY,
    SMTP_URL,
    MAIL_FROM,
  } = env;

  let credentials: GitHubCredentials;
  if (GITHUB_TOKEN != null && GITHUB_TOKEN !== "") {
    credentials = { kind: "token", token: GITHUB_TOKEN };
  } else if (GITHUB_APP_CLIENT_ID != null && GITHUB_APP_PRIVATE_KEY != null) {
    credentials = {
      kind: "app",
      clientId: GITHUB_APP_CLIENT_ID,
      privateKey: Buffer.from(GITHUB_APP_PRIVATE_KEY, "base64").toString("utf8"),
    };
  } else {
    throw new ConfigError(
      "Missing GitHub environment variable (GITHUB_TOKEN or GITHUB_APP_CLIENT_ID & GITHUB_APP_PRIVATE_KEY)."
    );
  }

  const port = Number(PORT ?? "8080");
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new ConfigError(`Invalid PORT: ${PORT}`);
  }

  return Object.freeze({
    port,
    configPath: DEPLOY_CONFIG ?? "deploy.config.json",
    credentials,
    smtpUrl: SMTP_URL != null && SMTP_URL !== "" ? SMTP_URL : undefined,
    mailFrom: MAIL_FROM ?? "site-deployer@localhost",
  });
}

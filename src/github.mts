import jwt from "jsonwebtoken";
import { Octokit } from "octokit";
import type { GitHubCredentials } from "./config.mts";

export type RepoInfo = { owner: string; repo: string };

export type GitHubOptions = {
  baseUrl?: string;
  fetch?: typeof fetch;
};

/**
 * Creates an Octokit client for the REST API. Retries and throttling are off:
 * a failed call is reported to the caller as-is.
 * @param auth A bearer token (installation token, PAT or app JWT).
 * @param options API base URL and an optional fetch implementation.
 */
export function createOctokit(auth: string, options: GitHubOptions = {}) {
  return new Octokit({
    auth,
    baseUrl: options.baseUrl,
    request: options.fetch != null ? { fetch: options.fetch } : undefined,
    retry: { enabled: false },
    throttle: {
      enabled: false,
      onRateLimit: () => false,
      onSecondaryRateLimit: () => false,
    },
  });
}

/**
 * Splits a repository full name into owner and repo.
 * @param fullName The repository full name, e.g. `octo-org/site`.
 */
export function parseRepoInfo(fullName: string): RepoInfo {
  const parts = fullName.split("/");
  if (parts.length !== 2 || parts[0] === "" || parts[1] === "") {
    throw new Error(`Unable to parse repository name ${fullName}`);
  }
  return { owner: parts[0], repo: parts[1] };
}

/**
 * Signs the short-lived JWT a GitHub App authenticates with. The issue time
 * is backdated five seconds to tolerate clock drift against the API.
 * @param clientId The app's client id, used as issuer.
 * @param privateKey The app's PEM encoded RSA private key.
 * @param now Current time in milliseconds.
 */
export function createAppJwt(
  clientId: string,
  privateKey: string,
  now: number = Date.now()
): string {
  const seconds = Math.floor(now / 1000);
  return jwt.sign(
    { iat: seconds - 5, exp: seconds + 300, iss: clientId },
    privateKey,
    { algorithm: "RS256" }
  );
}

/**
 * Exchanges the app JWT for an installation access token scoped to a single
 * repository. Failures are not retried: nothing downstream can run without it.
 * @param repoInfo The repository to act on.
 * @param credentials The app's client id and private key.
 * @param options API base URL and an optional fetch implementation.
 * @returns The installation access token.
 */
export async function getInstallationToken(
  repoInfo: RepoInfo,
  credentials: { clientId: string; privateKey: string },
  options: GitHubOptions = {}
): Promise<string> {
  const app = createOctokit(
    createAppJwt(credentials.clientId, credentials.privateKey),
    options
  );

  const { data: installation } = await app.rest.apps.getRepoInstallation({
    owner: repoInfo.owner,
    repo: repoInfo.repo,
  });

  const { data: access } = await app.rest.apps.createInstallationAccessToken({
    installation_id: installation.id,
    repositories: [repoInfo.repo],
  });

  return access.token;
}

/**
 * Resolves a bearer token for a repository: a configured personal access
 * token is used as-is, otherwise an installation token is issued for the app.
 */
export async function getAccessToken(
  repoInfo: RepoInfo,
  credentials: GitHubCredentials,
  options: GitHubOptions = {}
): Promise<string> {
  if (credentials.kind === "token") {
    return credentials.token;
  }
  return getInstallationToken(repoInfo, credentials, options);
}

import crypto from "crypto";
import { open, rm } from "fs/promises";
import type { DeployLog } from "./log.mts";
import { SIGNATURE_PREFIX, signaturesEqual } from "./signature.mts";

/** Artifacts larger than 4 GiB are refused outright. */
export const MAX_ARTIFACT_BYTES = 2 ** 32;

export class ArtifactError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArtifactError";
  }
}

export type ArtifactDownload = {
  url: string;
  destination: string;
  checksum: string;
  secret: string;
  token?: string;
  fetch?: typeof fetch;
  maxBytes?: number;
  log?: DeployLog;
};

function requestHeaders(token: string | undefined): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: "application/octet-stream",
  };
  if (token != null) {
    headers.Authorization = `Bearer ${token}`;
  }
  return headers;
}

/**
 * Downloads an artifact to `destination`, feeding every chunk to an
 * HMAC-SHA256 accumulator as it is written, and compares the result with the
 * expected `sha256=` checksum once the stream ends.
 * @returns The number of bytes written.
 * @throws ArtifactError when the artifact is too large, the download fails or
 * the checksum does not match.
 */
export async function downloadArtifact(
  options: ArtifactDownload
): Promise<number> {
  const {
    url,
    destination,
    checksum,
    secret,
    token,
    fetch: fetchImpl = fetch,
    maxBytes = MAX_ARTIFACT_BYTES,
    log,
  } = options;
  const headers = requestHeaders(token);

  const head = await fetchImpl(url, { method: "HEAD", headers });
  if (!head.ok) {
    throw new ArtifactError(
      `Failed to inspect artifact ${url}: ${head.status} ${head.statusText}`
    );
  }
  const advertised = head.headers.get("content-length");
  if (advertised != null && Number(advertised) > maxBytes) {
    throw new ArtifactError(
      `Artifact ${url} is ${advertised} bytes, more than the ${maxBytes} byte limit`
    );
  }
  log?.debug(`Downloading ${advertised ?? "unknown number of"} bytes from ${url}`);

  const response = await fetchImpl(url, { headers });
  if (!response.ok || response.body == null) {
    throw new ArtifactError(
      `Failed to download artifact ${url}: ${response.status} ${response.statusText}`
    );
  }

  const hmac = crypto.createHmac("sha256", secret);
  let written = 0;
  const file = await open(destination, "w", 0o600);
  try {
    for await (const chunk of response.body) {
      if (!(chunk instanceof Uint8Array)) {
        throw new ArtifactError(`Unexpected chunk type while reading ${url}`);
      }
      written += chunk.byteLength;
      if (written > maxBytes) {
        throw new ArtifactError(
          `Artifact ${url} exceeded the ${maxBytes} byte limit while downloading`
        );
      }
      hmac.update(chunk);
      await file.write(chunk);
    }
    await file.sync();
  } finally {
    await file.close();
  }

  const actual = SIGNATURE_PREFIX + hmac.digest("hex");
  if (!signaturesEqual(actual, checksum)) {
    throw new ArtifactError(
      `Checksum mismatch for ${url}: expected ${checksum}, got ${actual}`
    );
  }
  log?.info(`Downloaded and verified ${written} bytes from ${url}`);
  return written;
}

/**
 * Downloads and verifies an artifact, runs `fn` with its path and removes the
 * file afterwards, including when the download or `fn` fails.
 */
export async function withArtifact<T>(
  options: ArtifactDownload,
  fn: (path: string) => Promise<T>
): Promise<T> {
  try {
    await downloadArtifact(options);
    return await fn(options.destination);
  } finally {
    await rm(options.destination, { force: true });
  }
}

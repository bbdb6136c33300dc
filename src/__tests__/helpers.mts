import { mkdtemp, mkdir, readFile, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import * as tar from "tar";
import { fileURLToPath } from "url";
import { DeployLog } from "../log.mts";
import { sign } from "../signature.mts";
import type { DeploymentState, StatusReporter } from "../status.mts";

export type FetchCall = {
  method: string;
  url: URL;
  headers: Headers;
  body: unknown;
};

/**
 * An in-process stand-in for `fetch`: every call is recorded and answered by
 * `respond`, so Octokit and the artifact download never leave the process.
 */
export function fakeFetch(
  respond: (call: FetchCall) => Response | Promise<Response>
) {
  const calls: FetchCall[] = [];
  async function impl(
    input: string | URL | Request,
    init?: RequestInit
  ): Promise<Response> {
    const url = new URL(input instanceof Request ? input.url : input.toString());
    const body: unknown =
      typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
    const call: FetchCall = {
      method: (init?.method ?? "GET").toUpperCase(),
      url,
      headers: new Headers(init?.headers),
      body,
    };
    calls.push(call);
    return respond(call);
  }
  const fetch: typeof globalThis.fetch = impl;
  return { fetch, calls };
}

export function json(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export function fixedLog(reqId = "test-run"): DeployLog {
  return new DeployLog(reqId, () => new Date("2026-01-02T03:04:05Z"));
}

export function recordingReporter() {
  const states: DeploymentState[] = [];
  const reporter: StatusReporter = {
    async report(state) {
      states.push(state);
    },
  };
  return { reporter, states };
}

export async function tempDir(prefix = "site-deployer-"): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Writes `files` into a scratch directory and packs them into a tar archive.
 * @returns The archive bytes.
 */
export async function makeTar(files: Record<string, string>): Promise<Buffer> {
  const dir = await tempDir("site-deployer-tar-");
  try {
    const source = path.join(dir, "site");
    for (const [name, content] of Object.entries(files)) {
      const target = path.join(source, name);
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, content);
    }
    const archive = path.join(dir, "site.tar");
    await tar.c({ file: archive, cwd: source }, Object.keys(files));
    return await readFile(archive);
  } finally {
    await removeDir(dir);
  }
}

/** `index.html` and `assets/site.css` packed with tar and compressed with zstd. */
export const ZSTD_FIXTURE = fileURLToPath(new URL("./fixtures/site.tar.zst", import.meta.url));

export const SECRET = "test-secret-0123456789";
export const SHA = "0123456789abcdef0123456789abcdef01234567";
export const ASSET_URL = "https://api.github.com/repos/acme/site/releases/assets/42";

/**
 * Serves `artifact` for HEAD and GET requests to `ASSET_URL`.
 */
export function artifactServer(
  artifact: Buffer,
  other: (call: FetchCall) => Response | Promise<Response> = () =>
    json({ message: "Not Found" }, 404)
) {
  return fakeFetch((call) => {
    if (call.url.href === ASSET_URL) {
      return new Response(call.method === "HEAD" ? null : artifact, {
        headers: { "content-length": String(artifact.length) },
      });
    }
    return other(call);
  });
}

export function checksum(data: Buffer, secret = SECRET): string {
  return sign(secret, data);
}

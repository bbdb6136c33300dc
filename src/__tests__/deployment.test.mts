import { readlink } from "fs/promises";
import nodemailer from "nodemailer";
import path from "path";
import { parseConfig } from "../config.mts";
import type { DeploymentJob, DeploymentOutcome } from "../deploy.mts";
import { createHandler, executeDeployment, type HandlerDeps } from "../deployment.mts";
import { sign } from "../signature.mts";
import {
  ASSET_URL,
  SECRET,
  SHA,
  artifactServer,
  checksum,
  json,
  makeTar,
  fixedLog,
  removeDir,
  tempDir,
} from "./helpers.mts";

const CHECKSUM = `sha256=${"ab".repeat(32)}`;

const config = parseConfig({
  repositories: {
    "acme/site": {
      secret: SECRET,
      logRecipients: ["web@example.com"],
      environments: {
        production: {
          deployUrl: "https://www.example.com",
          webroot: "/srv/www/site/webroot",
        },
      },
    },
  },
});

function webhook(overrides: { method?: string; state?: string } = {}) {
  const body = Buffer.from(
    JSON.stringify({
      deployment_status: { state: overrides.state ?? "pending", environment: "production" },
      deployment: {
        id: 1234,
        sha: SHA,
        task: "deploy",
        environment: "production",
        payload: {
          artifact: { name: "site.tar", url: ASSET_URL, checksum: CHECKSUM },
          pusher: { name: "octocat", email: "octocat@example.com" },
        },
      },
      repository: { full_name: "acme/site" },
    })
  );
  return {
    httpMethod: overrides.method ?? "POST",
    headers: {
      "content-type": "application/json",
      "x-github-event": "deployment_status",
      "x-hub-signature-256": sign(SECRET, body),
    },
    body,
  };
}

describe("createHandler", () => {
  function handlerWith(
    execute: HandlerDeps["execute"],
    overrides: Partial<HandlerDeps> = {}
  ) {
    return createHandler({
      config,
      credentials: { kind: "token", token: "test-token" },
      transport: nodemailer.createTransport({ jsonTransport: true }),
      mailFrom: "deployer@example.com",
      graceMs: 20,
      execute,
      ...overrides,
    });
  }

  it("hands a valid request to the deployment with the repository's credentials", async () => {
    const execute = vi.fn<typeof executeDeployment>(async () => ({
      state: "success",
      versionDir: "/srv/www/site/v1",
    }));

    const response = await handlerWith(execute)(webhook());

    expect(response).toEqual({ statusCode: 200, body: "Deployment 1234 succeeded." });
    expect(execute).toHaveBeenCalledTimes(1);
    const [job, options] = execute.mock.calls[0];
    expect(job).toEqual({
      webroot: "/srv/www/site/webroot",
      repository: "acme/site",
      environment: "production",
      deployUrl: "https://www.example.com",
      deploymentId: 1234,
      commitSha: SHA,
      artifact: { name: "site.tar", url: ASSET_URL, checksum: CHECKSUM },
    });
    expect(options.token).toBe("test-token");
    expect(options.secret).toBe(SECRET);
    expect(options.recipients).toEqual(["web@example.com", "octocat@example.com"]);
    expect(options.mailFrom).toBe("deployer@example.com");
  });

  it("passes the shutdown signal on to the deployment", async () => {
    const execute = vi.fn<typeof executeDeployment>(async () => ({
      state: "success",
      versionDir: "/srv/www/site/v1",
    }));
    const shutdown = new AbortController();

    await handlerWith(execute, { signal: shutdown.signal })(webhook());

    expect(execute.mock.calls[0][1].signal).toBe(shutdown.signal);
  });

  it("answers 202 while the deployment is still running", async () => {
    const execute = vi.fn<typeof executeDeployment>(
      () => new Promise<DeploymentOutcome>(() => undefined)
    );

    expect(await handlerWith(execute)(webhook())).toEqual({
      statusCode: 202,
      body: "Deployment 1234 accepted.",
    });
  });

  it("answers 500 for a deployment that failed quickly", async () => {
    const execute = vi.fn<typeof executeDeployment>(async () => ({
      state: "failure",
      error: new Error("Checksum mismatch"),
    }));

    expect(await handlerWith(execute)(webhook())).toEqual({
      statusCode: 500,
      body: "Deployment 1234 failed: Checksum mismatch",
    });
  });

  it("answers 500 when the deployment throws", async () => {
    const execute = vi.fn<typeof executeDeployment>(async () => {
      throw new Error("disk full");
    });

    expect(await handlerWith(execute)(webhook())).toEqual({
      statusCode: 500,
      body: "disk full",
    });
  });

  it("returns validation failures without starting a deployment", async () => {
    const execute = vi.fn<typeof executeDeployment>();
    const handler = handlerWith(execute);

    expect(await handler(webhook({ method: "PUT" }))).toEqual({
      statusCode: 405,
      body: "Method PUT is not allowed.",
    });
    expect(await handler(webhook({ state: "success" }))).toEqual({
      statusCode: 200,
      body: 'Skipped: deployment status is "success".',
    });
    expect(execute).not.toHaveBeenCalled();
  });

  it("answers 500 when no access token can be issued", async () => {
    const execute = vi.fn<typeof executeDeployment>();
    const handler = handlerWith(execute, {
      credentials: { kind: "app", clientId: "Iv1.test", privateKey: "not a key" },
    });

    expect((await handler(webhook())).statusCode).toBe(500);
    expect(execute).not.toHaveBeenCalled();
  });
});

describe("executeDeployment", () => {
  let base: string;

  beforeEach(async () => {
    base = await tempDir();
  });

  afterEach(async () => {
    await removeDir(base);
  });

  it("deploys, reports every status, prunes the release and mails the transcript", async () => {
    const artifact = await makeTar({ "index.html": "<h1>Hello</h1>" });
    const github = artifactServer(artifact, ({ method, url }) => {
      if (method === "POST" && url.pathname === "/repos/acme/site/deployments/1234/statuses") {
        return json({ id: 1 }, 201);
      }
      if (method === "GET" && url.pathname === "/repos/acme/site/releases/tags/production") {
        return json({ id: 5 });
      }
      if (method === "GET" && url.pathname === "/repos/acme/site/releases/5/assets") {
        return json(
          [42, 1, 2, 3, 4, 5].map((id, index) => ({
            id,
            name: `site-${id}.tar`,
            updated_at: `2026-01-0${9 - index}T00:00:00Z`,
          }))
        );
      }
      if (method === "DELETE") {
        return new Response(null, { status: 204 });
      }
      return json({ message: "Not Found" }, 404);
    });
    const transport = nodemailer.createTransport({ jsonTransport: true });
    const sendMail = vi.spyOn(transport, "sendMail");
    const job: DeploymentJob = {
      webroot: path.join(base, "webroot"),
      repository: "acme/site",
      environment: "production",
      deployUrl: "https://www.example.com",
      deploymentId: 1234,
      commitSha: SHA,
      artifact: { url: ASSET_URL, checksum: checksum(artifact) },
    };

    const outcome = await executeDeployment(job, {
      token: "test-token",
      secret: SECRET,
      recipients: ["ops@example.com"],
      log: fixedLog(),
      transport,
      mailFrom: "deployer@example.com",
      fetch: github.fetch,
    });

    expect(outcome.state).toBe("success");
    expect(await readlink(job.webroot)).toMatch(new RegExp(`_${SHA}_1234$`));
    expect(
      github.calls
        .filter(({ url }) => url.pathname.endsWith("/statuses"))
        .map(({ body }) => body)
        .map((body) => (typeof body === "object" && body != null && "state" in body ? body.state : null))
    ).toEqual(["queued", "in_progress", "success"]);
    expect(
      github.calls.filter(({ method }) => method === "DELETE").map(({ url }) => url.pathname)
    ).toEqual(["/repos/acme/site/releases/assets/5"]);
    expect(sendMail).toHaveBeenCalledTimes(1);
    expect(sendMail.mock.calls[0][0]).toMatchObject({
      to: ["ops@example.com"],
      subject: "[acme/site] production deployment succeeded (0123456)",
    });
  });
});

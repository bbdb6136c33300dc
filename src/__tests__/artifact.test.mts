import { existsSync } from "fs";
import { readFile } from "fs/promises";
import path from "path";
import { ArtifactError, downloadArtifact, withArtifact } from "../artifact.mts";
import {
  ASSET_URL,
  artifactServer,
  checksum,
  fakeFetch,
  removeDir,
  SECRET,
  tempDir,
} from "./helpers.mts";

describe("downloadArtifact", () => {
  let dir: string;
  let destination: string;
  const artifact = Buffer.from("static site contents\n".repeat(1000));

  beforeEach(async () => {
    dir = await tempDir();
    destination = path.join(dir, "artifact.download");
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("writes the verified artifact byte for byte", async () => {
    const server = artifactServer(artifact);

    const written = await downloadArtifact({
      url: ASSET_URL,
      destination,
      checksum: checksum(artifact),
      secret: SECRET,
      token: "test-token",
      fetch: server.fetch,
    });

    expect(written).toBe(artifact.length);
    expect((await readFile(destination)).equals(artifact)).toBe(true);
    expect(server.calls.map(({ method }) => method)).toEqual(["HEAD", "GET"]);
    expect(server.calls[1].headers.get("authorization")).toBe("Bearer test-token");
    expect(server.calls[1].headers.get("accept")).toBe("application/octet-stream");
  });

  it("rejects an artifact whose checksum does not match", async () => {
    const corrupted = Buffer.from(artifact);
    corrupted[10] ^= 0xff;
    const server = artifactServer(corrupted);

    await expect(
      downloadArtifact({
        url: ASSET_URL,
        destination,
        checksum: checksum(artifact),
        secret: SECRET,
        fetch: server.fetch,
      })
    ).rejects.toThrow(`Checksum mismatch for ${ASSET_URL}: expected ${checksum(artifact)}, got ${checksum(corrupted)}`);
  });

  it("rejects an artifact signed with another secret", async () => {
    const server = artifactServer(artifact);
    await expect(
      downloadArtifact({
        url: ASSET_URL,
        destination,
        checksum: checksum(artifact, "test-secret-other"),
        secret: SECRET,
        fetch: server.fetch,
      })
    ).rejects.toBeInstanceOf(ArtifactError);
  });

  it("refuses an advertised size above the limit before downloading", async () => {
    const server = fakeFetch(
      () =>
        new Response(null, {
          headers: { "content-length": String(2 ** 32 + 1) },
        })
    );

    await expect(
      downloadArtifact({
        url: ASSET_URL,
        destination,
        checksum: checksum(artifact),
        secret: SECRET,
        fetch: server.fetch,
      })
    ).rejects.toThrow(`Artifact ${ASSET_URL} is 4294967297 bytes, more than the 4294967296 byte limit`);
    expect(server.calls.map(({ method }) => method)).toEqual(["HEAD"]);
    expect(existsSync(destination)).toBe(false);
  });

  it("stops a download that grows past the limit", async () => {
    const server = fakeFetch((call) =>
      new Response(call.method === "HEAD" ? null : artifact)
    );

    await expect(
      downloadArtifact({
        url: ASSET_URL,
        destination,
        checksum: checksum(artifact),
        secret: SECRET,
        fetch: server.fetch,
        maxBytes: 100,
      })
    ).rejects.toThrow(`Artifact ${ASSET_URL} exceeded the 100 byte limit while downloading`);
  });

  it("fails when the asset cannot be found", async () => {
    const server = fakeFetch(() => new Response(null, { status: 404, statusText: "Not Found" }));

    await expect(
      downloadArtifact({
        url: ASSET_URL,
        destination,
        checksum: checksum(artifact),
        secret: SECRET,
        fetch: server.fetch,
      })
    ).rejects.toThrow(`Failed to inspect artifact ${ASSET_URL}: 404 Not Found`);
  });
});

describe("withArtifact", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await tempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("hands the file to the callback and removes it afterwards", async () => {
    const artifact = Buffer.from("hello");
    const destination = path.join(dir, "artifact.download");
    const options = {
      url: ASSET_URL,
      destination,
      checksum: checksum(artifact),
      secret: SECRET,
      fetch: artifactServer(artifact).fetch,
    };

    const content = await withArtifact(options, (file) => readFile(file, "utf8"));

    expect(content).toBe("hello");
    expect(existsSync(destination)).toBe(false);
  });

  it("removes the file when the callback throws", async () => {
    const artifact = Buffer.from("hello");
    const destination = path.join(dir, "artifact.download");
    const options = {
      url: ASSET_URL,
      destination,
      checksum: checksum(artifact),
      secret: SECRET,
      fetch: artifactServer(artifact).fetch,
    };

    await expect(
      withArtifact(options, async () => {
        throw new Error("extraction failed");
      })
    ).rejects.toThrow("extraction failed");
    expect(existsSync(destination)).toBe(false);
  });

  it("removes a partially verified file", async () => {
    const artifact = Buffer.from("hello");
    const destination = path.join(dir, "artifact.download");
    const callback = vi.fn(async () => "unreachable");

    await expect(
      withArtifact(
        {
          url: ASSET_URL,
          destination,
          checksum: checksum(Buffer.from("other")),
          secret: SECRET,
          fetch: artifactServer(artifact).fetch,
        },
        callback
      )
    ).rejects.toBeInstanceOf(ArtifactError);
    expect(callback).not.toHaveBeenCalled();
    expect(existsSync(destination)).toBe(false);
  });
});

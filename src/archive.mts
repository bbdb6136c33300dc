import { createReadStream, createWriteStream } from "fs";
import { open } from "fs/promises";
import { Transform } from "stream";
import { pipeline } from "stream/promises";
import { Decompress } from "fzstd";
import * as tar from "tar";

const ZSTD_MAGIC = Buffer.from([0x28, 0xb5, 0x2f, 0xfd]);

export class ArchiveError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ArchiveError";
  }
}

/**
 * Checks whether a file starts with the zstd frame magic number.
 */
export async function isZstd(path: string): Promise<boolean> {
  const file = await open(path, "r");
  try {
    const magic = Buffer.alloc(ZSTD_MAGIC.length);
    const { bytesRead } = await file.read(magic, 0, magic.length, 0);
    return bytesRead === magic.length && magic.equals(ZSTD_MAGIC);
  } finally {
    await file.close();
  }
}

function zstdDecompressor(): Transform {
  const stream = new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      try {
        decoder.push(chunk);
        callback();
      } catch (err) {
        callback(err instanceof Error ? err : new Error(String(err)));
      }
    },
    flush(callback) {
      try {
        decoder.push(new Uint8Array(0), true);
        callback();
      } catch (err) {
        callback(err instanceof Error ? err : new Error(String(err)));
      }
    },
  });
  const decoder = new Decompress((data) => {
    stream.push(data);
  });
  return stream;
}

/**
 * Returns the path of a plain tar archive for `path`: the file itself, or
 * `scratch` after decompressing a zstd-compressed archive into it.
 * @param path The downloaded artifact.
 * @param scratch Where a decompressed copy is written if one is needed.
 */
export async function toTar(path: string, scratch: string): Promise<string> {
  if (!(await isZstd(path))) {
    return path;
  }
  try {
    await pipeline(
      createReadStream(path),
      zstdDecompressor(),
      createWriteStream(scratch, { mode: 0o600 })
    );
  } catch (err) {
    throw new ArchiveError(`Unable to decompress ${path}`, { cause: err });
  }
  return scratch;
}

/**
 * Lists the entries of a tar archive without extracting it.
 * @throws ArchiveError when the archive is unreadable or has no entries.
 */
export async function listArchive(path: string): Promise<string[]> {
  const entries: string[] = [];
  try {
    await tar.t({
      file: path,
      strict: true,
      onReadEntry: (entry) => {
        entries.push(entry.path);
      },
    });
  } catch (err) {
    throw new ArchiveError(`Unable to read archive ${path}`, { cause: err });
  }
  if (entries.length === 0) {
    throw new ArchiveError(`Archive ${path} is empty`);
  }
  return entries;
}

/**
 * Extracts a tar archive into `directory`. Ownership recorded in the archive
 * is ignored, modes are left to the process umask, and entries that would
 * land outside `directory` or write through a symlink are refused.
 */
export async function extractArchive(
  path: string,
  directory: string
): Promise<void> {
  try {
    await tar.x({
      file: path,
      cwd: directory,
      strict: true,
      preserveOwner: false,
      preservePaths: false,
      noChmod: true,
      unlink: false,
    });
  } catch (err) {
    throw new ArchiveError(`Unable to extract ${path} into ${directory}`, {
      cause: err,
    });
  }
}

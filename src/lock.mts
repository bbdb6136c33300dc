import { randomUUID } from "crypto";
import { readFileSync, unlinkSync } from "fs";
import { link, open, stat, unlink, type FileHandle } from "fs/promises";
import { setTimeout as sleep } from "timers/promises";
import type { DeployLog } from "./log.mts";

export const LOCK_POLL_MS = 10_000;
export const LOCK_TIMEOUT_MS = 600_000;

/** A takeover claim older than this belongs to a process that died mid-takeover. */
const CLAIM_STALE_MS = 30_000;

export class LockTimeoutError extends Error {
  constructor(
    public readonly path: string,
    public readonly holder: number | null,
    timeoutMs: number
  ) {
    super(
      `Timed out after ${Math.round(timeoutMs / 1000)}s waiting for ${path}` +
        (holder != null ? ` (held by pid ${holder})` : "")
    );
    this.name = "LockTimeoutError";
  }
}

export type LockOptions = {
  timeoutMs?: number;
  pollMs?: number;
  signal?: AbortSignal;
  log?: DeployLog;
};

type LockState = {
  ino: number;
  ageMs: number;
  pid: number | null;
  token: string | null;
};

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

function ignoreMissing(err: unknown): void {
  if (!(isErrnoException(err) && err.code === "ENOENT")) {
    throw err;
  }
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else.
    return isErrnoException(err) && err.code === "EPERM";
  }
}

/**
 * Lock files hold the owner's pid on the first line and a per-acquisition
 * token on the second.
 */
function parseLock(content: string): { pid: number | null; token: string | null } {
  const [first = "", second = ""] = content.split("\n");
  const pid = Number.parseInt(first.trim(), 10);
  return {
    pid: Number.isInteger(pid) && pid > 0 ? pid : null,
    token: second.trim() !== "" ? second.trim() : null,
  };
}

async function readLockState(path: string): Promise<LockState | null> {
  let handle: FileHandle;
  try {
    handle = await open(path, "r");
  } catch (err) {
    ignoreMissing(err);
    return null;
  }
  try {
    const stats = await handle.stat();
    const { pid, token } = parseLock(await handle.readFile("utf8"));
    return { ino: stats.ino, ageMs: Date.now() - stats.mtimeMs, pid, token };
  } finally {
    await handle.close();
  }
}

/**
 * Reads the pid recorded in a lock file.
 * @param path The lock file path.
 * @returns The holder's pid, or null when the file is missing or holds none.
 */
export async function readLockHolder(path: string): Promise<number | null> {
  return (await readLockState(path))?.pid ?? null;
}

const held = new Map<string, string>();
let exitHookInstalled = false;

function removeHeldLocks() {
  for (const [path, token] of held) {
    try {
      if (parseLock(readFileSync(path, "utf8")).token === token) {
        unlinkSync(path);
      }
    } catch (err) {
      console.error(
        `Failed to remove lock ${path} on exit: ${
          err instanceof Error ? err.message : String(err)
        }`
      );
    }
  }
  held.clear();
}

function track(path: string, token: string) {
  if (!exitHookInstalled) {
    process.on("exit", removeHeldLocks);
    exitHookInstalled = true;
  }
  held.set(path, token);
}

/**
 * Exclusive ownership of a lock file. The file holds the owner's pid so an
 * operator can see who is blocking a deployment, and a token so only this
 * handle ever removes it.
 */
export class LockHandle {
  private released = false;

  constructor(
    public readonly path: string,
    private readonly token: string
  ) {
    track(path, token);
  }

  get isHeld(): boolean {
    return !this.released;
  }

  async release(): Promise<void> {
    if (this.released) {
      return;
    }
    this.released = true;
    if (held.get(this.path) === this.token) {
      held.delete(this.path);
    }
    if ((await readLockState(this.path))?.token === this.token) {
      await unlink(this.path).catch(ignoreMissing);
    }
  }
}

async function tryAcquire(path: string): Promise<LockHandle | null> {
  let handle: FileHandle;
  try {
    handle = await open(path, "wx");
  } catch (err) {
    if (isErrnoException(err) && err.code === "EEXIST") {
      return null;
    }
    throw err;
  }
  const token = randomUUID();
  try {
    await handle.writeFile(`${process.pid}\n${token}\n`);
  } finally {
    await handle.close();
  }
  return new LockHandle(path, token);
}

function isStale(state: LockState, pollMs: number): boolean {
  if (state.pid == null) {
    // Crashed between creating the file and writing the pid.
    return state.ageMs > pollMs;
  }
  return state.pid !== process.pid && !isProcessAlive(state.pid);
}

/**
 * Removes the stale lock file with inode `ino`. Takers race for a hard link
 * at `{path}.claim`: only the one holding it may unlink `path`, and only when
 * the claim still points at the stale inode. A lock created after the stale
 * one was removed has a different inode and is left alone.
 * @returns False when another taker holds the claim.
 */
async function removeStaleLock(path: string, ino: number): Promise<boolean> {
  const claim = `${path}.claim`;
  try {
    await link(path, claim);
  } catch (err) {
    if (isErrnoException(err) && err.code === "EEXIST") {
      // link() touches the inode's ctime, so it dates the claim itself.
      const leftover = await stat(claim).catch((statErr: unknown) => {
        ignoreMissing(statErr);
        return null;
      });
      if (leftover != null && Date.now() - leftover.ctimeMs > CLAIM_STALE_MS) {
        await unlink(claim).catch(ignoreMissing);
        return true;
      }
      return leftover == null;
    }
    ignoreMissing(err);
    return true;
  }

  try {
    if ((await stat(claim)).ino === ino) {
      await unlink(path).catch(ignoreMissing);
    }
  } finally {
    await unlink(claim).catch(ignoreMissing);
  }
  return true;
}

/**
 * Acquires the lock file at `path`, polling while another process holds it.
 * A lock whose recorded pid is no longer running, or that never got a pid
 * and is older than the poll interval, is taken over.
 * @param path The lock file path, e.g. `/srv/www/webroot.lock`.
 * @param options Timeout, poll interval, abort signal and log collector.
 * @throws LockTimeoutError when the lock is still held after the timeout.
 */
export async function acquireLock(
  path: string,
  options: LockOptions = {}
): Promise<LockHandle> {
  const {
    timeoutMs = LOCK_TIMEOUT_MS,
    pollMs = LOCK_POLL_MS,
    signal,
    log,
  } = options;
  const deadline = Date.now() + timeoutMs;
  let reported = false;

  for (;;) {
    signal?.throwIfAborted();

    const lock = await tryAcquire(path);
    if (lock != null) {
      log?.debug(`Acquired lock ${path}`);
      return lock;
    }

    const state = await readLockState(path);
    if (state == null) {
      continue;
    }
    if (isStale(state, pollMs)) {
      log?.warn(
        `Removing stale lock ${path}` +
          (state.pid != null ? ` left by pid ${state.pid}` : " without a pid")
      );
      if (await removeStaleLock(path, state.ino)) {
        continue;
      }
    }

    if (!reported) {
      log?.info(
        `Waiting for lock ${path}` +
          (state.pid != null ? ` held by pid ${state.pid}` : "")
      );
      reported = true;
    }

    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      throw new LockTimeoutError(path, state.pid, timeoutMs);
    }
    await sleep(Math.min(pollMs, remaining), undefined, { signal });
  }
}

/**
 * Runs `fn` while holding the lock at `path`, releasing it however `fn` exits.
 */
export async function withLock<T>(
  path: string,
  options: LockOptions,
  fn: () => Promise<T>
): Promise<T> {
  const lock = await acquireLock(path, options);
  try {
    return await fn();
  } finally {
    await lock.release();
  }
}

import fs from "node:fs/promises";
import type { Stats } from "node:fs";
import path from "node:path";

export async function ensureDir(dirPath: string, mode?: number): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true, mode });
}

const writeQueues = new Map<string, Promise<void>>();
const LOCK_WAIT_MS = 25;
const LOCK_TIMEOUT_MS = 5000;
const LOCK_STALE_MS = 2 * 60 * 1000;

export async function sleep(ms: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, ms));
}

async function syncDirectory(dirPath: string): Promise<void> {
  let handle: fs.FileHandle | undefined;
  try {
    handle = await fs.open(dirPath, "r");
    await handle.sync();
  } catch (e) {
    const code = (e as NodeJS.ErrnoException).code;
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EPERM" && code !== "EISDIR") throw e;
  } finally {
    await handle?.close().catch(() => {});
  }
}

function isPidAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) return false;
  try {
    process.kill(pid, 0);
    return true;
  } catch (e) {
    const code = (e as NodeJS.ErrnoException).code;
    return code !== "ESRCH";
  }
}

async function clearStaleLock(lockPath: string, staleMs: number): Promise<void> {
  let stat: Stats;
  try {
    stat = await fs.stat(lockPath);
  } catch {
    return;
  }
  const lockAge = Date.now() - stat.mtimeMs;
  if (!Number.isFinite(lockAge) || lockAge < staleMs) return;

  let ownerPid: number | undefined;
  try {
    const raw = await fs.readFile(lockPath, { encoding: "utf8" });
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === "object" && parsed !== null && "pid" in parsed) {
      const pid = parsed.pid;
      if (typeof pid === "number" && Number.isInteger(pid) && pid > 0) ownerPid = pid;
    }
  } catch {
    // Unreadable and stale: the owner never finished writing its metadata.
  }

  if (ownerPid !== undefined && isPidAlive(ownerPid)) return;
  await fs.unlink(lockPath).catch(() => {});
}

async function acquireLockFile(lockPath: string): Promise<() => Promise<void>> {
  await ensureDir(path.dirname(lockPath));
  const start = Date.now();

  // Retry until timeout; stale lock cleanup handles crashed writers.
  // eslint-disable-next-line no-constant-condition
  while (true) {
    let handle: fs.FileHandle | undefined;
    try {
      handle = await fs.open(lockPath, "wx");
      const payload = `${JSON.stringify({ pid: process.pid, acquired_at: new Date().toISOString() })}\n`;
      await handle.writeFile(payload, { encoding: "utf8" });
      await handle.sync();
      const held = handle;
      return async () => {
        await held.close().catch(() => {});
        await fs.unlink(lockPath).catch(() => {});
      };
    } catch (e) {
      await handle?.close().catch(() => {});
      const code = (e as NodeJS.ErrnoException).code;
      if (code !== "EEXIST") throw e;
      await clearStaleLock(lockPath, LOCK_STALE_MS);
      if (Date.now() - start >= LOCK_TIMEOUT_MS) {
        throw new Error(`Timed out waiting for write lock: ${lockPath}`);
      }
      await sleep(LOCK_WAIT_MS);
    }
  }
}

async function withWriteQueue<T>(key: string, fn: () => Promise<T>): Promise<T> {
  const prev = writeQueues.get(key) ?? Promise.resolve();
  let resolveNext!: () => void;
  const next = new Promise<void>((resolve) => {
    resolveNext = resolve;
  });
  writeQueues.set(key, prev.then(() => next));
  await prev;
  try {
    return await fn();
  } finally {
    resolveNext();
    if (writeQueues.get(key) === next) writeQueues.delete(key);
  }
}

/**
 * Serializes `fn` against every other holder of `lockPath`: callers in this
 * process wait on an in-memory queue, other processes on the lock file itself.
 */
export async function withFileLock<T>(lockPath: string, fn: () => Promise<T>): Promise<T> {
  const key = path.resolve(lockPath);
  return withWriteQueue(key, async () => {
    const release = await acquireLockFile(key);
    try {
      return await fn();
    } finally {
      await release();
    }
  });
}

export type WriteFileOptions = {
  mode?: number;
};

/** Write-temp-then-rename. Callers that need mutual exclusion wrap this in withFileLock. */
export async function writeFileAtomic(
  filePath: string,
  contents: string,
  opts: WriteFileOptions = {}
): Promise<void> {
  const absolutePath = path.resolve(filePath);
  const dir = path.dirname(absolutePath);
  await ensureDir(dir);
  const tmpPath = path.join(
    dir,
    `.${path.basename(absolutePath)}.tmp-${process.pid}-${Date.now()}-${Math.random()
      .toString(16)
      .slice(2)}`
  );
  let tmpHandle: fs.FileHandle | undefined;
  try {
    tmpHandle = await fs.open(tmpPath, "w", opts.mode);
    await tmpHandle.writeFile(contents, { encoding: "utf8" });
    await tmpHandle.sync();
    await tmpHandle.close();
    tmpHandle = undefined;
    await fs.rename(tmpPath, absolutePath);
    await syncDirectory(dir);
  } finally {
    await tmpHandle?.close().catch(() => {});
    await fs.unlink(tmpPath).catch(() => {});
  }
}

async function endsWithNewline(filePath: string): Promise<boolean> {
  let handle: fs.FileHandle | undefined;
  try {
    handle = await fs.open(filePath, "r");
    const { size } = await handle.stat();
    if (size === 0) return true;
    const buf = Buffer.alloc(1);
    await handle.read(buf, 0, 1, size - 1);
    return buf[0] === 0x0a;
  } catch (e) {
    if ((e as NodeJS.ErrnoException).code === "ENOENT") return true;
    throw e;
  } finally {
    await handle?.close().catch(() => {});
  }
}

/**
 * Appends newline-terminated records and fsyncs before returning. A tail left
 * without its newline by a crashed writer is fenced off with a newline first,
 * so the torn fragment stays a single unparseable line instead of swallowing
 * the new record.
 */
export async function appendLinesDurable(
  filePath: string,
  contents: string,
  opts: WriteFileOptions = {}
): Promise<void> {
  const absolutePath = path.resolve(filePath);
  const dir = path.dirname(absolutePath);
  await ensureDir(dir);
  const prefix = (await endsWithNewline(absolutePath)) ? "" : "\n";
  const fileHandle = await fs.open(absolutePath, "a", opts.mode);
  try {
    await fileHandle.writeFile(`${prefix}${contents}`, { encoding: "utf8" });
    await fileHandle.sync();
  } finally {
    await fileHandle.close().catch(() => {});
  }
  await syncDirectory(dir);
}

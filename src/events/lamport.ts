import fs from "node:fs/promises";
import { z } from "zod";
import { LocalIoError, ValidationError, errorMessage } from "../core/errors.js";
import { silentLogger, type Logger } from "../core/logger.js";
import { withFileLock, writeFileAtomic } from "../store/fs.js";

const ClockFile = z.record(z.string(), z.number().int().nonnegative());
type ClockFile = z.infer<typeof ClockFile>;

export type LamportClockArgs = {
  node_id: string;
  /** Shared by every node on this machine; counters are keyed by node id. */
  file_path: string;
  logger?: Logger;
};

/**
 * Per-node Lamport clock. Every mutation re-reads the persisted counters under
 * the clock lock, so two processes running as the same node never hand out
 * the same value and other nodes' counters are left as they were.
 */
export class LamportClock {
  readonly node_id: string;
  readonly file_path: string;
  private value: number;
  private readonly logger: Logger;

  private constructor(args: LamportClockArgs, value: number) {
    this.node_id = args.node_id;
    this.file_path = args.file_path;
    this.logger = args.logger ?? silentLogger();
    this.value = value;
  }

  static async load(args: LamportClockArgs): Promise<LamportClock> {
    if (!args.node_id.trim()) throw new ValidationError("node_id is required");
    const logger = args.logger ?? silentLogger();
    const clocks = await readClockFile(args.file_path, logger);
    return new LamportClock({ ...args, logger }, clocks[args.node_id] ?? 0);
  }

  current(): number {
    return this.value;
  }

  async increment(): Promise<number> {
    return this.advance((persisted) => Math.max(this.value, persisted) + 1);
  }

  /** Lamport receive rule: max(local, remote) + 1. */
  async observe(remoteValue: number): Promise<number> {
    if (!Number.isInteger(remoteValue) || remoteValue < 0) {
      throw new ValidationError(`Invalid remote clock value: ${remoteValue}`);
    }
    return this.advance((persisted) => Math.max(this.value, persisted, remoteValue) + 1);
  }

  private async advance(next: (persisted: number) => number): Promise<number> {
    return withFileLock(`${this.file_path}.lock`, async () => {
      const clocks = await readClockFile(this.file_path, this.logger);
      const value = next(clocks[this.node_id] ?? 0);
      const updated: ClockFile = { ...clocks, [this.node_id]: value };
      try {
        await writeFileAtomic(this.file_path, `${JSON.stringify(updated)}\n`, { mode: 0o600 });
      } catch (e) {
        throw new LocalIoError(
          `Failed to persist Lamport clock for ${this.node_id}: ${errorMessage(e)}`,
          this.file_path,
          { cause: e }
        );
      }
      this.value = value;
      return value;
    });
  }
}

async function readClockFile(filePath: string, logger: Logger): Promise<ClockFile> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, { encoding: "utf8" });
  } catch (e) {
    if ((e as NodeJS.ErrnoException).code === "ENOENT") return {};
    throw new LocalIoError(`Failed to read Lamport clock: ${errorMessage(e)}`, filePath, { cause: e });
  }
  try {
    const parsed = ClockFile.safeParse(JSON.parse(raw));
    if (parsed.success) return parsed.data;
    logger.warn({ file_path: filePath, issues: parsed.error.issues.length }, "clock file has invalid shape; starting from zero");
  } catch (e) {
    logger.warn({ file_path: filePath, err: errorMessage(e) }, "clock file is corrupt; starting from zero");
  }
  return {};
}

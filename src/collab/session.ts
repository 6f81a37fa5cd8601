import fs from "node:fs/promises";
import path from "node:path";
import { NotJoinedError, ValidationError, errorMessage } from "../core/errors.js";
import { silentLogger, type Logger } from "../core/logger.js";
import { nowIso } from "../core/time.js";
import { assertMissionId } from "../schemas/common.js";
import { ActiveMissionPointer, MissionSession } from "../schemas/session.js";
import { writeFileAtomic } from "../store/fs.js";

export type SessionStoreArgs = {
  home_dir: string;
  logger?: Logger;
};

/**
 * Local cache of remotely issued participant identity, one file per mission,
 * plus a pointer to the mission commands default to.
 */
export class SessionStore {
  readonly home_dir: string;
  private readonly logger: Logger;

  constructor(args: SessionStoreArgs) {
    this.home_dir = args.home_dir;
    this.logger = args.logger ?? silentLogger();
  }

  sessionPath(missionId: string): string {
    return path.join(this.home_dir, "missions", assertMissionId(missionId), "session.json");
  }

  activeMissionPath(): string {
    return path.join(this.home_dir, "session.json");
  }

  async save(session: MissionSession): Promise<void> {
    const normalized = MissionSession.parse(session);
    const p = this.sessionPath(normalized.mission_id);
    await writeFileAtomic(p, `${JSON.stringify(normalized, null, 2)}\n`, { mode: 0o600 });
    await fs.chmod(p, 0o600);
  }

  /** Null when the mission was never joined or its session file is unreadable. */
  async load(missionId: string): Promise<MissionSession | null> {
    const doc = await this.readJson(this.sessionPath(missionId));
    if (doc === undefined) return null;
    const parsed = MissionSession.safeParse(doc);
    if (!parsed.success) {
      this.logger.warn({ mission_id: missionId }, "session file is invalid; treating mission as not joined");
      return null;
    }
    return parsed.data;
  }

  async ensureJoined(missionId: string): Promise<MissionSession> {
    const session = await this.load(missionId);
    if (!session) throw new NotJoinedError(missionId);
    return session;
  }

  async setActiveMission(missionId: string): Promise<void> {
    const pointer: ActiveMissionPointer = { active_mission_id: assertMissionId(missionId), last_switched_at: nowIso() };
    await writeFileAtomic(this.activeMissionPath(), `${JSON.stringify(pointer, null, 2)}\n`);
  }

  async getActiveMission(): Promise<string | null> {
    const doc = await this.readJson(this.activeMissionPath());
    if (doc === undefined) return null;
    const parsed = ActiveMissionPointer.safeParse(doc);
    return parsed.success ? parsed.data.active_mission_id : null;
  }

  async resolveMissionId(explicitId?: string): Promise<string> {
    if (explicitId?.trim()) return assertMissionId(explicitId.trim());
    const active = await this.getActiveMission();
    if (!active) {
      throw new ValidationError(
        "No active mission. Pass --mission <mission_id> or join one with: mcollab mission:join <mission_id> --role <role>"
      );
    }
    return active;
  }

  private async readJson(filePath: string): Promise<unknown> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, { encoding: "utf8" });
    } catch (e) {
      if ((e as NodeJS.ErrnoException).code !== "ENOENT") {
        this.logger.warn({ file_path: filePath, err: errorMessage(e) }, "failed to read session file");
      }
      return undefined;
    }
    try {
      return JSON.parse(raw);
    } catch (e) {
      this.logger.warn({ file_path: filePath, err: errorMessage(e) }, "session file is corrupt");
      return undefined;
    }
  }
}

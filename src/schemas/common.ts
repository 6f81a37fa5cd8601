import { z } from "zod";
import { ValidationError } from "../core/errors.js";
import { isValidId } from "../core/ids.js";

export const IsoDateTime = z
  .string()
  .datetime({ offset: true })
  .or(z.string().datetime({ local: true }));

export const Ulid = z.string().refine(isValidId, { message: "Expected a 26-character ULID" });

export const ParticipantRole = z.enum(["developer", "reviewer", "observer", "stakeholder"]);
export type ParticipantRole = z.infer<typeof ParticipantRole>;

export const DriveIntent = z.enum(["active", "inactive"]);
export type DriveIntent = z.infer<typeof DriveIntent>;

// Mission ids name files and directories, so they never contain a separator or start with a dot.
const MISSION_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export function assertMissionId(missionId: string): string {
  if (!MISSION_ID_PATTERN.test(missionId)) {
    throw new ValidationError(`Invalid mission id: ${JSON.stringify(missionId)}`);
  }
  return missionId;
}

import { z } from "zod";
import { IsoDateTime, ParticipantRole } from "./common.js";

export const MissionSession = z
  .object({
    mission_id: z.string().min(1),
    mission_run_id: z.string().default(""),
    participant_id: z.string().min(1),
    role: ParticipantRole,
    joined_at: IsoDateTime,
    api_url: z.string().default(""),
    session_token: z.string().default("")
  })
  .strict();
export type MissionSession = z.infer<typeof MissionSession>;

export const ActiveMissionPointer = z
  .object({
    active_mission_id: z.string().min(1).nullable(),
    last_switched_at: IsoDateTime.nullable()
  })
  .strict();
export type ActiveMissionPointer = z.infer<typeof ActiveMissionPointer>;

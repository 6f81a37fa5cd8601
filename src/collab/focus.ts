import { ValidationError } from "../core/errors.js";
import type { FocusTarget } from "../schemas/event.js";

/** Parses `wp:<id>`, `step:<id>` or `none`. */
export function parseFocus(text: string): FocusTarget | null {
  const s = text.trim();
  if (s === "none" || s === "") return null;
  if (s.startsWith("wp:") && s.length > 3) return { target_type: "work_package", target_id: s.slice(3) };
  if (s.startsWith("step:") && s.length > 5) return { target_type: "step", target_id: s.slice(5) };
  throw new ValidationError(`Invalid focus format: ${text}. Expected wp:<id>, step:<id>, or none`);
}

export function formatFocus(target: FocusTarget | null): string | null {
  if (!target) return null;
  const prefix = target.target_type === "work_package" ? "wp" : "step";
  return `${prefix}:${target.target_id}`;
}

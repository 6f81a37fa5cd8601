import type { CollisionWarning } from "./collision.js";
import type { Delivery, StatusReport } from "./service.js";

export function deliveryNote(delivery: Delivery): string {
  switch (delivery) {
    case "delivered":
      return "sent";
    case "queued":
      return "queued; will sync when online";
    case "rejected":
      return "rejected by ingestion service; see mission:status";
  }
}

export function renderCollision(warning: CollisionWarning): string {
  const lines = [
    `${warning.severity.toUpperCase()} collision on ${warning.focus} (warning ${warning.warning_id})`
  ];
  for (const p of warning.conflicting_participants) {
    lines.push(`  ${p.participant_id} (${p.role}) is already driving`);
  }
  return lines.join("\n") + "\n";
}

export function renderStatus(report: StatusReport, opts: { verbose?: boolean } = {}): string {
  const lines = [
    `Mission: ${report.mission_id}`,
    `Participants: ${report.participants.length} (active drivers: ${report.active_drivers})`
  ];
  for (const p of report.participants) {
    let line = `  ${p.participant_id}  ${p.role}  focus=${p.focus ?? "none"}  drive=${p.drive_intent}`;
    if (opts.verbose) line += `  joined=${p.joined_at}  last_activity=${p.last_activity_at}`;
    lines.push(line);
  }
  const q = report.queue;
  lines.push(`Queue: ${q.pending} pending, ${q.delivered} delivered, ${q.failed} failed`);
  if (q.corrupt_lines > 0) lines.push(`  ${q.corrupt_lines} unreadable line(s) skipped`);
  if (report.failures.length > 0) {
    lines.push("Failed events:");
    for (const f of report.failures) {
      lines.push(`  ${f.event_id} ${f.event_type}: ${f.reason ?? "no reason given"}`);
    }
  }
  return lines.join("\n") + "\n";
}

import { appConfig } from "./config.js";
import { UPDATE_VIDEO, type Delta, type Snapshot } from "./types.js";

export interface ReportOptions {
  limit?: number;
  verbose?: boolean;
}

// `previous` tells additions apart from updates and names removed sessions
export function describeDelta(delta: Delta, previous: Snapshot, limit: number = appConfig.REPORT_MAX_LINES): string[] {
  const lines: string[] = [];

  for (const id of Object.keys(delta.sessions).sort()) {
    const s = delta.sessions[id];
    if (s.update === UPDATE_VIDEO) lines.push(`🎬 Video available: ${s.title}`);
    else if (!Object.hasOwn(previous, id)) lines.push(`➕ Added: ${s.title}`);
    else lines.push(`✏️ Updated: ${s.title}`);
  }

  for (const id of delta.removed) {
    const title = Object.hasOwn(previous, id) ? previous[id].title : id;
    lines.push(`➖ Removed: ${title}`);
  }

  const max = Math.max(1, limit);
  if (lines.length <= max) return lines;
  const kept = max - 1;
  return [...lines.slice(0, kept), `… and ${lines.length - kept} more`];
}

export function logDelta(label: string, delta: Delta, previous: Snapshot, opts: ReportOptions = {}): void {
  const changed = Object.keys(delta.sessions).length;
  const removed = delta.removed.length;
  if (changed === 0 && removed === 0) return;

  console.log(`[DIFF] ${label}: ${changed} changed, ${removed} removed`);
  if (!(opts.verbose ?? appConfig.DIFF_VERBOSE)) return;
  for (const line of describeDelta(delta, previous, opts.limit)) {
    console.log(`[DIFF]   ${line}`);
  }
}

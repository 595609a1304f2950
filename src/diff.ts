import { sessionsEqual } from "./compare.js";
import type { Delta, DeltaSession, SessionRecord, Snapshot, UpdateKind } from "./types.js";
import { updateKind } from "./video.js";

function toDeltaSession(s: SessionRecord, update: UpdateKind): DeltaSession {
  const copy: DeltaSession = {
    title: s.title,
    startTime: new Date(s.startTime.getTime()),
    endTime: new Date(s.endTime.getTime()),
    filters: { ...s.filters },
    isLive: s.isLive,
    videoId: s.videoId,
    update,
  };
  if (s.tags) copy.tags = [...s.tags];
  if (s.speakers) copy.speakers = [...s.speakers];
  return copy;
}

export function diffSnapshots(prev: Snapshot, curr: Snapshot, now: Date = new Date()): Delta {
  const sessions = new Map<string, DeltaSession>();

  // Added or changed
  for (const [id, currSession] of Object.entries(curr)) {
    if (!Object.hasOwn(prev, id)) {
      sessions.set(id, toDeltaSession(currSession, ""));
      continue;
    }
    const prevSession = prev[id];
    const kind = updateKind(prevSession, currSession, now);
    if (kind === "" && sessionsEqual(prevSession, currSession)) continue;
    sessions.set(id, toDeltaSession(currSession, kind));
  }

  // Removed
  const removed = Object.keys(prev)
    .filter((id) => !Object.hasOwn(curr, id))
    .sort();

  // fromEntries defines own properties, so ids like "__proto__" survive
  return { sessions: Object.fromEntries(sessions), removed };
}

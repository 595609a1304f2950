import type { SessionRecord } from "./types.js";
import { unique } from "./utils.js";

// Invalid dates compare equal to each other so a record always equals itself.
export function sameInstant(a: Date, b: Date): boolean {
  const x = a.getTime();
  const y = b.getTime();
  return x === y || (Number.isNaN(x) && Number.isNaN(y));
}

// Set comparison; a missing list is the same as an empty one.
export function sameStrings(a: readonly string[] | undefined, b: readonly string[] | undefined): boolean {
  const left = unique(a ?? []);
  const right = new Set(b ?? []);
  return left.length === right.size && left.every((s) => right.has(s));
}

// Strict: a flag missing on one side and false on the other is a difference.
export function sameFilters(a: Record<string, boolean>, b: Record<string, boolean>): boolean {
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) return false;
  return keys.every((k) => Object.hasOwn(b, k) && a[k] === b[k]);
}

export function sessionsEqual(a: SessionRecord, b: SessionRecord): boolean {
  return (
    a.title === b.title &&
    sameInstant(a.startTime, b.startTime) &&
    sameInstant(a.endTime, b.endTime) &&
    a.isLive === b.isLive &&
    a.videoId === b.videoId &&
    sameStrings(a.tags, b.tags) &&
    sameStrings(a.speakers, b.speakers) &&
    sameFilters(a.filters, b.filters)
  );
}

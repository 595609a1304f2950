import { z } from "zod";
import type { SessionRecord, Snapshot } from "./types.js";

const instant = z.union([z.string(), z.number()]).pipe(z.coerce.date());

export const sessionSchema = z.object({
  title: z.string(),
  startTime: instant,
  endTime: instant,
  tags: z.array(z.string()).optional(),
  filters: z.record(z.boolean()).default({}),
  speakers: z.array(z.string()).optional(),
  isLive: z.boolean().default(false),
  videoId: z.string().default(""),
});

// Catalog files either hold the session map directly or under "sessions".
// A lone "sessions" key holding a session record is a session, not a wrapper.
function unwrapSessions(v: unknown): unknown {
  if (typeof v !== "object" || v === null) return v;
  if (Object.keys(v).length !== 1 || !("sessions" in v)) return v;
  const inner = v.sessions;
  if (typeof inner !== "object" || inner === null || "title" in inner) return v;
  return inner;
}

export const snapshotSchema = z.preprocess(unwrapSessions, z.record(sessionSchema));

function describeIssues(error: z.ZodError): string {
  // Paths and messages only, never the offending values
  return error.errors
    .map((e) => (e.path.length ? `${e.path.join(".")}: ${e.message}` : e.message))
    .join(", ");
}

export function parseSession(input: unknown): SessionRecord {
  const parsed = sessionSchema.safeParse(input);
  if (!parsed.success) {
    throw new Error(`Invalid session: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function parseSnapshot(input: unknown): Snapshot {
  const parsed = snapshotSchema.safeParse(input);
  if (!parsed.success) {
    throw new Error(`Invalid snapshot: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

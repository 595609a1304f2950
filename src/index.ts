export { subtract, unique } from "./utils.js";
export { thumbUrl } from "./thumbnail.js";
export { sameFilters, sameInstant, sameStrings, sessionsEqual } from "./compare.js";
export { updateKind } from "./video.js";
export { diffSnapshots } from "./diff.js";
export { parseSession, parseSnapshot, sessionSchema, snapshotSchema } from "./schema.js";
export { UPDATE_VIDEO } from "./types.js";
export type { Delta, DeltaSession, SessionRecord, Snapshot, UpdateKind } from "./types.js";

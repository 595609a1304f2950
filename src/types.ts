export const UPDATE_VIDEO = "video";

// "" means the session changed without a more specific reason.
export type UpdateKind = "" | typeof UPDATE_VIDEO;

export interface SessionRecord {
  title: string;
  startTime: Date;
  endTime: Date; // the session has concluded once this is not after "now"
  tags?: string[];
  filters: Record<string, boolean>;
  speakers?: string[];
  isLive: boolean;
  videoId: string; // "" when there is no video
}

export interface DeltaSession extends SessionRecord {
  update: UpdateKind;
}

// session id -> record
export type Snapshot = Record<string, SessionRecord>;

export interface Delta {
  sessions: Record<string, DeltaSession>;
  removed: string[]; // ids present only in the previous snapshot
}

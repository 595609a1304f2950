import { UPDATE_VIDEO, type SessionRecord, type UpdateKind } from "./types.js";

// A concluded session whose live/video state moved to "not live, has a video"
export function updateKind(prev: SessionRecord, curr: SessionRecord, now: Date): UpdateKind {
  const ended = curr.endTime.getTime() <= now.getTime();
  if (!ended) return "";
  if (curr.isLive || curr.videoId === "") return "";
  if (prev.isLive === curr.isLive && prev.videoId === curr.videoId) return "";
  return UPDATE_VIDEO;
}

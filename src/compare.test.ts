import { describe, it, expect } from "vitest";
import { sameFilters, sameInstant, sameStrings, sessionsEqual } from "./compare.js";
import type { SessionRecord } from "./types.js";

function keynote(overrides: Partial<SessionRecord> = {}): SessionRecord {
  return {
    title: "Keynote",
    startTime: new Date("2015-05-28T09:30:00Z"),
    endTime: new Date("2015-05-28T11:30:00Z"),
    tags: ["FLAG_KEYNOTE"],
    filters: { "Live streamed": true },
    isLive: false,
    videoId: "",
    ...overrides,
  };
}

describe("sessionsEqual", () => {
  it("treats a missing speaker list as empty", () => {
    expect(sessionsEqual(keynote(), keynote({ speakers: [] }))).toBe(true);
    expect(sessionsEqual(keynote({ tags: undefined }), keynote({ tags: [] }))).toBe(true);
  });

  it("compares timestamps by instant", () => {
    const a = keynote();
    const b = keynote({ startTime: new Date(a.startTime.getTime()) });
    expect(sessionsEqual(a, b)).toBe(true);
    expect(sessionsEqual(a, keynote({ startTime: new Date("2015-05-28T10:00:00Z") }))).toBe(false);
  });

  it.each<[string, Partial<SessionRecord>]>([
    ["title", { title: "Opening keynote" }],
    ["endTime", { endTime: new Date("2015-05-28T12:00:00Z") }],
    ["isLive", { isLive: true }],
    ["videoId", { videoId: "abc123" }],
    ["tags", { tags: ["FLAG_KEYNOTE", "TOPIC_ANDROID"] }],
    ["speakers", { speakers: ["speaker-1"] }],
    ["filters", { filters: { "Live streamed": false } }],
  ])("reports a change in %s", (_field, overrides) => {
    expect(sessionsEqual(keynote(), keynote(overrides))).toBe(false);
  });
});

describe("sameStrings", () => {
  it("ignores order and duplicates", () => {
    expect(sameStrings(["a", "b"], ["b", "a", "a"])).toBe(true);
    expect(sameStrings(["a", "a"], ["a", "b"])).toBe(false);
  });

  it("treats undefined as empty", () => {
    expect(sameStrings(undefined, [])).toBe(true);
    expect(sameStrings(undefined, ["a"])).toBe(false);
  });
});

describe("sameFilters", () => {
  it("treats a missing flag and a false flag as different", () => {
    expect(sameFilters({}, { "Live streamed": false })).toBe(false);
    expect(sameFilters({ a: false }, { b: false })).toBe(false);
  });

  it("matches equal maps regardless of key order", () => {
    expect(sameFilters({ a: true, b: false }, { b: false, a: true })).toBe(true);
  });
});

describe("sameInstant", () => {
  it("considers two invalid dates the same", () => {
    expect(sameInstant(new Date(NaN), new Date(NaN))).toBe(true);
    expect(sameInstant(new Date(NaN), new Date(0))).toBe(false);
  });
});

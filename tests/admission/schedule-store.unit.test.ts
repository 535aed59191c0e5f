import { describe, expect, it } from "vitest";
import { InMemoryScheduleStore } from "../../src/admission/schedule-store.js";
import { rest, utc, work } from "../helpers.js";

function sequentialIds(): () => string {
  let next = 0;
  return () => `id-${++next}`;
}

describe("InMemoryScheduleStore", () => {
  it("returns an empty snapshot for an unknown worker", async () => {
    const store = new InMemoryScheduleStore();

    await expect(store.loadSnapshot("alice")).resolves.toEqual({
      workerId: "alice",
      restIntervals: [],
      workIntervals: [],
    });
  });

  it("assigns ids to new intervals and files them by category", async () => {
    const store = new InMemoryScheduleStore({ generateId: sequentialIds() });

    const saved = await store.saveInterval("alice", {
      start: utc("07:00"),
      end: utc("07:30"),
      category: "REST",
    });
    await store.saveInterval("alice", { start: utc("09:00"), end: utc("17:00"), category: "WORK" });

    expect(saved).toEqual({ id: "id-1", start: utc("07:00"), end: utc("07:30"), category: "REST" });
    const snapshot = await store.loadSnapshot("alice");
    expect(snapshot.restIntervals.map((i) => i.id)).toEqual(["id-1"]);
    expect(snapshot.workIntervals.map((i) => i.id)).toEqual(["id-2"]);
  });

  it("keeps workers apart", async () => {
    const store = new InMemoryScheduleStore();
    await store.seed("alice", [rest("r1", "07:00", "07:30")]);
    await store.seed("bob", [work("w1", "09:00", "17:00")]);

    const snapshot = await store.loadSnapshot("bob");

    expect(snapshot.restIntervals).toEqual([]);
    expect(snapshot.workIntervals.map((i) => i.id)).toEqual(["w1"]);
  });

  it("replaces a record saved with an existing id", async () => {
    const store = new InMemoryScheduleStore();
    await store.seed("alice", [rest("r1", "07:00", "07:30")]);

    await store.saveInterval("alice", rest("r1", "08:00", "08:15"));

    const snapshot = await store.loadSnapshot("alice");
    expect(snapshot.restIntervals).toEqual([rest("r1", "08:00", "08:15")]);
  });

  it("moves a record whose category changes", async () => {
    const store = new InMemoryScheduleStore();
    await store.seed("alice", [rest("x1", "07:00", "07:30")]);

    await store.saveInterval("alice", work("x1", "07:00", "07:30"));

    const snapshot = await store.loadSnapshot("alice");
    expect(snapshot.restIntervals).toEqual([]);
    expect(snapshot.workIntervals.map((i) => i.id)).toEqual(["x1"]);
  });

  it("hands out copies", async () => {
    const store = new InMemoryScheduleStore();
    await store.seed("alice", [rest("r1", "07:00", "07:30")]);

    const first = await store.loadSnapshot("alice");
    first.restIntervals[0]?.start.setTime(0);

    const second = await store.loadSnapshot("alice");
    expect(second.restIntervals[0]?.start).toEqual(utc("07:00"));
  });
});

/**
 * Unit tests for bucket mark-read.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { TZDate } from "@date-fns/tz";
import { markBucketRead } from "../../src/server/services/mark-bucket-read";
import { countUnread, getBucketedView } from "../../src/server/services/bucketed-entries";
import type { ReaderUser } from "../../src/server/entries/query";
import { MemoryReaderStore } from "../utils/memory-store";

const reference = new TZDate(new Date("2024-06-15T12:00:00Z").getTime(), "UTC");

describe("markBucketRead", () => {
  let store: MemoryReaderStore;
  let user: ReaderUser;

  beforeEach(() => {
    store = new MemoryReaderStore();
    user = store.addUser({ id: "user-1" });
    const sub = store.addSubscription(user.id, { id: "sub-1" });
    const hidden = store.addSubscription(user.id, { id: "sub-hidden", hideGlobally: true });

    store.addEntry(sub.id, new Date("2024-06-15T11:00:00Z"), { id: "e-today" });
    store.addEntry(sub.id, new Date("2024-06-14T11:00:00Z"), { id: "e-last2d" });
    store.addEntry(sub.id, new Date("2024-06-13T12:00:00Z"), { id: "e-last2d-edge" });
    store.addEntry(sub.id, new Date("2024-06-10T00:00:00Z"), { id: "e-last7d" });
    store.addEntry(sub.id, new Date("2023-01-01T00:00:00Z"), { id: "e-earlier" });
    store.addEntry(hidden.id, new Date("2024-06-14T11:00:00Z"), { id: "e-hidden" });
  });

  it("marks only the selected bucket's range", async () => {
    const result = await markBucketRead(store, {
      userId: user.id,
      selector: "last2d",
      scheme: "rolling",
      reference,
    });

    expect(result).toEqual({
      scope: "last2d",
      after: new Date("2024-06-13T12:00:00Z"),
      before: new Date("2024-06-14T12:00:00Z"),
      count: 2,
    });
    expect(store.calls).toEqual([
      {
        op: "markRange",
        userId: "user-1",
        after: new Date("2024-06-13T12:00:00Z"),
        before: new Date("2024-06-14T12:00:00Z"),
      },
    ]);
    expect(store.readState()).toEqual({
      "e-today": false,
      "e-last2d": true,
      "e-last2d-edge": true,
      "e-last7d": false,
      "e-earlier": false,
      "e-hidden": false,
    });
  });

  it("leaves the marked bucket with no unread entries", async () => {
    await markBucketRead(store, {
      userId: user.id,
      selector: "last7d",
      scheme: "rolling",
      reference,
    });

    const view = await getBucketedView(store, {
      user,
      scheme: "rolling",
      reference,
      selector: "last7d",
    });
    expect(view.buckets.map((bucket) => [bucket.name, bucket.count])).toEqual([
      ["today", 1],
      ["last2d", 2],
      ["last7d", 0],
      ["last30d", 0],
      ["earlier", 1],
    ]);
  });

  it("is idempotent", async () => {
    const params = { userId: user.id, selector: "today", scheme: "rolling" as const, reference };

    const first = await markBucketRead(store, params);
    const state = store.readState();
    const second = await markBucketRead(store, params);

    expect(first.count).toBe(1);
    expect(second.count).toBe(0);
    expect(store.readState()).toEqual(state);
  });

  it("marks the unbounded oldest bucket", async () => {
    const result = await markBucketRead(store, {
      userId: user.id,
      selector: "earlier",
      scheme: "rolling",
      reference,
    });

    expect(result.after).toBeNull();
    expect(result.before).toEqual(new Date("2024-05-16T12:00:00Z"));
    expect(result.count).toBe(1);
    expect(store.entry("e-earlier").read).toBe(true);
  });

  it("uses the global primitive for all", async () => {
    const result = await markBucketRead(store, {
      userId: user.id,
      selector: "all",
      scheme: "rolling",
      reference,
    });

    expect(result).toEqual({ scope: "all", after: null, before: null, count: 5 });
    expect(store.calls).toEqual([{ op: "markAll", userId: "user-1" }]);
    expect(await countUnread(store, user.id)).toBe(0);
    expect(store.entry("e-hidden").read).toBe(false);
  });

  it("treats an unrecognized selector as all", async () => {
    const result = await markBucketRead(store, {
      userId: user.id,
      selector: "bogus",
      scheme: "rolling",
      reference,
    });

    expect(result.scope).toBe("all");
    expect(store.calls.map((call) => call.op)).toEqual(["markAll"]);
  });

  it("treats the other scheme's bucket names as unrecognized", async () => {
    const result = await markBucketRead(store, {
      userId: user.id,
      selector: "yesterday",
      scheme: "rolling",
      reference,
    });

    expect(result.scope).toBe("all");
  });

  it("uses calendar boundaries in the calendar scheme", async () => {
    const result = await markBucketRead(store, {
      userId: user.id,
      selector: "yesterday",
      scheme: "calendar",
      reference,
    });

    expect(result).toEqual({
      scope: "yesterday",
      after: new Date("2024-06-14T00:00:00Z"),
      before: new Date("2024-06-15T00:00:00Z"),
      count: 1,
    });
    expect(store.entry("e-last2d").read).toBe(true);
  });

  it("marks the same entries the view lists", async () => {
    const view = await getBucketedView(store, {
      user,
      scheme: "calendar",
      reference,
      selector: "week",
    });
    const listed = view.buckets[2].entries?.map((entry) => entry.id);

    await markBucketRead(store, {
      userId: user.id,
      selector: "week",
      scheme: "calendar",
      reference,
    });

    const marked = Object.entries(store.readState())
      .filter(([, read]) => read)
      .map(([id]) => id);
    expect(marked).toEqual(listed);
  });

  it("propagates store failures", async () => {
    const failure = new Error("deadlock detected");
    store.failWhen = () => failure;

    await expect(
      markBucketRead(store, { userId: user.id, selector: "today", scheme: "rolling", reference })
    ).rejects.toBe(failure);
    expect(store.entry("e-today").read).toBe(false);
  });
});

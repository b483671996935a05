/**
 * Unit tests for bucket boundary computation.
 *
 * Covers both schemes, timezone and DST handling, the clamping applied when
 * calendar boundaries cross, and the partition property: every instant falls
 * in exactly one bucket.
 */

import { describe, it, expect } from "vitest";
import { TZDate } from "@date-fns/tz";
import {
  ALL_BUCKETS,
  bucketContaining,
  bucketNames,
  computeBuckets,
  defaultBucket,
  findBucket,
  intervalContains,
  isBucketName,
  resolveSelection,
  type BucketInterval,
  type BucketScheme,
} from "../../src/server/buckets/boundaries";

function at(iso: string, timezone = "UTC"): TZDate {
  return new TZDate(new Date(iso).getTime(), timezone);
}

function iso(date: Date | null): string | null {
  return date === null ? null : date.toISOString();
}

function describeBuckets(buckets: BucketInterval[]) {
  return buckets.map((bucket) => ({
    name: bucket.name,
    after: iso(bucket.after),
    before: iso(bucket.before),
  }));
}

describe("computeBuckets", () => {
  describe("rolling scheme", () => {
    it("uses fixed offsets from the reference instant", () => {
      const buckets = computeBuckets(at("2024-06-15T12:00:00Z"), "rolling");

      expect(describeBuckets(buckets)).toEqual([
        { name: "today", after: "2024-06-14T12:00:00.000Z", before: null },
        {
          name: "last2d",
          after: "2024-06-13T12:00:00.000Z",
          before: "2024-06-14T12:00:00.000Z",
        },
        {
          name: "last7d",
          after: "2024-06-08T12:00:00.000Z",
          before: "2024-06-13T12:00:00.000Z",
        },
        {
          name: "last30d",
          after: "2024-05-16T12:00:00.000Z",
          before: "2024-06-08T12:00:00.000Z",
        },
        { name: "earlier", after: null, before: "2024-05-16T12:00:00.000Z" },
      ]);
    });

    it("places entries 23 and 25 hours old in different buckets", () => {
      const buckets = computeBuckets(at("2024-06-15T12:00:00Z"), "rolling");

      expect(bucketContaining(buckets, new Date("2024-06-14T13:00:00Z")).name).toBe("today");
      expect(bucketContaining(buckets, new Date("2024-06-14T11:00:00Z")).name).toBe("last2d");
    });

    it("ignores the timezone", () => {
      const utc = computeBuckets(at("2024-06-15T12:00:00Z"), "rolling");
      const tokyo = computeBuckets(at("2024-06-15T12:00:00Z", "Asia/Tokyo"), "rolling");

      expect(describeBuckets(tokyo)).toEqual(describeBuckets(utc));
    });
  });

  describe("calendar scheme", () => {
    it("snaps to local day, week and month starts in UTC", () => {
      // Saturday
      const buckets = computeBuckets(at("2024-06-15T12:00:00Z"), "calendar");

      expect(describeBuckets(buckets)).toEqual([
        { name: "today", after: "2024-06-15T00:00:00.000Z", before: null },
        {
          name: "yesterday",
          after: "2024-06-14T00:00:00.000Z",
          before: "2024-06-15T00:00:00.000Z",
        },
        {
          name: "week",
          after: "2024-06-09T00:00:00.000Z",
          before: "2024-06-14T00:00:00.000Z",
        },
        {
          name: "month",
          after: "2024-06-01T00:00:00.000Z",
          before: "2024-06-09T00:00:00.000Z",
        },
        { name: "earlier", after: null, before: "2024-06-01T00:00:00.000Z" },
      ]);
    });

    it("takes midnight in the user's timezone", () => {
      const buckets = computeBuckets(at("2024-06-15T12:00:00Z", "America/New_York"), "calendar");

      expect(buckets.map((bucket) => iso(bucket.after))).toEqual([
        "2024-06-15T04:00:00.000Z",
        "2024-06-14T04:00:00.000Z",
        "2024-06-09T04:00:00.000Z",
        "2024-06-01T04:00:00.000Z",
        null,
      ]);
    });

    it("follows the local date when it differs from the UTC date", () => {
      // 2024-06-15T02:00Z is still June 14 in New York
      const buckets = computeBuckets(at("2024-06-15T02:00:00Z", "America/New_York"), "calendar");

      expect(iso(buckets[0].after)).toBe("2024-06-14T04:00:00.000Z");
      expect(iso(buckets[1].after)).toBe("2024-06-13T04:00:00.000Z");
    });

    it("keeps local midnight across a DST change", () => {
      // Clocks went forward at 02:00 local on 2024-03-10
      const buckets = computeBuckets(at("2024-03-10T17:00:00Z", "America/New_York"), "calendar");
      const today = findBucket(buckets, "today");
      const yesterday = findBucket(buckets, "yesterday");

      expect(iso(today?.after ?? null)).toBe("2024-03-10T05:00:00.000Z");
      expect(iso(yesterday?.after ?? null)).toBe("2024-03-09T05:00:00.000Z");
      expect(iso(yesterday?.before ?? null)).toBe("2024-03-10T05:00:00.000Z");
    });

    it("leaves the week bucket empty on a Sunday", () => {
      const buckets = computeBuckets(at("2024-06-16T12:00:00Z"), "calendar");

      expect(describeBuckets(buckets)).toEqual([
        { name: "today", after: "2024-06-16T00:00:00.000Z", before: null },
        {
          name: "yesterday",
          after: "2024-06-15T00:00:00.000Z",
          before: "2024-06-16T00:00:00.000Z",
        },
        {
          name: "week",
          after: "2024-06-15T00:00:00.000Z",
          before: "2024-06-15T00:00:00.000Z",
        },
        {
          name: "month",
          after: "2024-06-01T00:00:00.000Z",
          before: "2024-06-15T00:00:00.000Z",
        },
        { name: "earlier", after: null, before: "2024-06-01T00:00:00.000Z" },
      ]);
    });

    it("leaves the month bucket empty when the week started last month", () => {
      // Thursday; the week began on Sunday 2024-04-28
      const buckets = computeBuckets(at("2024-05-02T12:00:00Z"), "calendar");

      expect(describeBuckets(buckets)).toEqual([
        { name: "today", after: "2024-05-02T00:00:00.000Z", before: null },
        {
          name: "yesterday",
          after: "2024-05-01T00:00:00.000Z",
          before: "2024-05-02T00:00:00.000Z",
        },
        {
          name: "week",
          after: "2024-04-28T00:00:00.000Z",
          before: "2024-05-01T00:00:00.000Z",
        },
        {
          name: "month",
          after: "2024-04-28T00:00:00.000Z",
          before: "2024-04-28T00:00:00.000Z",
        },
        { name: "earlier", after: null, before: "2024-04-28T00:00:00.000Z" },
      ]);
    });
  });

  describe("partition", () => {
    const references: Array<[string, string]> = [
      ["2024-06-15T12:00:00Z", "UTC"],
      ["2024-06-16T12:00:00Z", "UTC"],
      ["2024-05-02T12:00:00Z", "UTC"],
      ["2024-03-10T17:00:00Z", "America/New_York"],
      ["2024-01-01T00:00:00Z", "Asia/Kolkata"],
    ];
    const schemes: BucketScheme[] = ["rolling", "calendar"];

    for (const scheme of schemes) {
      for (const [instant, timezone] of references) {
        it(`covers every instant exactly once (${scheme}, ${instant}, ${timezone})`, () => {
          const buckets = computeBuckets(at(instant, timezone), scheme);
          const probes: Date[] = [new Date(0), new Date(instant), new Date("2100-01-01T00:00:00Z")];
          for (const bucket of buckets) {
            for (const bound of [bucket.after, bucket.before]) {
              if (bound !== null) {
                probes.push(bound, new Date(bound.getTime() - 1), new Date(bound.getTime() + 1));
              }
            }
          }

          for (const probe of probes) {
            const matches = buckets.filter((bucket) => intervalContains(bucket, probe));
            expect(matches).toHaveLength(1);
          }
        });
      }
    }

    it("puts an instant on a boundary in the newer bucket", () => {
      const buckets = computeBuckets(at("2024-06-15T12:00:00Z"), "calendar");

      expect(bucketContaining(buckets, new Date("2024-06-15T00:00:00Z")).name).toBe("today");
      expect(bucketContaining(buckets, new Date("2024-06-14T23:59:59.999Z")).name).toBe(
        "yesterday"
      );
    });

    it("puts future instants in the newest bucket", () => {
      const buckets = computeBuckets(at("2024-06-15T12:00:00Z"), "rolling");

      expect(bucketContaining(buckets, new Date("2024-07-01T00:00:00Z")).name).toBe("today");
    });
  });
});

describe("bucketContaining", () => {
  it("throws when no bucket covers the instant", () => {
    const buckets: BucketInterval[] = [
      { name: "today", after: new Date("2024-06-15T00:00:00Z"), before: null },
    ];

    expect(() => bucketContaining(buckets, new Date("2024-06-14T00:00:00Z"))).toThrow(
      "Bucket set does not cover 2024-06-14T00:00:00.000Z"
    );
  });
});

describe("selectors", () => {
  it("lists bucket names newest first", () => {
    expect(bucketNames("rolling")).toEqual(["today", "last2d", "last7d", "last30d", "earlier"]);
    expect(bucketNames("calendar")).toEqual(["today", "yesterday", "week", "month", "earlier"]);
  });

  it("defaults to the newest bucket", () => {
    expect(defaultBucket("rolling")).toBe("today");
    expect(defaultBucket("calendar")).toBe("today");
  });

  it("only accepts names from the active scheme", () => {
    expect(isBucketName("rolling", "last7d")).toBe(true);
    expect(isBucketName("calendar", "last7d")).toBe(false);
    expect(isBucketName("calendar", "yesterday")).toBe(true);
    expect(isBucketName("rolling", "all")).toBe(false);
  });

  it("resolves unknown selectors to every bucket", () => {
    expect(resolveSelection("rolling", "last2d")).toBe("last2d");
    expect(resolveSelection("rolling", "all")).toBe(ALL_BUCKETS);
    expect(resolveSelection("rolling", "bogus")).toBe(ALL_BUCKETS);
    expect(resolveSelection("rolling", "yesterday")).toBe(ALL_BUCKETS);
    expect(resolveSelection("calendar", "")).toBe(ALL_BUCKETS);
  });

  it("finds buckets by name", () => {
    const buckets = computeBuckets(at("2024-06-15T12:00:00Z"), "rolling");

    expect(findBucket(buckets, "last7d")?.name).toBe("last7d");
    expect(findBucket(buckets, "week")).toBeUndefined();
  });
});

import {
  formatRunTimestamp,
  objectKeyFor,
  partitionKeyFor,
  partitionPrefix
} from "../../src/core/partition/partitionKey";

describe("partition keys", () => {
  it("derives a zero-padded UTC partition from the run start", () => {
    expect(partitionKeyFor("69036", new Date("2026-03-07T08:00:00.000Z"))).toEqual({
      cityId: "69036",
      year: "2026",
      month: "03",
      day: "07"
    });
  });

  it("uses the UTC date even when the local offset would move the day", () => {
    const runStartedAt = new Date("2026-10-18T23:59:59.999-05:00");
    expect(partitionKeyFor("69036", runStartedAt).day).toBe("19");
  });

  it("formats the run timestamp in compact ISO-8601 UTC", () => {
    expect(formatRunTimestamp(new Date("2026-10-18T07:04:05.006Z"))).toBe("20261018T070405006Z");
  });

  it("builds the object key from the partition and run timestamp", () => {
    const runStartedAt = new Date("2026-10-18T07:04:05.006Z");
    const key = objectKeyFor(partitionKeyFor("69036", runStartedAt), formatRunTimestamp(runStartedAt), "parquet");

    expect(key).toBe("city_id=69036/year=2026/month=10/day=18/vendors_20261018T070405006Z.parquet");
  });

  it("gives two runs on the same day distinct keys in the same partition", () => {
    const morning = new Date("2026-10-18T06:00:00.000Z");
    const evening = new Date("2026-10-18T18:30:00.000Z");
    const first = objectKeyFor(partitionKeyFor("69036", morning), formatRunTimestamp(morning), "parquet");
    const second = objectKeyFor(partitionKeyFor("69036", evening), formatRunTimestamp(evening), "parquet");

    expect(first).not.toBe(second);
    expect(partitionPrefix(partitionKeyFor("69036", morning))).toBe(partitionPrefix(partitionKeyFor("69036", evening)));
  });

  it("never targets a previous day's partition", () => {
    const today = new Date("2026-10-18T00:00:00.000Z");
    const yesterday = new Date("2026-10-17T23:59:59.999Z");

    expect(partitionPrefix(partitionKeyFor("69036", today))).toBe("city_id=69036/year=2026/month=10/day=18");
    expect(partitionPrefix(partitionKeyFor("69036", yesterday))).toBe("city_id=69036/year=2026/month=10/day=17");
  });
});

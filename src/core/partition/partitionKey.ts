export type PartitionKey = {
  cityId: string;
  year: string;
  month: string;
  day: string;
};

export type ObjectLocation = {
  bucket: string;
  key: string;
  uri: string;
  etag: string;
  versionId?: string;
};

const pad = (value: number, width = 2) => String(value).padStart(width, "0");

/** Partition for a city job, keyed by the UTC calendar date of the run start. */
export const partitionKeyFor = (cityId: string, runStartedAt: Date): PartitionKey => ({
  cityId,
  year: pad(runStartedAt.getUTCFullYear(), 4),
  month: pad(runStartedAt.getUTCMonth() + 1),
  day: pad(runStartedAt.getUTCDate())
});

/** Compact ISO-8601 UTC timestamp with milliseconds, e.g. `20261018T174400123Z`. */
export const formatRunTimestamp = (runStartedAt: Date): string =>
  `${pad(runStartedAt.getUTCFullYear(), 4)}${pad(runStartedAt.getUTCMonth() + 1)}${pad(runStartedAt.getUTCDate())}` +
  `T${pad(runStartedAt.getUTCHours())}${pad(runStartedAt.getUTCMinutes())}${pad(runStartedAt.getUTCSeconds())}` +
  `${pad(runStartedAt.getUTCMilliseconds(), 3)}Z`;

export const partitionPrefix = (partition: PartitionKey): string =>
  `city_id=${partition.cityId}/year=${partition.year}/month=${partition.month}/day=${partition.day}`;

export const objectKeyFor = (partition: PartitionKey, runTimestamp: string, extension: string): string =>
  `${partitionPrefix(partition)}/vendors_${runTimestamp}.${extension}`;

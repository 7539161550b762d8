export type VendorRecord = unknown;

export type FetchPageParams = {
  cityId: string;
  cursor?: string;
  limit: number;
  signal?: AbortSignal;
};

export type PageResult = {
  items: VendorRecord[];
  nextCursor?: string;
  fetchedAt: Date;
};

/**
 * One call is one request attempt. Failures are thrown as `FetchError`
 * (or `CancelledError` when the run signal aborts the request).
 */
export interface VendorApiClient {
  fetchPage(params: FetchPageParams): Promise<PageResult>;
}

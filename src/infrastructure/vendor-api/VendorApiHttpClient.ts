import type { FetchPageParams, PageResult, VendorApiClient } from "../../ports/VendorApiClient";
import { CancelledError, FetchError, toErrorMessage } from "../../core/errors/pipeline.errors";

export type VendorApiHttpClientOptions = {
  baseUrl: string;
  apiKey?: string;
  timeoutMs?: number;
  headers?: Record<string, string>;
  query?: Record<string, string>;
  now?: () => Date;
};

type ListingPayload = {
  items: unknown[];
  availableCount?: number;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseListingPayload = (json: unknown): ListingPayload | undefined => {
  if (!isRecord(json) || !isRecord(json.data)) return undefined;
  const { items, available_count: availableCount } = json.data;
  if (!Array.isArray(items)) return undefined;

  return {
    items,
    availableCount: typeof availableCount === "number" && Number.isFinite(availableCount) ? availableCount : undefined
  };
};

const parseOffset = (cursor: string | undefined): number => {
  if (cursor == null) return 0;
  if (!/^\d+$/.test(cursor)) {
    throw new FetchError({ kind: "permanent", message: `Invalid page cursor: ${cursor}` });
  }
  return Number.parseInt(cursor, 10);
};

/**
 * Listing client over native fetch (Node 20). Offset pagination is exposed as an
 * opaque cursor: the next cursor is the offset of the following page.
 */
export class VendorApiHttpClient implements VendorApiClient {
  private readonly timeoutMs: number;
  private readonly now: () => Date;

  constructor(private readonly options: VendorApiHttpClientOptions) {
    this.timeoutMs = options.timeoutMs ?? 8000;
    this.now = options.now ?? (() => new Date());
  }

  async fetchPage(params: FetchPageParams): Promise<PageResult> {
    const offset = parseOffset(params.cursor);
    const url = new URL(this.options.baseUrl);
    url.pathname = url.pathname.endsWith("/") ? `${url.pathname}vendors` : `${url.pathname}/vendors`;

    for (const [name, value] of Object.entries(this.options.query ?? {})) {
      url.searchParams.set(name, value);
    }
    url.searchParams.set("city_id", params.cityId);
    url.searchParams.set("offset", String(offset));
    url.searchParams.set("limit", String(params.limit));
    const requestUrl = `${url.origin}${url.pathname}${url.search}`;
    const context = { cityId: params.cityId, cursor: params.cursor ?? "0", requestUrl };

    const headers: Record<string, string> = { accept: "application/json", ...this.options.headers };
    if (this.options.apiKey) headers["x-fp-api-key"] = this.options.apiKey;

    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onRunAbort = () => controller.abort();
    params.signal?.addEventListener("abort", onRunAbort, { once: true });

    let res: Response;
    let body: string;
    try {
      if (params.signal?.aborted) controller.abort();
      res = await fetch(url.toString(), { headers, signal: controller.signal });
      body = await res.text();
    } catch (err) {
      if (params.signal?.aborted) {
        throw new CancelledError({ stage: "fetch", context, cause: err });
      }
      if (timedOut) {
        throw new FetchError({
          kind: "transient",
          message: `Vendor API request timeout after ${this.timeoutMs}ms`,
          context,
          cause: err
        });
      }
      throw new FetchError({
        kind: "transient",
        message: `Vendor API network failure: ${toErrorMessage(err)}`,
        context,
        cause: err
      });
    } finally {
      clearTimeout(timeout);
      params.signal?.removeEventListener("abort", onRunAbort);
    }

    if (!res.ok) {
      if (res.status === 429) {
        const retryAfter = res.headers.get("retry-after");
        throw new FetchError({
          kind: "rate_limited",
          message: `Vendor API request failed: ${res.status}`,
          status: res.status,
          retryDelayMs: retryAfter && /^\d+$/.test(retryAfter) ? Number(retryAfter) * 1000 : undefined,
          context
        });
      }
      throw new FetchError({
        kind: res.status >= 500 ? "transient" : "permanent",
        message: `Vendor API request failed: ${res.status}`,
        status: res.status,
        context
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (err) {
      throw new FetchError({ kind: "transient", message: "Vendor API returned invalid JSON", context, cause: err });
    }

    const payload = parseListingPayload(json);
    if (!payload) {
      throw new FetchError({ kind: "permanent", message: "Vendor API response has no data.items array", context });
    }

    const nextOffset = offset + payload.items.length;
    const hasMore =
      payload.items.length > 0 &&
      (payload.availableCount != null ? nextOffset < payload.availableCount : payload.items.length >= params.limit);

    return {
      items: payload.items,
      nextCursor: hasMore ? String(nextOffset) : undefined,
      fetchedAt: this.now()
    };
  }
}

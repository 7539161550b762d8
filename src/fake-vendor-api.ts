import http from "http";
import { URL } from "url";

/**
 * Fake listing API for local runs and e2e tests.
 * - GET /vendors?city_id=...&offset=...&limit=...
 * Responds with `{ data: { items, available_count } }` sliced from a fixed
 * dataset per city; unknown cities get 404.
 */
export type FakeVendorApiOptions = {
  vendorsByCity: Record<string, unknown[]>;
  // number of leading requests answered with 429 before serving data
  rateLimitedResponses?: number;
  // number of leading requests answered with 503 before serving data
  unavailableResponses?: number;
  // optional artificial latency per request
  delayMs?: number;
};

export type FakeVendorApi = {
  baseUrl: string;
  requests: () => number;
  close: () => Promise<void>;
};

export const createFakeVendorApiServer = (opts: FakeVendorApiOptions) => {
  let requests = 0;

  const server = http.createServer((req, res) => {
    requests += 1;
    const url = new URL(req.url ?? "/", "http://localhost");
    if (url.pathname !== "/vendors") {
      res.writeHead(404);
      res.end();
      return;
    }

    if (requests <= (opts.rateLimitedResponses ?? 0)) {
      res.writeHead(429, { "content-type": "application/json", "Retry-After": "0" });
      res.end(JSON.stringify({ error: "rate_limited" }));
      return;
    }
    if (requests <= (opts.rateLimitedResponses ?? 0) + (opts.unavailableResponses ?? 0)) {
      res.writeHead(503, { "content-type": "application/json" });
      res.end(JSON.stringify({ error: "unavailable" }));
      return;
    }

    const cityId = url.searchParams.get("city_id") ?? "";
    const vendors = opts.vendorsByCity[cityId];
    if (!vendors) {
      res.writeHead(404, { "content-type": "application/json" });
      res.end(JSON.stringify({ error: "unknown city" }));
      return;
    }

    const limit = Number(url.searchParams.get("limit") ?? "48");
    const offset = Number(url.searchParams.get("offset") ?? "0");
    const body = JSON.stringify({
      data: {
        available_count: vendors.length,
        items: vendors.slice(offset, offset + limit)
      }
    });

    setTimeout(() => {
      res.writeHead(200, { "content-type": "application/json" });
      res.end(body);
    }, opts.delayMs ?? 0);
  });

  return { server, requests: () => requests };
};

export const startFakeVendorApi = async (opts: FakeVendorApiOptions, port = 0): Promise<FakeVendorApi> => {
  const { server, requests } = createFakeVendorApiServer(opts);
  await new Promise<void>((resolve) => {
    server.listen(port, "127.0.0.1", () => resolve());
  });

  const address = server.address();
  if (address == null || typeof address === "string") {
    throw new Error("Fake vendor API did not bind a TCP port");
  }
  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    requests,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      })
  };
};

const makeVendor = (cityId: string, n: number) => ({
  code: `${cityId}-v${n}`,
  name: `Vendor ${n}`,
  rating: (3 + (n % 20) / 10).toFixed(1),
  minimum_delivery_fee: 49 + n,
  cuisines: [{ name: n % 2 === 0 ? "Pizza" : "Biryani" }],
  latitude: 24.86 + n / 1000,
  longitude: 67.0 + n / 1000
});

if (require.main === module) {
  const port = Number(process.env.FAKE_VENDOR_API_PORT ?? 3999);
  const cities = (process.env.PIPELINE_CITIES ?? "69036").split(",").map((c) => c.trim()).filter(Boolean);
  const vendorsByCity = Object.fromEntries(
    cities.map((cityId) => [cityId, Array.from({ length: 120 }, (_, i) => makeVendor(cityId, i + 1))])
  );

  startFakeVendorApi({ vendorsByCity }, port)
    .then((api) => {
      // eslint-disable-next-line no-console
      console.log(`Fake vendor API on ${api.baseUrl}`);
    })
    .catch((err: unknown) => {
      // eslint-disable-next-line no-console
      console.error(err);
      process.exit(1);
    });
}

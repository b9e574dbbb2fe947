import { createLogger } from "@rocket-social/observability";
import { describe, expect, it } from "vitest";
import { RocketApiClient } from "./client.js";
import {
  RocketApiBadResponseError,
  RocketApiNotFoundError,
  RocketApiRequestError,
  isRocketApiError,
} from "./errors.js";
import { createRecordingFetch, envelope } from "./test_support.js";

function createClient(responseFactory: () => Response): {
  client: RocketApiClient;
  calls: ReturnType<typeof createRecordingFetch>["calls"];
} {
  const { fetch, calls } = createRecordingFetch(responseFactory);
  const client = new RocketApiClient({
    token: "test-token",
    baseUrl: "https://example.test",
    fetch,
  });
  return { client, calls };
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected the call to fail");
}

describe("RocketApiClient", () => {
  it("returns the upstream body of a done envelope", async () => {
    const { client } = createClient(() => new Response(envelope({ users: [], status: "ok" })));

    await expect(client.request("instagram/search", { query: "lake" })).resolves.toEqual({
      users: [],
      status: "ok",
    });
  });

  it("posts JSON with the API key on every request", async () => {
    const { client, calls } = createClient(() => new Response(envelope({ status: "ok" })));

    await client.request("instagram/search", { query: "lake" });
    await client.request("threads/user/get_info", { id: 314216n });

    expect(calls).toHaveLength(2);
    for (const call of calls) {
      expect(call.method).toBe("POST");
      expect(call.headers.get("authorization")).toBe("Token test-token");
      expect(call.headers.get("content-type")).toBe("application/json");
    }
    expect(calls[0]?.url).toBe("https://example.test/instagram/search");
    expect(calls[0]?.body).toBe('{"query":"lake"}');
    expect(calls[1]?.url).toBe("https://example.test/threads/user/get_info");
    expect(calls[1]?.body).toBe('{"id":314216}');
  });

  it("keeps a path prefix of the base url", async () => {
    const { fetch, calls } = createRecordingFetch(() => new Response(envelope({})));
    const client = new RocketApiClient({
      token: "test-token",
      baseUrl: "https://example.test/v1",
      fetch,
    });

    await client.request("instagram/search", { query: "lake" });

    expect(calls[0]?.url).toBe("https://example.test/v1/instagram/search");
  });

  it("keeps the base path when the method starts with a slash", async () => {
    const { fetch, calls } = createRecordingFetch(() => new Response(envelope({})));
    const client = new RocketApiClient({
      token: "test-token",
      baseUrl: "https://example.test/v1/",
      fetch,
    });

    await client.request("/instagram/search", { query: "lake" });

    expect(calls[0]?.url).toBe("https://example.test/v1/instagram/search");
  });

  it("maps HTTP 404 to not found", async () => {
    const { client } = createClient(() => new Response("{}", { status: 404 }));

    const error = await captureError(client.request("instagram/user/get_info", { username: "x" }));

    expect(error).toBeInstanceOf(RocketApiNotFoundError);
    if (error instanceof RocketApiNotFoundError) {
      expect(error.kind).toBe("not_found");
      expect(error.status).toBe(404);
    }
  });

  it("maps an upstream 404 inside the envelope to not found", async () => {
    const { client } = createClient(
      () => new Response(envelope({ message: "User not found" }, { statusCode: 404 })),
    );

    const error = await captureError(client.request("instagram/user/get_info", { username: "x" }));

    expect(error).toBeInstanceOf(RocketApiNotFoundError);
    if (error instanceof RocketApiNotFoundError) {
      expect(error.status).toBe(200);
      expect(error.payload).toEqual({
        status: "done",
        response: {
          status_code: 404,
          content_type: "application/json",
          body: { message: "User not found" },
        },
      });
    }
  });

  it("maps HTTP 500 to bad response", async () => {
    const { client } = createClient(() => new Response("oops", { status: 500 }));

    const error = await captureError(client.request("instagram/search", { query: "x" }));

    expect(error).toBeInstanceOf(RocketApiBadResponseError);
    if (error instanceof RocketApiBadResponseError) {
      expect(error.kind).toBe("bad_response");
      expect(error.status).toBe(500);
      expect(error.response?.body).toBe("oops");
    }
  });

  it("maps 401 to bad response", async () => {
    const { client } = createClient(
      () => new Response(JSON.stringify({ detail: "Invalid token." }), { status: 401 }),
    );

    await expect(client.request("instagram/search", { query: "x" })).rejects.toBeInstanceOf(
      RocketApiBadResponseError,
    );
  });

  it("rejects invalid JSON bodies", async () => {
    const { client } = createClient(() => new Response("not json", { status: 200 }));

    await expect(client.request("instagram/search", { query: "x" })).rejects.toThrow(
      "RocketAPI returned invalid JSON for instagram/search",
    );
  });

  it("rejects envelopes whose task did not finish", async () => {
    const { client } = createClient(() => new Response(envelope({}, { status: "error" })));

    await expect(client.request("instagram/search", { query: "x" })).rejects.toThrow(
      "Unexpected response from instagram/search: task status is error",
    );
  });

  it("rejects upstream errors and non-JSON content types", async () => {
    const upstream500 = createClient(() => new Response(envelope({}, { statusCode: 500 })));
    const html = createClient(
      () => new Response(envelope("<html></html>", { contentType: "text/html" })),
    );

    await expect(upstream500.client.request("instagram/search", { query: "x" })).rejects.toThrow(
      "Unexpected response from instagram/search: upstream returned 500 application/json",
    );
    await expect(html.client.request("instagram/search", { query: "x" })).rejects.toBeInstanceOf(
      RocketApiBadResponseError,
    );
  });

  it("rejects bodies that are not objects", async () => {
    const { client } = createClient(() => new Response(envelope([1, 2, 3])));

    await expect(client.request("instagram/search", { query: "x" })).rejects.toThrow(
      "RocketAPI returned a non-object body for instagram/search",
    );
  });

  it("maps connection failures to request errors", async () => {
    const failure = new TypeError("fetch failed");
    const client = new RocketApiClient({
      token: "test-token",
      baseUrl: "https://example.test",
      fetch: () => Promise.reject(failure),
    });

    const error = await captureError(client.request("instagram/search", { query: "x" }));

    expect(error).toBeInstanceOf(RocketApiRequestError);
    if (error instanceof RocketApiRequestError) {
      expect(error.kind).toBe("request_error");
      expect(error.original).toBe(failure);
      expect(error.status).toBeUndefined();
      expect(error.request?.url).toBe("https://example.test/instagram/search");
    }
    expect(client.requestCount).toBe(0);
  });

  it("maps timeouts to request errors", async () => {
    const client = new RocketApiClient({
      token: "test-token",
      baseUrl: "https://example.test",
      timeoutMs: 20,
      fetch: (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;
          if (!signal) return;
          signal.addEventListener("abort", () => {
            reject(signal.reason);
          });
        }),
    });

    const error = await captureError(client.request("instagram/search", { query: "x" }));

    expect(error).toBeInstanceOf(RocketApiRequestError);
    if (error instanceof RocketApiRequestError) {
      expect(error.original instanceof Error ? error.original.name : null).toBe("TimeoutError");
    }
  });

  it("redacts the API key in the last exchange", async () => {
    const { client } = createClient(() => new Response(envelope({ status: "ok" })));

    await client.request("instagram/search", { query: "lake" });

    const { request, response } = client.lastExchange();
    expect(request?.headers["Authorization"]).toBe("<redacted>");
    expect(request?.body).toBe('{"query":"lake"}');
    expect(response?.statusCode).toBe(200);
    expect(client.requestCount).toBe(1);
  });

  it("counts failed responses too", async () => {
    const { client } = createClient(() => new Response("{}", { status: 503 }));

    await expect(client.request("instagram/search", { query: "x" })).rejects.toBeInstanceOf(
      RocketApiBadResponseError,
    );
    await expect(client.request("instagram/search", { query: "x" })).rejects.toBeInstanceOf(
      RocketApiBadResponseError,
    );

    expect(client.requestCount).toBe(2);
  });

  it("recognises every error kind", () => {
    expect(isRocketApiError(new RocketApiNotFoundError("gone"))).toBe(true);
    expect(isRocketApiError(new RocketApiRequestError("down", null))).toBe(true);
    expect(isRocketApiError(new Error("other"))).toBe(false);
    expect(new RocketApiBadResponseError("bad").name).toBe("RocketApiBadResponseError");
  });

  it("refuses an empty token, a non-positive timeout or a malformed base url", () => {
    expect(() => new RocketApiClient({ token: " " })).toThrow("RocketAPI token must not be empty");
    expect(() => new RocketApiClient({ token: "test-token", timeoutMs: 0 })).toThrow(
      "RocketAPI timeout must be a positive number of milliseconds: 0",
    );
    expect(() => new RocketApiClient({ token: "test-token", baseUrl: "not a url" })).toThrow(
      "RocketAPI base URL is invalid: not a url/",
    );
  });

  describe("logging", () => {
    function createLoggedClient(fetchImpl: typeof fetch): {
      client: RocketApiClient;
      records: () => Record<string, unknown>[];
      lines: string[];
    } {
      const lines: string[] = [];
      const logger = createLogger({
        env: "test",
        level: "debug",
        service: "rocketapi",
        destination: { write: (line: string) => void lines.push(line) },
      });
      const client = new RocketApiClient({
        token: "test-token",
        baseUrl: "https://example.test",
        fetch: fetchImpl,
        logger,
      });
      const records = (): Record<string, unknown>[] =>
        lines.map((line): Record<string, unknown> => {
          const parsed: unknown = JSON.parse(line);
          return typeof parsed === "object" && parsed !== null ? { ...parsed } : {};
        });
      return { client, records, lines };
    }

    it("logs the completed call and the failure for an upstream 404", async () => {
      const { fetch } = createRecordingFetch(
        () => new Response(envelope({ message: "User not found" }, { statusCode: 404 })),
      );
      const { client, records, lines } = createLoggedClient(fetch);

      await expect(
        client.request("instagram/user/get_info", { username: "x" }),
      ).rejects.toBeInstanceOf(RocketApiNotFoundError);

      expect(records().map((record) => record["msg"])).toEqual([
        "rocketapi request completed",
        "rocketapi request failed",
      ]);
      expect(records()[1]).toMatchObject({
        method: "instagram/user/get_info",
        kind: "not_found",
        status: 200,
      });
      expect(lines.some((line) => line.includes("test-token"))).toBe(false);
    });

    it("logs one failure record for a transport error", async () => {
      const { client, records, lines } = createLoggedClient(() =>
        Promise.reject(new TypeError("fetch failed")),
      );

      await expect(client.request("instagram/search", { query: "x" })).rejects.toBeInstanceOf(
        RocketApiRequestError,
      );

      expect(records()).toHaveLength(1);
      expect(records()[0]).toMatchObject({
        msg: "rocketapi request failed",
        kind: "request_error",
        status: null,
      });
      expect(lines.some((line) => line.includes("test-token"))).toBe(false);
    });

    it("logs only the completed call on success", async () => {
      const { fetch } = createRecordingFetch(() => new Response(envelope({ status: "ok" })));
      const { client, records } = createLoggedClient(fetch);

      await client.request("instagram/search", { query: "lake" });

      expect(records()).toHaveLength(1);
      expect(records()[0]).toMatchObject({
        msg: "rocketapi request completed",
        method: "instagram/search",
        status: 200,
      });
    });
  });
});

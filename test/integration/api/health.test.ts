// ---------------------------------------------------------------------------
// Integration tests for the /health routes.
// ---------------------------------------------------------------------------

import { describe, it, expect, beforeEach } from "vitest";

import { createApp } from "../../../src/api/server.js";
import { InMemoryBookRepository } from "../../helpers/in-memory-book-repository.js";
import { createTestLogger } from "../../helpers/fixtures.js";

describe("GET /health", () => {
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    app = createApp({
      bookRepository: new InMemoryBookRepository(),
      logger: createTestLogger(),
      version: "test",
    });
  });

  it("returns 200 with status ok, uptime, and timestamp", async () => {
    const res = await app.request("/health");

    expect(res.status).toBe(200);

    const body = await res.json();
    expect(body).toHaveProperty("status", "ok");
    expect(typeof body.uptime).toBe("number");
    expect(body.uptime).toBeGreaterThanOrEqual(0);
    // Verify timestamp is a valid ISO 8601 string
    expect(new Date(body.timestamp).toISOString()).toBe(body.timestamp);
  });

  it("returns application/json content type", async () => {
    const res = await app.request("/health");

    expect(res.headers.get("content-type")).toContain("application/json");
  });
});

describe("GET /health/ready", () => {
  let app: ReturnType<typeof createApp>;
  let repo: InMemoryBookRepository;

  beforeEach(() => {
    repo = new InMemoryBookRepository();
    app = createApp({ bookRepository: repo, logger: createTestLogger(), version: "test" });
  });

  it("returns 200 when the database answers", async () => {
    const res = await app.request("/health/ready");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok", database: "up" });
  });

  it("returns 503 when the database is unreachable", async () => {
    repo.outage = new Error("connect ECONNREFUSED");

    const res = await app.request("/health/ready");

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({ status: "unavailable", database: "down" });
  });
});

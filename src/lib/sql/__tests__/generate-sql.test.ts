import { afterEach, describe, expect, it, vi } from "vitest";
import { fakeLogger } from "@/lib/__tests__/fake-logger";
import { INCIDENT_SCHEMA } from "@/lib/schema";
import { generateFallbackSql } from "@/lib/sql/fallback";
import { generateSql, providerTiers, type SqlTier } from "@/lib/sql/generate-sql";
import type { SqlResult } from "@/lib/types";

const question = "Which neighborhoods are under the most emergency stress?";

function tier(name: SqlTier["name"], outcome: SqlResult | Error): SqlTier {
  return {
    name,
    generate: vi.fn(async () => {
      if (outcome instanceof Error) throw outcome;
      return outcome;
    }),
  };
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("generateSql", () => {
  it("returns the first tier that succeeds", async () => {
    const logger = fakeLogger();
    const first = tier("playground", { sql: "SELECT 1", source: "provider" });
    const second = tier("direct", { sql: "SELECT 2", source: "provider" });

    const result = await generateSql(question, INCIDENT_SCHEMA, "playground", { tiers: [first, second], logger });

    expect(result.sql).toBe("SELECT 1");
    expect(second.generate).not.toHaveBeenCalled();
  });

  it("moves to the next tier after a failure", async () => {
    const logger = fakeLogger();
    const first = tier("playground", new Error("HTTP 503"));
    const second = tier("direct", { sql: "SELECT 2", source: "provider" });

    const result = await generateSql(question, INCIDENT_SCHEMA, "playground", { tiers: [first, second], logger });

    expect(result.sql).toBe("SELECT 2");
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      "SQL provider tier failed",
      expect.objectContaining({ tier: "playground", question })
    );
  });

  it("passes the question, schema and context to each tier", async () => {
    const first = tier("direct", { sql: "SELECT 3", source: "provider" });

    await generateSql(question, INCIDENT_SCHEMA, "direct", { tiers: [first], context: "ctx", logger: fakeLogger() });

    expect(first.generate).toHaveBeenCalledWith({ question, schema: INCIDENT_SCHEMA, context: "ctx" });
  });

  it("falls back to the local templates when every tier fails", async () => {
    const tiers = [tier("playground", new Error("down")), tier("direct", new Error("down"))];

    const result = await generateSql(question, INCIDENT_SCHEMA, "playground", { tiers, logger: fakeLogger() });

    expect(result).toEqual(generateFallbackSql(question));
  });

  it("skips the network entirely without an API key", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);

    const result = await generateSql(question, INCIDENT_SCHEMA, "playground", {
      config: { baseUrl: "https://provider.test", timeoutMs: 1000 },
      logger: fakeLogger(),
    });

    expect(result.source).toBe("fallback");
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe("providerTiers", () => {
  const config = { apiKey: "test-secret", baseUrl: "https://provider.test", timeoutMs: 1000 };

  it("puts the configured mode first", () => {
    expect(providerTiers("playground", config).map((t) => t.name)).toEqual(["playground", "direct"]);
    expect(providerTiers("direct", config).map((t) => t.name)).toEqual(["direct", "playground"]);
  });
});

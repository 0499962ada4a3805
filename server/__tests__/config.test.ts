import { describe, it, expect } from "vitest";
import { parseConfig } from "../config";

describe("parseConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = parseConfig({});

    expect(config.databaseUrl).toBeUndefined();
    expect(config.useSSL).toBe(false);
    expect(config.nodeEnv).toBe("development");
    expect(config.port).toBe(5000);
    expect(config.autoSync).toEqual({
      enabled: true,
      intervalMinutes: 15,
      startupDelayMs: 30_000,
      storeDelayMs: 5_000,
    });
    expect(config.timeouts).toEqual({ erpMs: 60_000, atumMs: 60_000, storefrontMs: 1_800_000 });
    expect(config.smtp.port).toBe(587);
  });

  it("prefers the external database and turns on SSL for it", () => {
    const config = parseConfig({
      DATABASE_URL: "postgres://localhost/stock",
      EXTERNAL_DATABASE_URL: "postgres://db.example.com/stock",
    });

    expect(config.databaseUrl).toBe("postgres://db.example.com/stock");
    expect(config.useSSL).toBe(true);
  });

  it("coerces numeric and boolean variables", () => {
    const config = parseConfig({
      NODE_ENV: "production",
      PORT: "8080",
      AUTO_SYNC_ENABLED: "false",
      SYNC_INTERVAL_MINUTES: "5",
      SMTP_HOST: "smtp.test",
      SMTP_PORT: "465",
    });

    expect(config.port).toBe(8080);
    expect(config.useSSL).toBe(true);
    expect(config.autoSync.enabled).toBe(false);
    expect(config.autoSync.intervalMinutes).toBe(5);
    expect(config.smtp).toMatchObject({ host: "smtp.test", port: 465 });
  });

  it("lists every invalid variable", () => {
    expect(() => parseConfig({ PORT: "abc", AUTO_SYNC_ENABLED: "yes" })).toThrow(/Environment validation failed/);
    expect(() => parseConfig({ PORT: "abc" })).toThrow(/- PORT:/);
    expect(() => parseConfig({ SYNC_INTERVAL_MINUTES: "0" })).toThrow(/- SYNC_INTERVAL_MINUTES:/);
  });
});

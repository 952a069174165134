import { describe, it, expect } from "vitest";
import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("defaults to a local node_exporter", () => {
    expect(loadConfig({})).toEqual({
      exporterHost: "localhost",
      exporterPort: 9100,
      scrapeTimeoutMs: 5000,
      host: "0.0.0.0",
      port: 3000,
      corsOrigin: undefined,
      isDev: true,
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      EXPORTER_HOST: "10.0.0.5",
      EXPORTER_PORT: "9256",
      SCRAPE_TIMEOUT_MS: "1500",
      PORT: "8080",
      CORS_ORIGIN: "https://metrics.example.test",
      NODE_ENV: "production",
    });

    expect(config).toMatchObject({
      exporterHost: "10.0.0.5",
      exporterPort: 9256,
      scrapeTimeoutMs: 1500,
      port: 8080,
      corsOrigin: "https://metrics.example.test",
      isDev: false,
    });
  });

  it("falls back when a number does not parse", () => {
    expect(loadConfig({ EXPORTER_PORT: "abc" }).exporterPort).toBe(9100);
  });
});

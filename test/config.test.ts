import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { baseAddress, parsePort, resolveConfig } from "../src/config.js";
import { ValidationError } from "../src/types.js";

const ENV_KEYS = ["VECTRA_HOST", "VECTRA_PORT", "VECTRA_MODE", "VECTRA_DATA_PATH", "VECTRA_ADMIN_API"];

describe("Client configuration", () => {
  let saved: Record<string, string | undefined>;

  beforeEach(() => {
    saved = {};
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it("falls back to defaults", () => {
    const config = resolveConfig();

    expect(config).toEqual({
      host: "127.0.0.1",
      port: 8080,
      transportMode: "remote",
      embeddedAvailable: true,
      dataPath: ":memory:",
      adminApi: false,
    });
  });

  it("returns a frozen config", () => {
    expect(Object.isFrozen(resolveConfig())).toBe(true);
  });

  it("reads environment variables", () => {
    process.env.VECTRA_HOST = "db.internal";
    process.env.VECTRA_PORT = "9090";
    process.env.VECTRA_MODE = "placeholder";
    process.env.VECTRA_DATA_PATH = "/tmp/vectra-data";
    process.env.VECTRA_ADMIN_API = "true";

    const config = resolveConfig();

    expect(config.host).toBe("db.internal");
    expect(config.port).toBe(9090);
    expect(config.transportMode).toBe("placeholder");
    expect(config.dataPath).toBe("/tmp/vectra-data");
    expect(config.adminApi).toBe(true);
  });

  it("prefers explicit options over the environment", () => {
    process.env.VECTRA_HOST = "db.internal";
    process.env.VECTRA_MODE = "placeholder";

    const config = resolveConfig({ host: "localhost", mode: "embedded", embeddedAvailable: false });

    expect(config.host).toBe("localhost");
    expect(config.transportMode).toBe("embedded");
    expect(config.embeddedAvailable).toBe(false);
  });

  it("rejects an out-of-range port", () => {
    expect(() => resolveConfig({ port: 0 })).toThrow(ValidationError);
    expect(() => resolveConfig({ port: 70000 })).toThrow("Invalid port: 70000");
  });

  it("rejects a non-numeric port from the environment", () => {
    process.env.VECTRA_PORT = "abc";
    expect(() => resolveConfig()).toThrow("Invalid port: abc");
  });

  it("rejects an unknown mode", () => {
    process.env.VECTRA_MODE = "local";
    expect(() => resolveConfig()).toThrow(
      "Invalid mode: local. Must be one of embedded, remote, placeholder"
    );
  });

  it("rejects an empty host", () => {
    expect(() => resolveConfig({ host: "" })).toThrow("Host must not be empty");
  });

  it("builds the base address", () => {
    expect(baseAddress({ host: "localhost", port: 8080 })).toBe("http://localhost:8080");
  });

  it("parses ports", () => {
    expect(parsePort("3000")).toBe(3000);
    expect(() => parsePort("3000x")).toThrow(ValidationError);
  });
});

import { describe, expect, it } from "vitest";
import { defaultConfig } from "../config/defaults.js";
import { ConfigError } from "../infra/errors.js";
import { applyCliOverrides, parseBindAddress } from "./overrides.js";

describe("parseBindAddress", () => {
  it("parses host and port", () => {
    expect(parseBindAddress("0.0.0.0:9000")).toEqual({ host: "0.0.0.0", port: 9000 });
  });

  it("parses a bare host", () => {
    expect(parseBindAddress("localhost")).toEqual({ host: "localhost" });
  });

  it("parses a bare port", () => {
    expect(parseBindAddress(":8080")).toEqual({ port: 8080 });
  });

  it("parses a bracketed IPv6 host", () => {
    expect(parseBindAddress("[::1]:8008")).toEqual({ host: "::1", port: 8008 });
    expect(parseBindAddress("[::1]")).toEqual({ host: "::1" });
  });

  it("rejects a port that is not a number", () => {
    expect(() => parseBindAddress("localhost:http")).toThrow(ConfigError);
  });

  it("rejects an empty value", () => {
    expect(() => parseBindAddress("  ")).toThrow(/needs a host/);
  });
});

describe("applyCliOverrides", () => {
  it("leaves the config alone without flags", () => {
    const config = defaultConfig();
    expect(applyCliOverrides(config, {})).toEqual(config);
  });

  it("binds to an explicit host", () => {
    const config = applyCliOverrides(defaultConfig(), { bind: "10.1.2.3:8090" });
    expect(config.gateway.bind).toBe("custom");
    expect(config.gateway.host).toBe("10.1.2.3");
    expect(config.gateway.port).toBe(8090);
  });

  it("keeps the bind mode when only a port is given", () => {
    const config = applyCliOverrides(defaultConfig(), { bind: ":9001" });
    expect(config.gateway.bind).toBe("loopback");
    expect(config.gateway.port).toBe(9001);
  });

  it("sets the validator url and timeout", () => {
    const config = applyCliOverrides(defaultConfig(), {
      connect: "ws://validator:4004",
      timeout: "10",
    });
    expect(config.backend.url).toBe("ws://validator:4004");
    expect(config.backend.timeout).toBe(10);
  });

  it("rejects a timeout longer than a timer can hold", () => {
    expect(() => applyCliOverrides(defaultConfig(), { timeout: "3000000" })).toThrow(
      "--timeout must be between 1 and 2147483, got 3000000",
    );
  });

  it("rejects a non-socket validator url", () => {
    expect(() => applyCliOverrides(defaultConfig(), { connect: "tcp://validator:4004" })).toThrow(
      /backend.url/,
    );
  });
});

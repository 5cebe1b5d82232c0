import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ConfigurationError, getDesiredStateSource, validateEnv } from "./env-validation.js";

describe("env-validation", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.APP_INTERFACE_BUNDLE;
    delete process.env.QONTRACT_SERVER_URL;
    delete process.env.QONTRACT_SERVER_TOKEN;
    delete process.env.EXTRA_VAR;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe("validateEnv", () => {
    it("should report a missing desired-state source", () => {
      expect(validateEnv()).toEqual({
        valid: false,
        missing: ["APP_INTERFACE_BUNDLE or QONTRACT_SERVER_URL"],
      });
    });

    it("should accept a bundle path", () => {
      process.env.APP_INTERFACE_BUNDLE = "/tmp/bundle.yml";
      expect(validateEnv()).toEqual({ valid: true, missing: [] });
    });

    it("should read an explicit environment instead of the process", () => {
      process.env.APP_INTERFACE_BUNDLE = "/tmp/bundle.yml";
      expect(validateEnv([], {})).toEqual({
        valid: false,
        missing: ["APP_INTERFACE_BUNDLE or QONTRACT_SERVER_URL"],
      });
      expect(validateEnv(["EXTRA_VAR"], { QONTRACT_SERVER_URL: "https://qontract.example.com/graphql", EXTRA_VAR: "1" })).toEqual({
        valid: true,
        missing: [],
      });
    });

    it("should report additional required variables", () => {
      process.env.QONTRACT_SERVER_URL = "https://qontract.example.com/graphql";
      expect(validateEnv(["EXTRA_VAR"])).toEqual({ valid: false, missing: ["EXTRA_VAR"] });
    });
  });

  describe("getDesiredStateSource", () => {
    it("should throw ConfigurationError when nothing is configured", () => {
      expect(() => getDesiredStateSource()).toThrow(ConfigurationError);
      expect(() => getDesiredStateSource()).toThrow(
        "Missing required environment variables: APP_INTERFACE_BUNDLE or QONTRACT_SERVER_URL"
      );
    });

    it("should prefer the bundle file", () => {
      process.env.APP_INTERFACE_BUNDLE = "/tmp/bundle.yml";
      process.env.QONTRACT_SERVER_URL = "https://qontract.example.com/graphql";
      expect(getDesiredStateSource()).toEqual({ kind: "bundle", path: "/tmp/bundle.yml" });
    });

    it("should return the GraphQL server with its token", () => {
      process.env.QONTRACT_SERVER_URL = "https://qontract.example.com/graphql";
      process.env.QONTRACT_SERVER_TOKEN = "test-token";
      expect(getDesiredStateSource()).toEqual({
        kind: "graphql",
        url: "https://qontract.example.com/graphql",
        token: "test-token",
      });
    });

    it("should resolve from an explicit environment", () => {
      process.env.APP_INTERFACE_BUNDLE = "/tmp/bundle.yml";
      expect(
        getDesiredStateSource({ QONTRACT_SERVER_URL: "https://qontract.example.com/graphql", QONTRACT_SERVER_TOKEN: "test-token" })
      ).toEqual({ kind: "graphql", url: "https://qontract.example.com/graphql", token: "test-token" });
    });

    it("should reject an invalid server URL", () => {
      process.env.QONTRACT_SERVER_URL = "not a url";
      expect(() => getDesiredStateSource()).toThrow(
        "QONTRACT_SERVER_URL must be a valid URL, got: not a url"
      );
    });
  });
});

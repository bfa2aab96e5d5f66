import { describe, it, expect } from "vitest";
import { loadConfig } from "../config/env";
import { ConfigurationError } from "../utils/errorHandler";

const required = {
  DATABRICKS_HOST: "https://example.cloud.databricks.com/",
  DATABRICKS_TOKEN: "test-token",
  DATABRICKS_SPACE_ID: "space-1",
};

describe("loadConfig", () => {
  it("applies defaults around the required Genie settings", () => {
    const config = loadConfig(required);

    expect(config.DATABRICKS_HOST).toBe("https://example.cloud.databricks.com");
    expect(config.PORT).toBe(3978);
    expect(config.HOST).toBe("localhost");
    expect(config.MICROSOFT_APP_TYPE).toBe("MultiTenant");
    expect(config.MICROSOFT_APP_ID).toBe("");
    expect(config.SERIALIZE_USER_TURNS).toBe(false);
    expect(config.GENIE_WAIT_TIMEOUT_MS).toBe(20 * 60 * 1000);
    expect(config.SESSION_MAX_ENTRIES).toBeUndefined();
    expect(config.LOG_LEVEL).toBe("info");
  });

  it("coerces numeric and boolean settings", () => {
    const config = loadConfig({
      ...required,
      PORT: "8080",
      SERIALIZE_USER_TURNS: "true",
      SESSION_MAX_ENTRIES: "500",
      SESSION_TTL_MINUTES: "60",
    });

    expect(config.PORT).toBe(8080);
    expect(config.SERIALIZE_USER_TURNS).toBe(true);
    expect(config.SESSION_MAX_ENTRIES).toBe(500);
    expect(config.SESSION_TTL_MINUTES).toBe(60);
  });

  it("names the missing variable", () => {
    const { DATABRICKS_TOKEN: _token, ...withoutToken } = required;

    expect(() => loadConfig(withoutToken)).toThrow(ConfigurationError);
    expect(() => loadConfig(withoutToken)).toThrow("DATABRICKS_TOKEN environment variable is required");
  });

  it("rejects an empty space id", () => {
    expect(() => loadConfig({ ...required, DATABRICKS_SPACE_ID: "" })).toThrow(
      "DATABRICKS_SPACE_ID environment variable is required",
    );
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ ...required, LOG_LEVEL: "verbose" })).toThrow(ConfigurationError);
  });
});

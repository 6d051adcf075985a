import { describe, it, expect } from "vitest";
import { getSearchCredentials } from "./env";
import { ConfigurationError } from "./errors";

describe("getSearchCredentials", () => {
  it("reads the key and engine id", () => {
    expect(getSearchCredentials({ GOOGLE_API_KEY: "test-key", GOOGLE_CSE_ID: "test-cx" })).toEqual({
      apiKey: "test-key",
      cx: "test-cx",
    });
  });

  it("accepts GOOGLE_CX as the engine id", () => {
    expect(getSearchCredentials({ GOOGLE_API_KEY: "test-key", GOOGLE_CX: "alt-cx" }).cx).toBe("alt-cx");
  });

  it("reports every missing value", () => {
    try {
      getSearchCredentials({ GOOGLE_API_KEY: "  " });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (!(err instanceof ConfigurationError)) throw err;
      expect(err.missing).toEqual(["GOOGLE_API_KEY", "GOOGLE_CSE_ID"]);
      expect(err.toJSON()).toEqual({
        code: "CONFIGURATION_ERROR",
        message: "Missing configuration: GOOGLE_API_KEY, GOOGLE_CSE_ID",
        missing: ["GOOGLE_API_KEY", "GOOGLE_CSE_ID"],
      });
    }
  });
});

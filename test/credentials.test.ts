import { describe, it, expect } from "vitest";
import { resolveCredential } from "../src/credentials.js";
import { MissingCredentialError } from "../src/errors.js";

describe("resolveCredential", () => {
  it("returns the explicit key whatever the environment holds", () => {
    const config = { apiKey: "test-secret", envVar: "OPENAI_API_KEY" };
    expect(resolveCredential(config, {})).toBe("test-secret");
    expect(resolveCredential(config, { OPENAI_API_KEY: "env-secret" })).toBe("test-secret");
  });

  it("falls back to the named environment variable", () => {
    expect(
      resolveCredential({ envVar: "MY_LLM_KEY" }, { MY_LLM_KEY: "env-secret" })
    ).toBe("env-secret");
  });

  it("treats an empty explicit key as absent", () => {
    expect(
      resolveCredential({ apiKey: "", envVar: "OPENAI_API_KEY" }, { OPENAI_API_KEY: "env-secret" })
    ).toBe("env-secret");
  });

  it("uses OPENAI_API_KEY when no variable name is configured", () => {
    expect(resolveCredential({ envVar: "" }, { OPENAI_API_KEY: "env-secret" })).toBe("env-secret");
  });

  it("fails when the variable is unset", () => {
    expect(() => resolveCredential({ envVar: "OPENAI_API_KEY" }, {})).toThrow(
      MissingCredentialError
    );
  });

  it("fails when the variable is empty", () => {
    try {
      resolveCredential({ apiKey: "", envVar: "MY_LLM_KEY" }, { MY_LLM_KEY: "" });
      expect.fail("expected MissingCredentialError");
    } catch (err) {
      expect(err).toBeInstanceOf(MissingCredentialError);
      if (err instanceof MissingCredentialError) {
        expect(err.kind).toBe("MissingCredential");
        expect(err.envVar).toBe("MY_LLM_KEY");
        expect(err.severity).toBe("error");
      }
    }
  });
});

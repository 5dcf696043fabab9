import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { appConfigSchema, loadConfig } from "../../src/lib/config";
import { ConfigError } from "../../src/lib/errors";
import { getStateBackendMode } from "../../src/lib/store/runtime";

function writePolicyFile(contents: string) {
  const dir = mkdtempSync(join(tmpdir(), "scriptorium-policy-"));
  const path = join(dir, "policy.yaml");
  writeFileSync(path, contents, "utf8");
  return path;
}

describe("loadConfig", () => {
  it("falls back to the default policy", () => {
    const config = loadConfig({ env: {} });
    expect(config.environment).toBe("development");
    expect(config.logLevel).toBe("info");
    expect(config.stateBackend).toBeUndefined();
    expect(config.policy).toEqual({
      minReviewsNormal: 2,
      minReviewsHighImpact: 3,
      highImpactDomains: ["ai-theory", "ai-safety", "cryptography"],
      acceptScoreThreshold: 6,
      maxRevisionRounds: 3,
      minAbstractLength: 50,
      minContentLength: 200,
      plagiarismSimilarityThreshold: 0.92
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      env: {
        NODE_ENV: "test",
        SCRIPTORIUM_MIN_REVIEWS: "3",
        SCRIPTORIUM_ACCEPT_THRESHOLD: "7.5",
        SCRIPTORIUM_HIGH_IMPACT_DOMAINS: " robotics , ai-safety ,",
        SCRIPTORIUM_LOG_LEVEL: "WARN",
        SCRIPTORIUM_STATE_BACKEND: "memory"
      }
    });
    expect(config.environment).toBe("test");
    expect(config.logLevel).toBe("warn");
    expect(config.stateBackend).toBe("memory");
    expect(config.policy).toMatchObject({
      minReviewsNormal: 3,
      acceptScoreThreshold: 7.5,
      highImpactDomains: ["robotics", "ai-safety"]
    });
  });

  it("layers environment values over the policy file", () => {
    const policyFile = writePolicyFile("acceptScoreThreshold: 7\nmaxRevisionRounds: 1\nhighImpactDomains:\n  - robotics\n");
    const config = loadConfig({ env: { SCRIPTORIUM_ACCEPT_THRESHOLD: "8" }, policyFile });
    expect(config.policy).toMatchObject({ acceptScoreThreshold: 8, maxRevisionRounds: 1, highImpactDomains: ["robotics"] });
  });

  it("finds the policy file through the environment", () => {
    const policyFile = writePolicyFile("minContentLength: 10\n");
    expect(loadConfig({ env: { SCRIPTORIUM_POLICY_FILE: policyFile } }).policy.minContentLength).toBe(10);
  });

  it("rejects policy files that are not a mapping", () => {
    const policyFile = writePolicyFile("- one\n- two\n");
    expect(() => loadConfig({ env: {}, policyFile })).toThrow(`Policy file ${policyFile} must contain a mapping`);
  });

  it("rejects non-numeric thresholds", () => {
    expect(() => loadConfig({ env: { SCRIPTORIUM_MIN_REVIEWS: "two" } })).toThrow(
      'SCRIPTORIUM_MIN_REVIEWS must be a number (got "two")'
    );
  });

  it("requires the high-impact minimum to cover the normal one", () => {
    const load = () => loadConfig({ env: { SCRIPTORIUM_MIN_REVIEWS: "4" } });
    expect(load).toThrow(ConfigError);
    expect(load).toThrow(
      "Invalid configuration: policy.minReviewsHighImpact: minReviewsHighImpact must be at least minReviewsNormal"
    );
  });

  it("rejects unknown log levels", () => {
    expect(() => loadConfig({ env: { SCRIPTORIUM_LOG_LEVEL: "loud" } })).toThrow(ConfigError);
  });
});

describe("getStateBackendMode", () => {
  it("uses memory in tests and postgres when a database is configured", () => {
    expect(getStateBackendMode(appConfigSchema.parse({ environment: "test" }))).toBe("memory");
    expect(getStateBackendMode(appConfigSchema.parse({ databaseUrl: "postgres://localhost/test" }))).toBe("postgres");
    expect(getStateBackendMode(appConfigSchema.parse({ stateBackend: "memory", databaseUrl: "postgres://localhost/test" }))).toBe(
      "memory"
    );
  });

  it("refuses to run without durable storage outside tests", () => {
    expect(() => getStateBackendMode(appConfigSchema.parse({ environment: "production" }))).toThrow(ConfigError);
    expect(() => getStateBackendMode(appConfigSchema.parse({ stateBackend: "postgres" }))).toThrow(
      "SCRIPTORIUM_STATE_BACKEND=postgres requires DATABASE_URL"
    );
  });
});

import { readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError } from "@/lib/errors";
import { LOG_LEVELS } from "@/lib/logger";

export const policyConfigSchema = z
  .object({
    minReviewsNormal: z.number().int().min(1).default(2),
    minReviewsHighImpact: z.number().int().min(1).default(3),
    highImpactDomains: z.array(z.string().min(1)).default(["ai-theory", "ai-safety", "cryptography"]),
    acceptScoreThreshold: z.number().min(1).max(10).default(6.0),
    maxRevisionRounds: z.number().int().min(0).default(3),
    minAbstractLength: z.number().int().min(0).default(50),
    minContentLength: z.number().int().min(0).default(200),
    plagiarismSimilarityThreshold: z.number().min(0).max(1).default(0.92)
  })
  .superRefine((value, ctx) => {
    if (value.minReviewsHighImpact < value.minReviewsNormal) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["minReviewsHighImpact"],
        message: "minReviewsHighImpact must be at least minReviewsNormal"
      });
    }
  });

export type PolicyConfig = z.infer<typeof policyConfigSchema>;

export const appConfigSchema = z.object({
  environment: z.enum(["development", "test", "production"]).default("development"),
  stateBackend: z.enum(["memory", "postgres"]).optional(),
  databaseUrl: z.string().min(1).optional(),
  logLevel: z.enum(LOG_LEVELS).default("info"),
  policy: policyConfigSchema.default({})
});

export type AppConfig = z.infer<typeof appConfigSchema>;

export function defaultPolicyConfig(overrides: Partial<PolicyConfig> = {}): PolicyConfig {
  return policyConfigSchema.parse(overrides);
}

type Env = Record<string, string | undefined>;

function numberFromEnv(env: Env, key: string): number | undefined {
  const raw = env[key]?.trim();
  if (!raw) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${key} must be a number (got "${raw}")`);
  }
  return value;
}

function readPolicyFile(path: string): object {
  let raw: string;
  try {
    raw = readFileSync(path, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Unable to read policy file ${path}: ${message}`);
  }
  const parsed: unknown = parseYaml(raw);
  if (parsed == null) return {};
  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigError(`Policy file ${path} must contain a mapping`);
  }
  return parsed;
}

function formatIssues(error: z.ZodError) {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

export function loadConfig(options: { env?: Env; policyFile?: string } = {}): AppConfig {
  const env = options.env ?? process.env;
  const policyFile = options.policyFile ?? env.SCRIPTORIUM_POLICY_FILE?.trim();
  const policy: Record<string, unknown> = policyFile ? { ...readPolicyFile(policyFile) } : {};
  const minReviews = numberFromEnv(env, "SCRIPTORIUM_MIN_REVIEWS");
  if (minReviews !== undefined) policy.minReviewsNormal = minReviews;
  const threshold = numberFromEnv(env, "SCRIPTORIUM_ACCEPT_THRESHOLD");
  if (threshold !== undefined) policy.acceptScoreThreshold = threshold;
  const highImpact = env.SCRIPTORIUM_HIGH_IMPACT_DOMAINS?.trim();
  if (highImpact) {
    policy.highImpactDomains = highImpact.split(",").map((d) => d.trim()).filter(Boolean);
  }

  const nodeEnv = env.NODE_ENV === "test" || env.NODE_ENV === "production" ? env.NODE_ENV : undefined;
  const parsed = appConfigSchema.safeParse({
    environment: env.SCRIPTORIUM_ENV?.trim() || nodeEnv,
    stateBackend: env.SCRIPTORIUM_STATE_BACKEND?.trim().toLowerCase() || undefined,
    databaseUrl: env.DATABASE_URL?.trim() || undefined,
    logLevel: env.SCRIPTORIUM_LOG_LEVEL?.trim().toLowerCase() || undefined,
    policy
  });
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

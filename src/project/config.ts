import fs from "node:fs";
import path from "node:path";
import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { createJiti } from "jiti";
import { ConfigError } from "../core/errors";
import { defaultPhasePlan } from "../phases";

const CriterionSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  description: Type.String(),
  source: Type.Union([
    Type.Literal("manual"),
    Type.Literal("work-items-done"),
    Type.Literal("reviews-settled"),
    Type.Literal("catalogue-settled"),
    Type.Literal("no-open-escalations"),
  ]),
});

const PhaseSchema = Type.Object({
  ordinal: Type.Integer({ minimum: 1 }),
  name: Type.String({ minLength: 1 }),
  reviewers: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
  safetyPriority: Type.Union([
    Type.Literal("testability"),
    Type.Literal("fidelity"),
    Type.Literal("quality"),
  ]),
  criteria: Type.Array(CriterionSchema),
});

const ReviewPolicySchema = Type.Object({
  /** How long one attempt to collect a round's votes may wait. */
  voteTimeoutMs: Type.Integer({ minimum: 1 }),
  maxVoteRetries: Type.Integer({ minimum: 0 }),
  backoffMs: Type.Integer({ minimum: 0 }),
  backoffFactor: Type.Number({ minimum: 1 }),
  /** RequestedChange revisions allowed before the item is escalated. */
  maxRevisions: Type.Integer({ minimum: 0 }),
});

export const EngineConfigSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  logLevel: Type.Union([
    Type.Literal("debug"),
    Type.Literal("info"),
    Type.Literal("warn"),
    Type.Literal("error"),
    Type.Literal("silent"),
  ]),
  phases: Type.Array(PhaseSchema, { minItems: 1 }),
  review: ReviewPolicySchema,
  workers: Type.Object({ concurrency: Type.Integer({ minimum: 1 }) }),
  monitor: Type.Object({
    intervalMs: Type.Integer({ minimum: 1 }),
    stallThreshold: Type.Integer({ minimum: 1 }),
  }),
  stateDir: Type.Optional(Type.String({ minLength: 1 })),
  socketPath: Type.Optional(Type.String({ minLength: 1 })),
});

export type EngineConfig = Static<typeof EngineConfigSchema>;
export type ReviewPolicy = Static<typeof ReviewPolicySchema>;

/**
 * What a `.phasegate/engine.ts` default export may contain. Nested policy
 * objects are merged key by key over the defaults.
 */
export type EngineConfigInput = Partial<
  Omit<EngineConfig, "review" | "workers" | "monitor">
> & {
  review?: Partial<ReviewPolicy>;
  workers?: Partial<EngineConfig["workers"]>;
  monitor?: Partial<EngineConfig["monitor"]>;
};

export const defineEngineConfig = (
  config: EngineConfigInput,
): EngineConfigInput => config;

export const defaultEngineConfig: EngineConfig = {
  name: "phasegate",
  logLevel: "info",
  phases: defaultPhasePlan,
  review: {
    voteTimeoutMs: 60_000,
    maxVoteRetries: 3,
    backoffMs: 1_000,
    backoffFactor: 2,
    maxRevisions: 3,
  },
  workers: { concurrency: 4 },
  monitor: { intervalMs: 30_000, stallThreshold: 3 },
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const mergeSection = (
  fallback: Record<string, unknown>,
  value: unknown,
): unknown => {
  if (value === undefined) return fallback;
  return isRecord(value) ? { ...fallback, ...value } : value;
};

const checkPhasePlan = (phases: EngineConfig["phases"]): string[] => {
  const issues: string[] = [];
  const ordinals = phases.map((phase) => phase.ordinal).sort((a, b) => a - b);
  ordinals.forEach((ordinal, index) => {
    if (ordinal !== index + 1) {
      issues.push(
        `/phases: ordinals must run 1..${phases.length} without gaps, found ${ordinals.join(",")}`,
      );
    }
  });

  for (const phase of phases) {
    const seen = new Set<string>();
    for (const criterion of phase.criteria) {
      if (seen.has(criterion.id)) {
        issues.push(
          `/phases/${phase.ordinal}: duplicate criterion id ${criterion.id}`,
        );
      }
      seen.add(criterion.id);
    }
  }

  return [...new Set(issues)];
};

export const resolveEngineConfig = (
  raw: unknown,
  source: string,
): EngineConfig => {
  if (!isRecord(raw)) {
    throw new ConfigError(source, ["/: expected an object"]);
  }

  const merged = {
    ...defaultEngineConfig,
    ...raw,
    review: mergeSection(defaultEngineConfig.review, raw.review),
    workers: mergeSection(defaultEngineConfig.workers, raw.workers),
    monitor: mergeSection(defaultEngineConfig.monitor, raw.monitor),
  };

  if (!Value.Check(EngineConfigSchema, merged)) {
    const issues = [...Value.Errors(EngineConfigSchema, merged)].map(
      (error) => `${error.path || "/"}: ${error.message}`,
    );
    throw new ConfigError(source, issues);
  }

  const planIssues = checkPhasePlan(merged.phases);
  if (planIssues.length > 0) {
    throw new ConfigError(source, planIssues);
  }

  return {
    ...merged,
    phases: [...merged.phases].sort((a, b) => a.ordinal - b.ordinal),
  };
};

const unwrapDefault = (loaded: unknown): unknown =>
  isRecord(loaded) && "default" in loaded ? (loaded.default ?? loaded) : loaded;

/** Relative `stateDir` and `socketPath` are taken from the project directory. */
const anchorPaths = (config: EngineConfig, cwd: string): EngineConfig => ({
  ...config,
  ...(config.stateDir !== undefined
    ? { stateDir: path.resolve(cwd, config.stateDir) }
    : {}),
  ...(config.socketPath !== undefined
    ? { socketPath: path.resolve(cwd, config.socketPath) }
    : {}),
});

export const loadEngineConfig = async (cwd: string): Promise<EngineConfig> => {
  const tsPath = path.join(cwd, ".phasegate", "engine.ts");
  if (fs.existsSync(tsPath)) {
    const jiti = createJiti(import.meta.url);
    const loaded = await jiti.import(tsPath);
    return anchorPaths(resolveEngineConfig(unwrapDefault(loaded), tsPath), cwd);
  }

  const jsonPath = path.join(cwd, ".phasegate", "engine.json");
  if (!fs.existsSync(jsonPath)) {
    return defaultEngineConfig;
  }

  const parsed = JSON.parse(fs.readFileSync(jsonPath, "utf8")) as unknown;
  return anchorPaths(resolveEngineConfig(parsed, jsonPath), cwd);
};

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { ConfigError } from "../src/core/errors";
import { manual } from "../src/core/phase-definition";
import {
  defaultEngineConfig,
  loadEngineConfig,
  resolveEngineConfig,
} from "../src/project/config";

const configIssues = (raw: unknown): string[] => {
  try {
    resolveEngineConfig(raw, "inline");
  } catch (error) {
    if (error instanceof ConfigError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error("expected a ConfigError");
};

describe("engine config", () => {
  it("returns defaults when no config file exists", async () => {
    const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "phasegate-config-"));
    const config = await loadEngineConfig(cwd);

    expect(config).toBe(defaultEngineConfig);
    expect(config.phases.map((phase) => phase.name)).toEqual([
      "inventory",
      "extraction",
      "implementation",
      "verification",
    ]);
    expect(config.phases.map((phase) => phase.safetyPriority)).toEqual([
      "testability",
      "fidelity",
      "fidelity",
      "quality",
    ]);
  });

  it("merges engine.json sections key by key over the defaults", async () => {
    const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "phasegate-config-"));
    const jsonPath = path.join(cwd, ".phasegate", "engine.json");
    fs.mkdirSync(path.dirname(jsonPath), { recursive: true });
    fs.writeFileSync(
      jsonPath,
      JSON.stringify({ name: "json-engine", review: { maxRevisions: 1 } }),
    );

    const config = await loadEngineConfig(cwd);
    expect(config.name).toBe("json-engine");
    expect(config.review).toEqual({
      voteTimeoutMs: 60_000,
      maxVoteRetries: 3,
      backoffMs: 1_000,
      backoffFactor: 2,
      maxRevisions: 1,
    });
    expect(config.workers).toEqual({ concurrency: 4 });
  });

  it("resolves relative state and socket paths against the project directory", async () => {
    const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "phasegate-config-"));
    const jsonPath = path.join(cwd, ".phasegate", "engine.json");
    fs.mkdirSync(path.dirname(jsonPath), { recursive: true });
    fs.writeFileSync(
      jsonPath,
      JSON.stringify({
        stateDir: ".phasegate/state",
        socketPath: path.join(cwd, "control.sock"),
      }),
    );

    const config = await loadEngineConfig(cwd);

    expect(config.stateDir).toBe(path.join(cwd, ".phasegate", "state"));
    expect(config.socketPath).toBe(path.join(cwd, "control.sock"));
  });

  it("prefers .phasegate/engine.ts when present", async () => {
    const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "phasegate-config-"));
    const dir = path.join(cwd, ".phasegate");
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(
      path.join(dir, "engine.ts"),
      `export default { name: "from-ts", workers: { concurrency: 2 } };\n`,
    );
    fs.writeFileSync(
      path.join(dir, "engine.json"),
      JSON.stringify({ name: "from-json" }),
    );

    const config = await loadEngineConfig(cwd);
    expect(config.name).toBe("from-ts");
    expect(config.workers.concurrency).toBe(2);
  });

  it("lists every failing path", () => {
    const issues = configIssues({
      review: { maxVoteRetries: -1 },
      workers: { concurrency: 0 },
    });

    expect(
      issues.some((issue) => issue.startsWith("/review/maxVoteRetries: ")),
    ).toBe(true);
    expect(
      issues.some((issue) => issue.startsWith("/workers/concurrency: ")),
    ).toBe(true);
  });

  it("rejects gaps in phase ordinals and duplicate criterion ids", () => {
    const issues = configIssues({
      phases: [
        {
          ordinal: 1,
          name: "draft",
          reviewers: ["architect"],
          safetyPriority: "quality",
          criteria: [
            manual({ id: "signed-off", description: "first" }),
            manual({ id: "signed-off", description: "second" }),
          ],
        },
        {
          ordinal: 3,
          name: "check",
          reviewers: ["architect"],
          safetyPriority: "quality",
          criteria: [],
        },
      ],
    });

    expect(issues).toEqual([
      "/phases: ordinals must run 1..2 without gaps, found 1,3",
      "/phases/1: duplicate criterion id signed-off",
    ]);
  });

  it("rejects a config that is not an object", () => {
    expect(configIssues(["not", "an", "object"])).toEqual([
      "/: expected an object",
    ]);
  });

  it("returns phases sorted by ordinal", () => {
    const [first, second] = defaultEngineConfig.phases;
    const config = resolveEngineConfig({ phases: [second, first] }, "inline");
    expect(config.phases.map((phase) => phase.ordinal)).toEqual([1, 2]);
  });
});

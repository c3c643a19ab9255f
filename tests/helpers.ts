import { EngineLogger, type LogSink } from "../src/core/logger";
import { PhaseGateEngine, type EngineOptions } from "../src/core/engine";
import { definePhase, manual } from "../src/core/phase-definition";
import type { ProposalId } from "../src/core/types";
import { type EngineConfig, resolveEngineConfig } from "../src/project/config";
import type { ReviewRequest, ReviewerChannel } from "../src/review/review-inbox";

export interface CapturedLine {
  level: string;
  entry: Record<string, unknown>;
}

export const captureLogger = (
  level: "debug" | "info" | "warn" | "error" = "debug",
): { logger: EngineLogger; lines: CapturedLine[]; sink: LogSink } => {
  const lines: CapturedLine[] = [];
  const sink: LogSink = (line, emitted) => {
    const parsed: unknown = JSON.parse(line);
    lines.push({
      level: emitted,
      entry: typeof parsed === "object" && parsed !== null ? { ...parsed } : {},
    });
  };
  return { logger: new EngineLogger({ level, sink }), lines, sink };
};

export const messages = (lines: CapturedLine[]): unknown[] =>
  lines.map((line) => line.entry.msg);

/** Two small phases: "draft" gated by a manual sign-off, then "check". */
export const testPhases = [
  definePhase({
    ordinal: 1,
    name: "draft",
    reviewers: ["architect", "tester"],
    safetyPriority: "fidelity",
    criteria: [
      manual({ id: "signed-off", description: "Draft signed off" }),
      {
        id: "work-items-done",
        description: "Every work item is Done",
        source: "work-items-done",
      },
      {
        id: "no-open-escalations",
        description: "No pending escalation",
        source: "no-open-escalations",
      },
    ],
  }),
  definePhase({
    ordinal: 2,
    name: "check",
    reviewers: ["architect", "auditor"],
    safetyPriority: "quality",
    criteria: [],
  }),
];

export const testConfig = (overrides: Record<string, unknown> = {}): EngineConfig =>
  resolveEngineConfig(
    {
      name: "phasegate-test",
      logLevel: "silent",
      phases: testPhases,
      review: {
        voteTimeoutMs: 1_000,
        maxVoteRetries: 1,
        backoffMs: 100,
        backoffFactor: 2,
        maxRevisions: 1,
      },
      ...overrides,
    },
    "test",
  );

export const createEngine = (
  overrides: Record<string, unknown> = {},
  options: EngineOptions = {},
): PhaseGateEngine => new PhaseGateEngine(testConfig(overrides), options);

/** Lets queued promise callbacks run. */
export const flush = async (times = 10): Promise<void> => {
  for (let index = 0; index < times; index += 1) {
    await Promise.resolve();
  }
};

/**
 * Reviewer channel that records every request and answers through a script.
 * Answers may be given synchronously from inside `notify`.
 */
export class ScriptedChannel implements ReviewerChannel {
  readonly requests: ReviewRequest[] = [];
  readonly retracted: ProposalId[] = [];
  private script: (request: ReviewRequest) => void = () => undefined;

  respondWith(script: (request: ReviewRequest) => void): void {
    this.script = script;
  }

  notify(request: ReviewRequest): void {
    this.requests.push(request);
    this.script(request);
  }

  retract(proposalId: ProposalId): void {
    this.retracted.push(proposalId);
  }

  of(kind: ReviewRequest["kind"]): ReviewRequest[] {
    return this.requests.filter((request) => request.kind === kind);
  }
}

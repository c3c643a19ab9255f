import type { GateCriterion, RoleId } from "./types";

export type EngineErrorCode =
  | "GateNotSatisfied"
  | "DuplicateSubmission"
  | "IncompleteReviewRecord"
  | "CatalogueLockViolation"
  | "ConsensusDeadlock"
  | "InvalidTransition"
  | "VersionConflict"
  | "NotFound"
  | "EscalationResolved"
  | "Config";

/**
 * Base class for every failure the engine raises on purpose. `code` is stable
 * and is what the control server and log lines carry.
 */
export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string) {
    super(message);
    this.name = "EngineError";
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class GateNotSatisfiedError extends EngineError {
  readonly phase: number;
  readonly unmet: GateCriterion[];

  constructor(phase: number, unmet: GateCriterion[]) {
    super(
      "GateNotSatisfied",
      `Phase ${phase} gate not satisfied: ${unmet.map((c) => c.id).join(", ")}`,
    );
    this.name = "GateNotSatisfiedError";
    this.phase = phase;
    this.unmet = unmet;
  }
}

export class DuplicateSubmissionError extends EngineError {
  readonly itemId: string;

  constructor(itemId: string, detail: string) {
    super("DuplicateSubmission", `Work item ${itemId} ${detail}`);
    this.name = "DuplicateSubmissionError";
    this.itemId = itemId;
  }
}

export class IncompleteReviewRecordError extends EngineError {
  readonly missingRoles: RoleId[];

  constructor(proposalId: string, missingRoles: RoleId[], reason: string) {
    super(
      "IncompleteReviewRecord",
      `Chronicle record for ${proposalId} rejected: ${reason}`,
    );
    this.name = "IncompleteReviewRecordError";
    this.missingRoles = missingRoles;
  }
}

export class CatalogueLockViolationError extends EngineError {
  readonly entryId: string;

  constructor(entryId: string, attempted: string) {
    super(
      "CatalogueLockViolation",
      `Catalogue entry ${entryId}: ${attempted} is not permitted`,
    );
    this.name = "CatalogueLockViolationError";
    this.entryId = entryId;
  }
}

export class ConsensusDeadlockError extends EngineError {
  readonly proposalId: string;

  constructor(proposalId: string, debateRounds: number) {
    super(
      "ConsensusDeadlock",
      `Proposal ${proposalId} still disputed after ${debateRounds} debate rounds`,
    );
    this.name = "ConsensusDeadlockError";
    this.proposalId = proposalId;
  }
}

export class InvalidTransitionError extends EngineError {
  readonly from: string;
  readonly to: string;

  constructor(subject: string, from: string, to: string) {
    super("InvalidTransition", `${subject}: invalid transition ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
    this.from = from;
    this.to = to;
  }
}

export class VersionConflictError extends EngineError {
  constructor(entryId: string, expected: number, actual: number) {
    super(
      "VersionConflict",
      `Catalogue entry ${entryId} is at v${actual}, expected v${expected}`,
    );
    this.name = "VersionConflictError";
  }
}

export class NotFoundError extends EngineError {
  constructor(kind: string, id: string) {
    super("NotFound", `Unknown ${kind}: ${id}`);
    this.name = "NotFoundError";
  }
}

export class EscalationResolvedError extends EngineError {
  constructor(id: string) {
    super("EscalationResolved", `Escalation ${id} is already resolved`);
    this.name = "EscalationResolvedError";
  }
}

export class ConfigError extends EngineError {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(
      "Config",
      `Engine config ${source} is invalid:\n${issues.map((i) => `  ${i}`).join("\n")}`,
    );
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : "unknown error";

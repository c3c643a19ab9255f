import { GateNotSatisfiedError, InvalidTransitionError, NotFoundError } from "./errors";
import { snapshot } from "./immutable";
import type { EngineLogger } from "./logger";
import {
  type CatalogueEntry,
  type ChangeProposal,
  type EntryId,
  type GateCriterion,
  type GateStatus,
  type Phase,
  type PhaseDefinition,
  type RoleId,
  type SafetyConcern,
  type WorkItem,
  asRoleId,
} from "./types";
import type { EscalationManager } from "../review/escalation-manager";

export interface GateSources {
  items: { list(phase?: number): WorkItem[] };
  reviews: { active(phase?: number): ChangeProposal[] };
  catalogue: {
    unsettled(phase: number): EntryId[];
    lockApproved(): CatalogueEntry[];
  };
  escalations: EscalationManager;
}

export type PhaseTransition =
  | { kind: "opened" | "closed"; phase: number }
  | { kind: "criterion"; phase: number; criterion: string }
  | { kind: "reopened"; phase: number; reason: string };

export interface AdvanceResult {
  closed: Phase;
  opened: Phase | null;
  locked: CatalogueEntry[];
}

const toPhase = (definition: PhaseDefinition): Phase => ({
  ordinal: definition.ordinal,
  name: definition.name,
  status: "pending",
  reviewers: definition.reviewers.map(asRoleId),
  safetyPriority: definition.safetyPriority,
  criteria: definition.criteria.map((criterion) => ({
    ...criterion,
    satisfied: false,
  })),
});

/**
 * Owns the phase sequence and every gate criterion. Derived criteria are
 * recomputed on each evaluation; manual ones only change through
 * `recordCriterion`.
 */
export class PhaseController {
  private readonly phases: Phase[];
  private readonly listeners: Array<(event: PhaseTransition) => void> = [];

  constructor(
    definitions: PhaseDefinition[],
    private readonly sources: GateSources,
    private readonly logger: EngineLogger,
    restored?: Phase[] | null,
  ) {
    this.phases = [...definitions]
      .sort((a, b) => a.ordinal - b.ordinal)
      .map((definition) => {
        const previous = restored?.find(
          (phase) => phase.ordinal === definition.ordinal,
        );
        return previous ? mergeRestored(toPhase(definition), previous) : toPhase(definition);
      });

    if (this.phases.every((phase) => phase.status === "pending")) {
      const first = this.phases[0];
      if (first) {
        this.markOpen(first);
      }
    }
  }

  onTransition(listener: (event: PhaseTransition) => void): void {
    this.listeners.push(listener);
  }

  has(ordinal: number): boolean {
    return this.phases.some((phase) => phase.ordinal === ordinal);
  }

  isOpen(ordinal: number): boolean {
    return this.find(ordinal)?.status === "open";
  }

  get(ordinal: number): Phase {
    return snapshot(this.require(ordinal));
  }

  list(): Phase[] {
    return this.phases.map((phase) => snapshot(phase));
  }

  /** The open phase, or null once the last phase has closed. */
  current(): Phase | null {
    const open = this.phases.find((phase) => phase.status === "open");
    return open ? snapshot(open) : null;
  }

  requiredReviewerRoles(ordinal: number): RoleId[] {
    return [...this.require(ordinal).reviewers];
  }

  safetyPriority(ordinal: number): SafetyConcern {
    return this.require(ordinal).safetyPriority;
  }

  openPhase(ordinal: number): Phase {
    const phase = this.require(ordinal);
    if (phase.status === "open") {
      return snapshot(phase);
    }

    const previous = this.phases.filter((entry) => entry.ordinal < ordinal);
    const ready =
      phase.status === "pending" &&
      previous.every((entry) => entry.status === "closed") &&
      !this.phases.some((entry) => entry.status === "open");
    if (!ready) {
      throw new InvalidTransitionError(`phase ${ordinal}`, phase.status, "open");
    }

    this.markOpen(phase);
    return snapshot(phase);
  }

  recordCriterion(ordinal: number, criterionId: string, evidence: string): GateCriterion {
    const phase = this.require(ordinal);
    const criterion = phase.criteria.find((entry) => entry.id === criterionId);
    if (!criterion) {
      throw new NotFoundError(`criterion of phase ${ordinal}`, criterionId);
    }
    if (criterion.source !== "manual") {
      throw new InvalidTransitionError(
        `criterion ${criterionId} (derived from ${criterion.source})`,
        "computed",
        "recorded",
      );
    }
    if (phase.status === "closed") {
      throw new InvalidTransitionError(`phase ${ordinal}`, "closed", "criterion recorded");
    }

    criterion.satisfied = true;
    criterion.evidence = evidence;
    this.logger.info("gate criterion recorded", {
      phase: ordinal,
      criterion: criterionId,
      evidence,
    });
    this.emit({ kind: "criterion", phase: ordinal, criterion: criterionId });
    return { ...criterion };
  }

  evaluateGate(ordinal: number): GateStatus {
    const phase = this.require(ordinal);
    const criteria = phase.criteria.map((criterion) =>
      criterion.source === "manual" ? { ...criterion } : this.derive(phase, criterion),
    );
    const unmetCriteria = criteria.filter((criterion) => !criterion.satisfied);

    return {
      phase: ordinal,
      satisfied: unmetCriteria.length === 0,
      unmetCriteria,
      openEscalations: this.sources.escalations
        .open(ordinal)
        .map((escalation) => escalation.id),
    };
  }

  /**
   * Closes the open phase and opens the next one. Nothing changes when a
   * criterion is unmet. Every Approved catalogue entry is locked on the way.
   */
  advancePhase(): AdvanceResult {
    const phase = this.phases.find((entry) => entry.status === "open");
    if (!phase) {
      throw new InvalidTransitionError("phase plan", "complete", "advance");
    }

    const gate = this.evaluateGate(phase.ordinal);
    if (!gate.satisfied) {
      this.logger.warn("gate not satisfied", {
        phase: phase.ordinal,
        unmet: gate.unmetCriteria.map((criterion) => criterion.id),
      });
      throw new GateNotSatisfiedError(phase.ordinal, gate.unmetCriteria);
    }

    const locked = this.sources.catalogue.lockApproved();
    for (const criterion of phase.criteria) {
      const computed = gate.unmetCriteria.find((entry) => entry.id === criterion.id);
      criterion.satisfied = computed === undefined;
    }
    phase.status = "closed";
    phase.closed_at = new Date().toISOString();
    this.logger.info("phase closed", {
      phase: phase.ordinal,
      name: phase.name,
      locked: locked.length,
    });
    this.emit({ kind: "closed", phase: phase.ordinal });

    const next = this.phases.find((entry) => entry.ordinal === phase.ordinal + 1);
    if (next) {
      this.markOpen(next);
    }

    return {
      closed: snapshot(phase),
      opened: next ? snapshot(next) : null,
      locked,
    };
  }

  /**
   * Explicit override: reopening a phase needs a human `approve`. Later
   * phases return to pending and their manual criteria are cleared.
   */
  async reopenPhase(ordinal: number, reason: string): Promise<boolean> {
    const phase = this.require(ordinal);
    if (phase.status !== "closed") {
      throw new InvalidTransitionError(`phase ${ordinal}`, phase.status, "open");
    }

    const escalation = this.sources.escalations.raise({
      subject: { kind: "phase", phase: ordinal },
      reason: "PhaseReopen",
      positions: [{ role: asRoleId("controller"), statement: reason }],
      phase: ordinal,
    });
    const decision = await this.sources.escalations.awaitResolution(escalation.id);
    if (decision.outcome !== "approve") {
      this.logger.info("phase reopen declined", {
        phase: ordinal,
        escalationId: escalation.id,
        decision: decision.text,
      });
      return false;
    }

    for (const entry of this.phases) {
      if (entry.ordinal < ordinal) {
        continue;
      }
      entry.status = "pending";
      delete entry.opened_at;
      delete entry.closed_at;
      for (const criterion of entry.criteria) {
        criterion.satisfied = false;
        delete criterion.evidence;
      }
    }
    phase.status = "open";
    phase.opened_at = new Date().toISOString();

    this.logger.info("phase reopened", {
      phase: ordinal,
      escalationId: escalation.id,
      reason,
    });
    this.emit({ kind: "reopened", phase: ordinal, reason });
    return true;
  }

  private derive(phase: Phase, criterion: GateCriterion): GateCriterion {
    const ordinal = phase.ordinal;
    switch (criterion.source) {
      case "work-items-done": {
        const items = this.sources.items.list(ordinal);
        const done = items.filter((item) => item.status === "Done").length;
        return {
          ...criterion,
          satisfied: done === items.length,
          evidence: `${done} of ${items.length} work items done`,
        };
      }
      case "reviews-settled": {
        const active = this.sources.reviews.active(ordinal);
        return {
          ...criterion,
          satisfied: active.length === 0,
          evidence:
            active.length === 0
              ? "no proposal in review"
              : `in review: ${active.map((proposal) => proposal.id).join(", ")}`,
        };
      }
      case "catalogue-settled": {
        const unsettled = this.sources.catalogue.unsettled(ordinal);
        return {
          ...criterion,
          satisfied: unsettled.length === 0,
          evidence:
            unsettled.length === 0
              ? "no draft catalogue entries"
              : `unsettled: ${unsettled.join(", ")}`,
        };
      }
      case "no-open-escalations": {
        const open = this.sources.escalations.open(ordinal);
        return {
          ...criterion,
          satisfied: open.length === 0,
          evidence:
            open.length === 0
              ? "no pending escalations"
              : `pending: ${open.map((escalation) => escalation.id).join(", ")}`,
        };
      }
      case "manual":
        return { ...criterion };
    }
  }

  private markOpen(phase: Phase): void {
    phase.status = "open";
    phase.opened_at = new Date().toISOString();
    this.logger.info("phase opened", { phase: phase.ordinal, name: phase.name });
    this.emit({ kind: "opened", phase: phase.ordinal });
  }

  private emit(event: PhaseTransition): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  private find(ordinal: number): Phase | undefined {
    return this.phases.find((phase) => phase.ordinal === ordinal);
  }

  private require(ordinal: number): Phase {
    const phase = this.find(ordinal);
    if (!phase) {
      throw new NotFoundError("phase", String(ordinal));
    }
    return phase;
  }
}

/** Keeps the configured definition but the persisted progress. */
const mergeRestored = (fresh: Phase, previous: Phase): Phase => ({
  ...fresh,
  status: previous.status,
  criteria: fresh.criteria.map((criterion) => {
    const saved = previous.criteria.find((entry) => entry.id === criterion.id);
    return saved
      ? {
          ...criterion,
          satisfied: saved.satisfied,
          ...(saved.evidence !== undefined ? { evidence: saved.evidence } : {}),
        }
      : criterion;
  }),
  ...(previous.opened_at ? { opened_at: previous.opened_at } : {}),
  ...(previous.closed_at ? { closed_at: previous.closed_at } : {}),
});

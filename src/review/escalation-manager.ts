import { nanoid } from "nanoid";
import {
  EscalationResolvedError,
  NotFoundError,
  errorMessage,
} from "../core/errors";
import { snapshot } from "../core/immutable";
import type { EngineLogger } from "../core/logger";
import {
  type DisputePosition,
  type Escalation,
  type EscalationId,
  type EscalationReason,
  type EscalationSubject,
  type HumanDecision,
  type WorkItemId,
  asEscalationId,
} from "../core/types";

/**
 * Synchronous request/response hook to whoever makes human decisions. The
 * engine blocks only the affected item while the promise is outstanding;
 * there is no timeout.
 */
export interface HumanDecisionPort {
  requestDecision(escalation: Escalation): Promise<HumanDecision>;
}

export interface ItemBlocker {
  block(itemId: WorkItemId, escalationId: EscalationId): void;
  unblock(itemId: WorkItemId, escalationId: EscalationId): void;
}

export interface RaiseInput {
  subject: EscalationSubject;
  reason: EscalationReason;
  positions: DisputePosition[];
  itemId?: WorkItemId;
  phase: number;
}

export class EscalationManager {
  private readonly escalations = new Map<EscalationId, Escalation>();
  private readonly waiters = new Map<
    EscalationId,
    Array<(decision: HumanDecision) => void>
  >();
  private blocker: ItemBlocker | undefined;

  constructor(
    private readonly logger: EngineLogger,
    private readonly humans?: HumanDecisionPort,
  ) {}

  bindBlocker(blocker: ItemBlocker): void {
    this.blocker = blocker;
  }

  raise(input: RaiseInput): Escalation {
    const escalation: Escalation = {
      id: asEscalationId(`esc-${nanoid(10)}`),
      subject: input.subject,
      reason: input.reason,
      positions: input.positions,
      phase: input.phase,
      resolution: "Pending",
      raised_at: new Date().toISOString(),
      ...(input.itemId ? { itemId: input.itemId } : {}),
    };

    this.escalations.set(escalation.id, escalation);
    if (escalation.itemId) {
      this.blocker?.block(escalation.itemId, escalation.id);
    }

    this.logger.warn("escalation raised", {
      escalationId: escalation.id,
      reason: escalation.reason,
      subject: escalation.subject,
      itemId: escalation.itemId,
    });

    if (this.humans) {
      this.consult(this.humans, escalation.id);
    }

    return snapshot(escalation);
  }

  resolve(id: EscalationId, decision: HumanDecision): Escalation {
    return this.settle(id, decision);
  }

  /** Closes an escalation whose subject went away (a withdrawn proposal). */
  dismiss(id: EscalationId, reason: string): Escalation {
    return this.settle(id, { outcome: "reject", text: reason }, true);
  }

  awaitResolution(id: EscalationId): Promise<HumanDecision> {
    const escalation = this.require(id);
    if (escalation.decision) {
      return Promise.resolve(stripDismissed(escalation.decision));
    }

    return new Promise<HumanDecision>((resolve) => {
      const entries = this.waiters.get(id) ?? [];
      entries.push(resolve);
      this.waiters.set(id, entries);
    });
  }

  get(id: EscalationId): Escalation | undefined {
    const escalation = this.escalations.get(id);
    return escalation ? snapshot(escalation) : undefined;
  }

  list(): Escalation[] {
    return [...this.escalations.values()].map((entry) => snapshot(entry));
  }

  open(phase?: number): Escalation[] {
    return this.list().filter(
      (entry) =>
        entry.resolution === "Pending" &&
        (phase === undefined || entry.phase === phase),
    );
  }

  private settle(
    id: EscalationId,
    decision: HumanDecision,
    dismissed = false,
  ): Escalation {
    const escalation = this.require(id);
    if (escalation.resolution === "Resolved") {
      throw new EscalationResolvedError(id);
    }

    escalation.resolution = "Resolved";
    escalation.decision = dismissed ? { ...decision, dismissed } : decision;
    escalation.resolved_at = new Date().toISOString();
    if (escalation.itemId) {
      this.blocker?.unblock(escalation.itemId, escalation.id);
    }

    this.logger.info(dismissed ? "escalation dismissed" : "escalation resolved", {
      escalationId: id,
      outcome: decision.outcome,
      decidedBy: decision.decidedBy,
    });

    const waiters = this.waiters.get(id) ?? [];
    this.waiters.delete(id);
    for (const waiter of waiters) {
      waiter(decision);
    }

    return snapshot(escalation);
  }

  private consult(humans: HumanDecisionPort, id: EscalationId): void {
    const escalation = this.require(id);
    void humans.requestDecision(snapshot(escalation)).then(
      (decision) => {
        if (this.require(id).resolution === "Pending") {
          this.resolve(id, decision);
        }
      },
      (error: unknown) => {
        this.logger.error("human decision request failed", {
          escalationId: id,
          error: errorMessage(error),
        });
      },
    );
  }

  private require(id: EscalationId): Escalation {
    const escalation = this.escalations.get(id);
    if (!escalation) {
      throw new NotFoundError("escalation", id);
    }
    return escalation;
  }
}

const stripDismissed = (
  decision: HumanDecision & { dismissed?: boolean },
): HumanDecision => ({
  outcome: decision.outcome,
  text: decision.text,
  ...(decision.decidedBy ? { decidedBy: decision.decidedBy } : {}),
});

import { nanoid } from "nanoid";
import {
  DuplicateSubmissionError,
  EngineError,
  InvalidTransitionError,
  NotFoundError,
  errorMessage,
} from "../core/errors";
import { snapshot } from "../core/immutable";
import type { EngineLogger } from "../core/logger";
import {
  type CatalogueTarget,
  type ChangeKind,
  type ChangeProposal,
  type EscalationId,
  type ProposalId,
  type RoleId,
  type WorkItem,
  type WorkItemDescriptor,
  type WorkItemId,
  type WorkItemStatus,
  asEntryId,
  asProposalId,
  asRoleId,
  asWorkItemId,
} from "../core/types";
import type { ReviewOutcome } from "../review/review-coordinator";

export interface ProposalReviewer {
  submit(proposal: ChangeProposal): Promise<ReviewOutcome>;
}

export interface PhaseGuard {
  has(phase: number): boolean;
  isOpen(phase: number): boolean;
}

export interface ProposalDraft {
  proposer: string;
  payload: unknown;
  /** Defaults to "additive". */
  changeKind?: ChangeKind;
  target?: { entryId: string; content: string };
  snapshots?: { before?: string; after?: string };
}

export interface Submission {
  proposal: ChangeProposal;
  outcome: Promise<ReviewOutcome>;
}

const VALID_TRANSITIONS: Record<WorkItemStatus, WorkItemStatus[]> = {
  Pending: ["InProgress", "Blocked"],
  InProgress: ["UnderReview", "Pending", "Blocked"],
  UnderReview: ["Done", "Pending", "Blocked"],
  Done: ["InProgress", "Blocked"],
  Blocked: ["Pending", "InProgress", "UnderReview", "Done"],
};

/**
 * Sole owner of work-item status. Other components request transitions
 * through `markDone`, `returnToPending`, `block` and `unblock`.
 */
export class TaskRouter {
  private readonly items = new Map<WorkItemId, WorkItem>();
  private readonly listeners: Array<(item: WorkItem) => void> = [];
  private reviewer: ProposalReviewer | undefined;
  private phases: PhaseGuard | undefined;

  constructor(private readonly logger: EngineLogger) {}

  bind(deps: { reviewer: ProposalReviewer; phases: PhaseGuard }): void {
    this.reviewer = deps.reviewer;
    this.phases = deps.phases;
  }

  /**
   * Reloads persisted items. Review sessions and escalations do not survive a
   * restart, so anything that was waiting on one returns to Pending.
   */
  restore(items: WorkItem[]): void {
    for (const saved of items) {
      const item: WorkItem = { ...saved };
      if (item.status === "UnderReview" || item.status === "Blocked") {
        this.logger.warn("work item review lost on restart", {
          itemId: item.id,
          status: item.status,
          proposalId: item.activeProposal,
        });
        item.status = "Pending";
        delete item.activeProposal;
        delete item.blockedBy;
        delete item.blockedFrom;
        delete item.role;
      }
      this.items.set(item.id, item);
    }
  }

  onChange(listener: (item: WorkItem) => void): void {
    this.listeners.push(listener);
  }

  ingest(descriptors: WorkItemDescriptor[]): WorkItem[] {
    const seen = new Set<string>();
    for (const descriptor of descriptors) {
      if (this.items.has(asWorkItemId(descriptor.id)) || seen.has(descriptor.id)) {
        throw new DuplicateSubmissionError(descriptor.id, "was already ingested");
      }
      if (this.phases && !this.phases.has(descriptor.phase)) {
        throw new NotFoundError("phase", String(descriptor.phase));
      }
      seen.add(descriptor.id);
    }

    const now = new Date().toISOString();
    return descriptors.map((descriptor) => {
      const item: WorkItem = {
        id: asWorkItemId(descriptor.id),
        phase: descriptor.phase,
        status: "Pending",
        metadata: descriptor.metadata ?? {},
        updated_at: now,
      };
      this.items.set(item.id, item);
      this.logger.info("work item ingested", {
        itemId: item.id,
        phase: item.phase,
      });
      this.emit(item);
      return snapshot(item);
    });
  }

  assign(itemId: WorkItemId, role: RoleId): WorkItem {
    const item = this.require(itemId);
    if (item.status === "UnderReview" || item.status === "Blocked") {
      throw new DuplicateSubmissionError(
        itemId,
        `already has active proposal ${item.activeProposal ?? "(unknown)"}`,
      );
    }
    if (this.phases && !this.phases.isOpen(item.phase)) {
      throw new InvalidTransitionError(
        `work item ${itemId} (phase ${item.phase} is not open)`,
        item.status,
        "InProgress",
      );
    }

    item.role = role;
    this.transition(item, "InProgress", { role });
    return snapshot(item);
  }

  complete(itemId: WorkItemId, draft: ProposalDraft): Submission {
    const item = this.require(itemId);
    if (item.status === "UnderReview" || item.status === "Blocked") {
      throw new DuplicateSubmissionError(
        itemId,
        `already has active proposal ${item.activeProposal ?? "(unknown)"}`,
      );
    }
    if (item.status !== "InProgress") {
      throw new InvalidTransitionError(`work item ${itemId}`, item.status, "UnderReview");
    }

    const reviewer = this.reviewer;
    if (!reviewer) {
      throw new EngineError(
        "InvalidTransition",
        "Task router has no review coordinator bound",
      );
    }

    const now = new Date().toISOString();
    const proposal: ChangeProposal = {
      id: asProposalId(`prop-${nanoid(10)}`),
      itemId,
      phase: item.phase,
      proposer: asRoleId(draft.proposer),
      payload: draft.payload,
      changeKind: draft.changeKind ?? "additive",
      status: "Proposed",
      revision: 1,
      created_at: now,
      updated_at: now,
      ...(draft.target ? { target: toTarget(draft.target) } : {}),
      ...(draft.snapshots ? { snapshots: draft.snapshots } : {}),
    };

    item.activeProposal = proposal.id;
    this.transition(item, "UnderReview", { proposalId: proposal.id });

    const outcome = reviewer.submit(proposal);
    void outcome.catch((error: unknown) => {
      this.logger.error("review failed", {
        proposalId: proposal.id,
        itemId,
        error: errorMessage(error),
      });
    });

    return { proposal: snapshot(proposal), outcome };
  }

  status(itemId: WorkItemId): WorkItemStatus {
    return this.require(itemId).status;
  }

  get(itemId: WorkItemId): WorkItem | undefined {
    const item = this.items.get(itemId);
    return item ? snapshot(item) : undefined;
  }

  list(phase?: number): WorkItem[] {
    return [...this.items.values()]
      .filter((item) => phase === undefined || item.phase === phase)
      .map((item) => snapshot(item));
  }

  markDone(itemId: WorkItemId, proposalId: ProposalId): void {
    const item = this.require(itemId);
    this.requireActive(item, proposalId);
    delete item.activeProposal;
    this.transition(item, "Done", { proposalId });
  }

  returnToPending(itemId: WorkItemId, reason: string): void {
    const item = this.require(itemId);
    delete item.activeProposal;
    delete item.role;
    this.transition(item, "Pending", { reason });
  }

  block(itemId: WorkItemId, escalationId: EscalationId): void {
    const item = this.require(itemId);
    if (item.status === "Blocked") {
      // the status to restore stays the one from before the first escalation
      item.blockedBy = escalationId;
      return;
    }
    item.blockedFrom = item.status;
    item.blockedBy = escalationId;
    this.transition(item, "Blocked", { escalationId });
  }

  unblock(itemId: WorkItemId, escalationId: EscalationId): void {
    const item = this.items.get(itemId);
    if (!item || item.status !== "Blocked" || item.blockedBy !== escalationId) {
      return;
    }
    const next = item.blockedFrom ?? "Pending";
    delete item.blockedFrom;
    delete item.blockedBy;
    this.transition(item, next, { escalationId });
  }

  private requireActive(item: WorkItem, proposalId: ProposalId): void {
    if (item.activeProposal !== proposalId) {
      throw new InvalidTransitionError(
        `work item ${item.id} (active proposal is ${item.activeProposal ?? "none"}, not ${proposalId})`,
        item.status,
        "Done",
      );
    }
  }

  private transition(
    item: WorkItem,
    to: WorkItemStatus,
    extra: Record<string, unknown>,
  ): void {
    const from = item.status;
    if (from !== to && !VALID_TRANSITIONS[from].includes(to)) {
      throw new InvalidTransitionError(`work item ${item.id}`, from, to);
    }

    item.status = to;
    item.updated_at = new Date().toISOString();
    this.logger.info("work item status changed", {
      itemId: item.id,
      from,
      to,
      ...extra,
    });
    this.emit(item);
  }

  private emit(item: WorkItem): void {
    const copy = snapshot(item);
    for (const listener of this.listeners) {
      listener(copy);
    }
  }

  private require(itemId: WorkItemId): WorkItem {
    const item = this.items.get(itemId);
    if (!item) {
      throw new NotFoundError("work item", itemId);
    }
    return item;
  }
}

const toTarget = (target: {
  entryId: string;
  content: string;
}): CatalogueTarget => ({
  entryId: asEntryId(target.entryId),
  content: target.content,
});

import {
  CatalogueLockViolationError,
  ConsensusDeadlockError,
  InvalidTransitionError,
  NotFoundError,
  errorMessage,
} from "../core/errors";
import { snapshot } from "../core/immutable";
import type { EngineLogger } from "../core/logger";
import {
  type CatalogueRef,
  type ChangeKind,
  type ChangeProposal,
  type ChronicleDraft,
  type DebatePosition,
  type DebateRound,
  type DisputePosition,
  type EscalationId,
  type EscalationReason,
  type EvidenceRef,
  type HumanDecision,
  type ProposalId,
  type ProposalStatus,
  type ResolutionPath,
  type ReviewVote,
  type RoleId,
  type SafetyConcern,
  type Verdict,
  type WorkItemId,
  asEntryId,
  asProposalId,
  asRoleId,
} from "../core/types";
import type { CatalogueStore, ChangeClass } from "../ledger/catalogue-store";
import { type ChronicleStore, missingFinalVotes } from "../ledger/chronicle-store";
import type { ReviewPolicy } from "../project/config";
import type { WorkerPool } from "../routing/worker-pool";
import {
  type ConflictResolver,
  type ResolutionOption,
  decideConflict,
} from "./conflict-resolver";
import type { EscalationManager } from "./escalation-manager";
import type { ReviewerChannel } from "./review-inbox";
import { ReviewCancelledError, ReviewSession } from "./review-session";

export const MAX_DEBATE_ROUNDS = 2;

export interface ReviewOutcome {
  proposalId: ProposalId;
  itemId: WorkItemId;
  status: "Committed" | "Rejected" | "Withdrawn";
  resolvedBy?: ResolutionPath;
  decision: string;
  /** Chronicle sequence number, when the outcome was recorded. */
  seq?: number;
  rounds: number;
  debateRounds: number;
  escalations: EscalationId[];
}

export interface ItemTransitions {
  markDone(itemId: WorkItemId, proposalId: ProposalId): void;
  returnToPending(itemId: WorkItemId, reason: string): void;
}

export interface ReviewerLookup {
  requiredReviewerRoles(phase: number): RoleId[];
  safetyPriority(phase: number): SafetyConcern;
}

export interface ReviewCoordinatorDeps {
  items: ItemTransitions;
  catalogue: CatalogueStore;
  chronicle: ChronicleStore;
  escalations: EscalationManager;
  phases: ReviewerLookup;
  channel: ReviewerChannel;
  policy: ReviewPolicy;
  logger: EngineLogger;
  resolver?: ConflictResolver;
  /** Caps reviews running at once; a review waiting on a human holds no slot. */
  pool?: WorkerPool;
}

export interface VoteInput {
  proposalId: string;
  role: string;
  round: number;
  verdict: Verdict;
  rationale: string;
}

export interface PositionInput {
  proposalId: string;
  role: string;
  statement: string;
  evidence: EvidenceRef[];
}

export interface RevisionInput {
  proposalId: string;
  role: string;
  payload: unknown;
  changeKind?: ChangeKind;
  target?: { entryId: string; content: string };
  snapshots?: { before?: string; after?: string };
}

export type ReviewReceipt =
  | { status: "recorded" | "overwritten" }
  | { status: "refused"; reason: string };

export interface ReviewTranscript {
  proposal: ChangeProposal;
  requiredRoles: RoleId[];
  round: number;
  openRound: number | null;
  votes: ReviewVote[];
  debate: DebateRound[];
  escalations: EscalationId[];
}

type Conclusion =
  | {
      kind: "consensus";
      via: ResolutionPath;
      reason: string;
      /** Settled on keeping the current state: committed without a catalogue change. */
      retain?: boolean;
    }
  | { kind: "rejected"; via: ResolutionPath; reason: string };

type AppliedChange =
  | {
      kind: "applied";
      before: string | null;
      after: string | null;
      refs: CatalogueRef[];
    }
  | { kind: "rejected"; via: ResolutionPath; reason: string };

const PROPOSAL_TRANSITIONS: Record<ProposalStatus, ProposalStatus[]> = {
  Proposed: ["ReviewRound1", "Rejected", "Withdrawn"],
  ReviewRound1: ["Debate", "Consensus", "Rejected", "Withdrawn"],
  Debate: ["Consensus", "Rejected", "Withdrawn"],
  Consensus: ["Committed", "Rejected"],
  Committed: [],
  Rejected: [],
  Withdrawn: [],
};

const TERMINAL: ProposalStatus[] = ["Committed", "Rejected", "Withdrawn"];

const changeClass = (kind: ChangeKind): ChangeClass => {
  switch (kind) {
    case "clerical":
      return "clerical";
    case "removal":
      return "deletion";
    case "additive":
    case "behavioral":
      return "behavioral";
  }
};

const backoff = (policy: ReviewPolicy, attempt: number): number =>
  Math.round(policy.backoffMs * policy.backoffFactor ** attempt);

/**
 * Runs the review protocol for each submitted proposal: voting rounds,
 * bounded debate, revisions, tie-break and escalation, then the commit into
 * the catalogue and the chronicle.
 */
export class ReviewCoordinator {
  private readonly sessions = new Map<ProposalId, ReviewSession>();
  private readonly logger: EngineLogger;
  private readonly resolver: ConflictResolver;

  constructor(private readonly deps: ReviewCoordinatorDeps) {
    this.logger = deps.logger.child({ component: "review" });
    this.resolver = deps.resolver ?? decideConflict;
  }

  /**
   * Registers the proposal at once, so it can be withdrawn or listed while it
   * still waits for a worker slot, then runs the review.
   */
  async submit(proposal: ChangeProposal): Promise<ReviewOutcome> {
    const requiredRoles = this.deps.phases.requiredReviewerRoles(proposal.phase);
    const session = new ReviewSession({ ...proposal }, [...requiredRoles]);
    this.sessions.set(proposal.id, session);

    try {
      await this.admit(session);
      this.logger.info("review started", {
        proposalId: proposal.id,
        itemId: proposal.itemId,
        requiredRoles,
      });
      const conclusion = await this.runProtocol(session);
      return await this.conclude(session, conclusion);
    } catch (error) {
      if (error instanceof ReviewCancelledError) {
        return this.outcome(
          session,
          undefined,
          `withdrawn: ${session.withdrawReason ?? "no reason given"}`,
        );
      }
      this.abandon(session, error);
      throw error;
    } finally {
      this.yieldSlot(session);
      this.deps.channel.retract(proposal.id);
    }
  }

  castVote(input: VoteInput): ReviewReceipt {
    const session = this.sessions.get(asProposalId(input.proposalId));
    if (!session || TERMINAL.includes(session.proposal.status)) {
      return this.refuse(input.proposalId, `no review in progress for ${input.proposalId}`);
    }

    const role = asRoleId(input.role);
    if (!session.requiredRoles.includes(role)) {
      return this.refuse(input.proposalId, `${role} is not a required reviewer`);
    }
    if (session.openRound !== input.round) {
      return this.refuse(input.proposalId, `round ${input.round} is not open`);
    }

    const replaced = session.recordVote({
      role,
      proposalId: session.proposal.id,
      round: input.round,
      verdict: input.verdict,
      rationale: input.rationale,
      cast_at: new Date().toISOString(),
    });
    this.logger.info("vote recorded", {
      proposalId: session.proposal.id,
      role,
      round: input.round,
      verdict: input.verdict,
      overwritten: replaced,
    });
    return { status: replaced ? "overwritten" : "recorded" };
  }

  postPosition(input: PositionInput): ReviewReceipt {
    const session = this.sessions.get(asProposalId(input.proposalId));
    const debate = session?.openDebate;
    if (!session || !debate) {
      return this.refuse(input.proposalId, "no debate round is open");
    }

    const role = asRoleId(input.role);
    if (!session.requiredRoles.includes(role)) {
      return this.refuse(input.proposalId, `${role} is not a required reviewer`);
    }
    if (input.evidence.length === 0) {
      return this.refuse(
        input.proposalId,
        "a position must cite at least one evidence reference",
      );
    }

    const replaced = debate.positions.has(role);
    debate.positions.set(role, {
      role,
      statement: input.statement,
      evidence: input.evidence.map((ref) => ({ ...ref })),
      posted_at: new Date().toISOString(),
    });
    session.changed();
    this.logger.info("debate position posted", {
      proposalId: session.proposal.id,
      role,
      debateRound: debate.number,
    });
    return { status: replaced ? "overwritten" : "recorded" };
  }

  revise(input: RevisionInput): ReviewReceipt {
    const session = this.sessions.get(asProposalId(input.proposalId));
    if (!session || TERMINAL.includes(session.proposal.status)) {
      return this.refuse(input.proposalId, `no review in progress for ${input.proposalId}`);
    }
    if (asRoleId(input.role) !== session.proposal.proposer) {
      return this.refuse(input.proposalId, "only the proposer may revise");
    }
    if (!session.revisionWanted && !session.openDebate) {
      return this.refuse(input.proposalId, "no revision is being requested");
    }

    const proposal = session.proposal;
    proposal.payload = input.payload;
    proposal.revision += 1;
    proposal.updated_at = new Date().toISOString();
    if (input.changeKind) {
      proposal.changeKind = input.changeKind;
    }
    if (input.target) {
      proposal.target = {
        entryId: asEntryId(input.target.entryId),
        content: input.target.content,
      };
    }
    if (input.snapshots) {
      proposal.snapshots = { ...input.snapshots };
    }
    session.revisionWanted = false;
    session.changed();

    this.logger.info("proposal revised", {
      proposalId: proposal.id,
      revision: proposal.revision,
    });
    return { status: "recorded" };
  }

  withdraw(proposalId: ProposalId, reason: string): ChangeProposal {
    const session = this.require(proposalId);
    const from = session.proposal.status;
    if (from === "Consensus" || TERMINAL.includes(from)) {
      throw new InvalidTransitionError(`proposal ${proposalId}`, from, "Withdrawn");
    }

    this.setStatus(session, "Withdrawn");
    session.withdrawReason = reason;
    session.discard();
    session.openRound = null;
    session.revisionWanted = false;

    const escalation = session.activeEscalation;
    if (
      escalation &&
      this.deps.escalations.get(escalation)?.resolution === "Pending"
    ) {
      this.deps.escalations.dismiss(escalation, `proposal withdrawn: ${reason}`);
    }
    session.cancel();
    this.deps.items.returnToPending(
      session.proposal.itemId,
      `proposal ${proposalId} withdrawn: ${reason}`,
    );

    this.logger.info("proposal withdrawn", { proposalId, reason });
    return snapshot(session.proposal);
  }

  get(proposalId: ProposalId): ChangeProposal | undefined {
    const session = this.sessions.get(proposalId);
    return session ? snapshot(session.proposal) : undefined;
  }

  transcript(proposalId: ProposalId): ReviewTranscript | undefined {
    const session = this.sessions.get(proposalId);
    if (!session) {
      return undefined;
    }
    return snapshot({
      proposal: session.proposal,
      requiredRoles: session.requiredRoles,
      round: session.round,
      openRound: session.openRound,
      votes: session.allVotes(),
      debate: session.debate,
      escalations: session.escalations,
    });
  }

  /** Proposals still under review, optionally limited to one phase. */
  active(phase?: number): ChangeProposal[] {
    return [...this.sessions.values()]
      .filter(
        (session) =>
          !TERMINAL.includes(session.proposal.status) &&
          (phase === undefined || session.proposal.phase === phase),
      )
      .map((session) => snapshot(session.proposal));
  }

  private async runProtocol(session: ReviewSession): Promise<Conclusion> {
    let revisions = 0;
    this.openRound(session);

    for (;;) {
      const round = session.round;
      const missedVotes = await this.gather(session, {
        reason: "MissingVote",
        outstanding: () => session.missingVoters(round),
        notify: (role, attempt) =>
          this.deps.channel.notify({
            kind: "vote",
            proposalId: session.proposal.id,
            role,
            round,
            attempt,
            proposal: snapshot(session.proposal),
          }),
        statement: `no vote cast for round ${round}`,
      });
      session.openRound = null;
      if (missedVotes) {
        return { kind: "rejected", via: "human", reason: missedVotes.text };
      }

      const votes = session.roundVotes(round);
      if (votes.every((vote) => vote.verdict === "Approved")) {
        return {
          kind: "consensus",
          via: "vote",
          reason: `all ${votes.length} required reviewers approved in round ${round}`,
        };
      }

      const objections = votes.filter((vote) => vote.verdict === "Objection");
      if (objections.length > 0) {
        if (session.debateRounds >= MAX_DEBATE_ROUNDS) {
          const settled = await this.arbitrate(session, votes);
          if (settled) {
            return settled;
          }
          // a human asked for another vote; debate stays exhausted
          this.openRound(session);
          continue;
        }
        const debated = await this.debate(session, objections);
        if (debated) {
          return debated;
        }
        this.openRound(session);
        continue;
      }

      const requests = votes.filter(
        (vote) => vote.verdict === "RequestedChange",
      );
      if (revisions >= this.deps.policy.maxRevisions) {
        const decision = await this.escalate(
          session,
          "RevisionLimit",
          requests.map((vote) => ({ role: vote.role, statement: vote.rationale })),
        );
        if (decision.outcome === "approve") {
          return { kind: "consensus", via: "human", reason: decision.text };
        }
        if (decision.outcome === "reject") {
          return { kind: "rejected", via: "human", reason: decision.text };
        }
        revisions = 0;
      }

      const unrevised = await this.awaitRevision(session, requests);
      if (unrevised) {
        return unrevised;
      }
      revisions += 1;
      this.openRound(session);
    }
  }

  /**
   * Notifies every outstanding role and waits for all of them, retrying with
   * exponential backoff. Once retries run out the item is escalated; a
   * `reject` decision is returned, anything else starts collection over.
   */
  private async gather(
    session: ReviewSession,
    request: {
      reason: Extract<
        EscalationReason,
        "MissingVote" | "MissingPosition" | "MissingRevision"
      >;
      outstanding: () => RoleId[];
      notify: (role: RoleId, attempt: number) => void;
      statement: string;
    },
  ): Promise<HumanDecision | null> {
    const { policy } = this.deps;
    let attempt = 0;

    for (;;) {
      const missing = request.outstanding();
      if (missing.length === 0) {
        return null;
      }

      for (const role of missing) {
        request.notify(role, attempt);
      }
      const complete = await session.waitUntil(
        () => request.outstanding().length === 0,
        policy.voteTimeoutMs,
      );
      if (complete) {
        return null;
      }

      if (attempt < policy.maxVoteRetries) {
        const delay = backoff(policy, attempt);
        this.logger.warn("reviewers overdue, retrying", {
          proposalId: session.proposal.id,
          reason: request.reason,
          missing: request.outstanding(),
          attempt: attempt + 1,
          delayMs: delay,
        });
        attempt += 1;
        await session.pause(delay);
        continue;
      }

      const decision = await this.escalate(
        session,
        request.reason,
        request
          .outstanding()
          .map((role) => ({ role, statement: request.statement })),
      );
      if (decision.outcome === "reject") {
        return decision;
      }
      attempt = 0;
    }
  }

  private async debate(
    session: ReviewSession,
    objections: ReviewVote[],
  ): Promise<Conclusion | null> {
    session.debateRounds += 1;
    const number = session.debateRounds;
    const open = { number, positions: new Map<RoleId, DebatePosition>() };
    session.openDebate = open;
    this.setStatus(session, "Debate");

    const missed = await this.gather(session, {
      reason: "MissingPosition",
      outstanding: () => session.missingPositions(),
      notify: (role, attempt) =>
        this.deps.channel.notify({
          kind: "position",
          proposalId: session.proposal.id,
          role,
          debateRound: number,
          attempt,
          objections,
        }),
      statement: `no position posted for debate round ${number}`,
    });

    session.debate.push({
      number,
      positions: session.requiredRoles.flatMap((role) => {
        const position = open.positions.get(role);
        return position ? [position] : [];
      }),
    });
    session.openDebate = null;

    if (missed) {
      return { kind: "rejected", via: "human", reason: missed.text };
    }
    return null;
  }

  private async awaitRevision(
    session: ReviewSession,
    requests: ReviewVote[],
  ): Promise<Conclusion | null> {
    const round = session.round;
    session.revisionWanted = true;
    const missed = await this.gather(session, {
      reason: "MissingRevision",
      outstanding: () =>
        session.revisionWanted ? [session.proposal.proposer] : [],
      notify: (role, attempt) =>
        this.deps.channel.notify({
          kind: "revision",
          proposalId: session.proposal.id,
          role,
          round,
          attempt,
          requests,
        }),
      statement: `no revision submitted after round ${round}`,
    });
    session.revisionWanted = false;

    if (missed) {
      return { kind: "rejected", via: "human", reason: missed.text };
    }
    return null;
  }

  /** Objections survived every debate round: the resolver or a human decides. */
  private async arbitrate(
    session: ReviewSession,
    votes: ReviewVote[],
  ): Promise<Conclusion | null> {
    const { proposal } = session;
    const latest = session.debate.at(-1);
    const positions: DisputePosition[] = (latest?.positions ?? []).map(
      (position) => ({
        role: position.role,
        statement: position.statement,
        evidence: position.evidence,
      }),
    );
    const options: ResolutionOption[] = [
      {
        id: "adopt",
        label: `adopt ${proposal.id} revision ${proposal.revision}`,
        changeKind: proposal.changeKind,
        favouredBy: votes
          .filter((vote) => vote.verdict === "Approved")
          .map((vote) => vote.role),
      },
      {
        id: "retain",
        label: "retain the current state",
        changeKind: "none",
        favouredBy: votes
          .filter((vote) => vote.verdict !== "Approved")
          .map((vote) => vote.role),
      },
    ];

    const decision = this.resolver({
      priority: this.deps.phases.safetyPriority(proposal.phase),
      options,
      positions,
    });
    this.logger.info("conflict resolver decided", {
      proposalId: proposal.id,
      decision,
    });

    if (decision.kind === "choose") {
      const reason = `${decision.optionId} (${decision.rule}): ${decision.rationale}`;
      return decision.optionId === "adopt"
        ? { kind: "consensus", via: "resolver", reason }
        : { kind: "consensus", via: "resolver", reason, retain: true };
    }

    const deadlock = new ConsensusDeadlockError(proposal.id, session.debateRounds);
    this.logger.warn(deadlock.message, {
      proposalId: proposal.id,
      rule: decision.rule,
      rationale: decision.rationale,
    });
    const human = await this.escalate(session, "ConsensusDeadlock", positions);
    if (human.outcome === "approve") {
      return { kind: "consensus", via: "human", reason: human.text };
    }
    if (human.outcome === "reject") {
      return { kind: "rejected", via: "human", reason: human.text };
    }
    return null;
  }

  private async escalate(
    session: ReviewSession,
    reason: EscalationReason,
    positions: DisputePosition[],
  ): Promise<HumanDecision> {
    const { proposal } = session;
    const escalation = this.deps.escalations.raise({
      subject: { kind: "proposal", proposalId: proposal.id },
      reason,
      positions,
      itemId: proposal.itemId,
      phase: proposal.phase,
    });
    session.escalations.push(escalation.id);
    session.activeEscalation = escalation.id;
    this.yieldSlot(session);

    let decision: HumanDecision;
    try {
      decision = await session.guard(
        this.deps.escalations.awaitResolution(escalation.id),
      );
    } finally {
      session.activeEscalation = undefined;
    }
    await this.admit(session);
    return decision;
  }

  /** Waits for a worker slot unless the session already holds one. */
  private async admit(session: ReviewSession): Promise<void> {
    const { pool } = this.deps;
    if (!pool || session.slot) {
      return;
    }
    const { running, concurrency } = pool.stats();
    if (running >= concurrency) {
      this.logger.debug("review waiting for a worker", {
        proposalId: session.proposal.id,
        running,
      });
    }
    session.slot = await pool.acquire(session.signal);
    if (session.cancelled) {
      this.yieldSlot(session);
      throw new ReviewCancelledError(session.proposal.id);
    }
  }

  private yieldSlot(session: ReviewSession): void {
    const release = session.slot;
    session.slot = undefined;
    release?.();
  }

  private async conclude(
    session: ReviewSession,
    conclusion: Conclusion,
  ): Promise<ReviewOutcome> {
    if (session.cancelled) {
      throw new ReviewCancelledError(session.proposal.id);
    }
    if (conclusion.kind === "rejected") {
      return this.reject(session, conclusion);
    }

    const { proposal } = session;
    this.setStatus(session, "Consensus");
    const decision = `committed via ${conclusion.via}: ${conclusion.reason}`;
    const draft = this.draft(session, conclusion.via, decision);
    this.deps.chronicle.validate(draft);

    let change: AppliedChange;
    try {
      change = conclusion.retain
        ? this.retainedState(session)
        : await this.applyCatalogueChange(session, conclusion.via);
    } catch (error) {
      if (error instanceof CatalogueLockViolationError) {
        return this.reject(session, {
          kind: "rejected",
          via: conclusion.via,
          reason: error.message,
        });
      }
      throw error;
    }
    if (change.kind === "rejected") {
      return this.reject(session, {
        kind: "rejected",
        via: change.via,
        reason: change.reason,
      });
    }

    const seq = this.deps.chronicle.append({
      ...draft,
      before: change.before,
      after: change.after,
      catalogueRefs: change.refs,
      escalations: [...session.escalations],
    });
    this.deps.items.markDone(proposal.itemId, proposal.id);
    this.setStatus(session, "Committed");

    this.logger.info("proposal committed", {
      proposalId: proposal.id,
      seq,
      resolvedBy: conclusion.via,
    });
    return this.outcome(session, conclusion.via, decision, seq);
  }

  /** Records the rejection when the transcript is complete; the item returns to Pending. */
  private reject(session: ReviewSession, conclusion: Conclusion): ReviewOutcome {
    const { proposal } = session;
    this.setStatus(session, "Rejected");
    const decision = `rejected via ${conclusion.via}: ${conclusion.reason}`;
    const draft = this.draft(session, conclusion.via, decision);

    let seq: number | undefined;
    if (missingFinalVotes(draft).length === 0) {
      seq = this.deps.chronicle.append(draft);
    }
    this.deps.items.returnToPending(proposal.itemId, decision);

    this.logger.info("proposal rejected", {
      proposalId: proposal.id,
      seq,
      resolvedBy: conclusion.via,
      reason: conclusion.reason,
    });
    return this.outcome(session, conclusion.via, decision, seq);
  }

  private async applyCatalogueChange(
    session: ReviewSession,
    via: ResolutionPath,
  ): Promise<AppliedChange> {
    const { proposal } = session;
    const { catalogue } = this.deps;
    const target = proposal.target;
    if (!target) {
      return {
        kind: "applied",
        before: proposal.snapshots?.before ?? null,
        after: proposal.snapshots?.after ?? null,
        refs: [],
      };
    }

    const head = catalogue.get(target.entryId);
    if (!head) {
      if (proposal.changeKind === "removal") {
        return {
          kind: "rejected",
          via,
          reason: `catalogue entry ${target.entryId} does not exist`,
        };
      }
      const created = catalogue.propose({
        id: target.entryId,
        content: target.content,
        phase: proposal.phase,
      });
      const approved = catalogue.approve(target.entryId, created.version);
      return {
        kind: "applied",
        before: null,
        after: approved.content,
        refs: [{ entryId: approved.id, version: approved.version }],
      };
    }

    if (head.status !== "Locked") {
      if (proposal.changeKind === "removal") {
        const removed = catalogue.invalidate(
          target.entryId,
          `removed by ${proposal.id}`,
        );
        return {
          kind: "applied",
          before: head.content,
          after: null,
          refs: [{ entryId: removed.id, version: removed.version }],
        };
      }
      const next = catalogue.propose({
        id: target.entryId,
        content: target.content,
        phase: head.phase,
      });
      const approved = catalogue.approve(target.entryId, next.version);
      return {
        kind: "applied",
        before: head.content,
        after: approved.content,
        refs: [
          { entryId: head.id, version: head.version },
          { entryId: approved.id, version: approved.version },
        ],
      };
    }

    const requested = catalogue.requestChange(target.entryId, {
      kind: changeClass(proposal.changeKind),
      content: target.content,
      reason: `proposal ${proposal.id}`,
      requestedBy: proposal.proposer,
      expectedVersion: head.version,
      itemId: proposal.itemId,
      proposalId: proposal.id,
    });

    let decision = requested;
    if (requested.outcome === "escalated") {
      session.escalations.push(requested.escalation.id);
      this.yieldSlot(session);
      decision = await catalogue.awaitChange(requested.escalation.id);
      await this.admit(session);
    }

    switch (decision.outcome) {
      case "applied":
        return {
          kind: "applied",
          before: decision.previous.content,
          after: decision.entry.content,
          refs: [
            { entryId: decision.previous.id, version: decision.previous.version },
            { entryId: decision.entry.id, version: decision.entry.version },
          ],
        };
      case "rejected":
        return { kind: "rejected", via: "human", reason: decision.reason };
      case "escalated":
        return {
          kind: "rejected",
          via,
          reason: `change to ${target.entryId} is still awaiting a decision`,
        };
    }
  }

  /** The current state, recorded as both sides of a change that was not made. */
  private retainedState(session: ReviewSession): AppliedChange {
    const { proposal } = session;
    const target = proposal.target;
    if (!target) {
      const current = proposal.snapshots?.before ?? null;
      return { kind: "applied", before: current, after: current, refs: [] };
    }
    const head = this.deps.catalogue.get(target.entryId);
    if (!head) {
      return { kind: "applied", before: null, after: null, refs: [] };
    }
    return {
      kind: "applied",
      before: head.content,
      after: head.content,
      refs: [{ entryId: head.id, version: head.version }],
    };
  }

  private draft(
    session: ReviewSession,
    via: ResolutionPath,
    decision: string,
  ): ChronicleDraft {
    const { proposal } = session;
    return {
      proposalId: proposal.id,
      itemId: proposal.itemId,
      phase: proposal.phase,
      before: proposal.snapshots?.before ?? null,
      after: proposal.snapshots?.after ?? null,
      requiredRoles: [...session.requiredRoles],
      votes: session.allVotes(),
      debate: session.debate.map((round) => ({
        number: round.number,
        positions: [...round.positions],
      })),
      decision,
      resolvedBy: via,
      catalogueRefs: [],
      escalations: [...session.escalations],
    };
  }

  private outcome(
    session: ReviewSession,
    via: ResolutionPath | undefined,
    decision: string,
    seq?: number,
  ): ReviewOutcome {
    const { proposal } = session;
    const status = proposal.status;
    return {
      proposalId: proposal.id,
      itemId: proposal.itemId,
      status:
        status === "Committed" || status === "Rejected" ? status : "Withdrawn",
      decision,
      rounds: session.round,
      debateRounds: session.debate.length,
      escalations: [...session.escalations],
      ...(via ? { resolvedBy: via } : {}),
      ...(seq !== undefined ? { seq } : {}),
    };
  }

  /** An unexpected failure: the proposal is dropped and the item released. */
  private abandon(session: ReviewSession, error: unknown): void {
    const { proposal } = session;
    this.logger.error("review aborted", {
      proposalId: proposal.id,
      status: proposal.status,
      error: errorMessage(error),
    });
    if (TERMINAL.includes(proposal.status)) {
      return;
    }

    proposal.status = "Rejected";
    session.cancel();
    try {
      this.deps.items.returnToPending(
        proposal.itemId,
        `review of ${proposal.id} failed: ${errorMessage(error)}`,
      );
    } catch (releaseError) {
      this.logger.error("work item could not be released", {
        proposalId: proposal.id,
        itemId: proposal.itemId,
        error: errorMessage(releaseError),
      });
    }
  }

  private openRound(session: ReviewSession): void {
    session.round += 1;
    session.openRound = session.round;
    this.setStatus(session, session.debateRounds > 0 ? "Debate" : "ReviewRound1");
    this.logger.debug("voting round opened", {
      proposalId: session.proposal.id,
      round: session.round,
    });
  }

  private setStatus(session: ReviewSession, to: ProposalStatus): void {
    const { proposal } = session;
    const from = proposal.status;
    if (from === to) {
      return;
    }
    if (!PROPOSAL_TRANSITIONS[from].includes(to)) {
      throw new InvalidTransitionError(`proposal ${proposal.id}`, from, to);
    }
    proposal.status = to;
    proposal.updated_at = new Date().toISOString();
  }

  private refuse(proposalId: string, reason: string): ReviewReceipt {
    this.logger.warn("review input refused", { proposalId, reason });
    return { status: "refused", reason };
  }

  private require(proposalId: ProposalId): ReviewSession {
    const session = this.sessions.get(proposalId);
    if (!session) {
      throw new NotFoundError("proposal", proposalId);
    }
    return session;
  }
}

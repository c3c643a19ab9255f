import type {
  ChangeProposal,
  DebatePosition,
  DebateRound,
  EscalationId,
  ReviewVote,
  RoleId,
} from "../core/types";
import type { ReleaseSlot } from "../routing/worker-pool";

/** Raised inside a session's waits once its proposal is withdrawn. */
export class ReviewCancelledError extends Error {
  constructor(proposalId: string) {
    super(`Review of ${proposalId} was withdrawn`);
    this.name = "ReviewCancelledError";
  }
}

const voteKey = (role: RoleId, round: number): string => `${role}#${round}`;

/**
 * Mutable state of one proposal's review cycle. Only the coordinator holds a
 * reference; everything it hands out is copied first.
 */
export class ReviewSession {
  round = 0;
  openRound: number | null = null;
  debateRounds = 0;
  openDebate: { number: number; positions: Map<RoleId, DebatePosition> } | null =
    null;
  revisionWanted = false;
  activeEscalation: EscalationId | undefined;
  withdrawReason: string | undefined;
  /** Held worker-pool slot; given back while the review waits on a human. */
  slot: ReleaseSlot | undefined;
  readonly escalations: EscalationId[] = [];
  debate: DebateRound[] = [];

  private votes = new Map<string, ReviewVote>();
  private readonly waiters = new Set<() => void>();
  private readonly controller = new AbortController();

  constructor(
    readonly proposal: ChangeProposal,
    readonly requiredRoles: RoleId[],
  ) {}

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** Stores a vote; returns true when it replaced an earlier one. */
  recordVote(vote: ReviewVote): boolean {
    const key = voteKey(vote.role, vote.round);
    const replaced = this.votes.has(key);
    this.votes.set(key, vote);
    this.changed();
    return replaced;
  }

  roundVotes(round: number): ReviewVote[] {
    return this.requiredRoles.flatMap((role) => {
      const vote = this.votes.get(voteKey(role, round));
      return vote ? [vote] : [];
    });
  }

  allVotes(): ReviewVote[] {
    return [...this.votes.values()].sort(
      (a, b) => a.round - b.round || a.role.localeCompare(b.role),
    );
  }

  missingVoters(round: number): RoleId[] {
    return this.requiredRoles.filter(
      (role) => !this.votes.has(voteKey(role, round)),
    );
  }

  missingPositions(): RoleId[] {
    const debate = this.openDebate;
    if (!debate) {
      return [];
    }
    return this.requiredRoles.filter((role) => !debate.positions.has(role));
  }

  discard(): void {
    this.votes = new Map();
    this.debate = [];
    this.openDebate = null;
  }

  changed(): void {
    for (const waiter of [...this.waiters]) {
      waiter();
    }
  }

  cancel(): void {
    this.controller.abort(new ReviewCancelledError(this.proposal.id));
  }

  /** Resolves true once `check` holds, false when `timeoutMs` passes first. */
  waitUntil(check: () => boolean, timeoutMs: number): Promise<boolean> {
    return new Promise<boolean>((resolve, reject) => {
      const signal = this.controller.signal;
      if (signal.aborted) {
        reject(new ReviewCancelledError(this.proposal.id));
        return;
      }
      if (check()) {
        resolve(true);
        return;
      }

      const cleanup = (): void => {
        clearTimeout(timer);
        this.waiters.delete(onChange);
        signal.removeEventListener("abort", onAbort);
      };
      const onChange = (): void => {
        if (check()) {
          cleanup();
          resolve(true);
        }
      };
      const onAbort = (): void => {
        cleanup();
        reject(new ReviewCancelledError(this.proposal.id));
      };
      const timer = setTimeout(() => {
        cleanup();
        resolve(false);
      }, timeoutMs);

      this.waiters.add(onChange);
      signal.addEventListener("abort", onAbort, { once: true });
    });
  }

  pause(ms: number): Promise<void> {
    return this.waitUntil(() => false, ms).then(() => undefined);
  }

  /** Settles like `source`, or rejects as soon as the session is withdrawn. */
  guard<T>(source: Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const signal = this.controller.signal;
      if (signal.aborted) {
        reject(new ReviewCancelledError(this.proposal.id));
        return;
      }

      const onAbort = (): void => {
        reject(new ReviewCancelledError(this.proposal.id));
      };
      signal.addEventListener("abort", onAbort, { once: true });
      void source.then(
        (value) => {
          signal.removeEventListener("abort", onAbort);
          if (signal.aborted) {
            reject(new ReviewCancelledError(this.proposal.id));
            return;
          }
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener("abort", onAbort);
          reject(error);
        },
      );
    });
  }
}

import { IncompleteReviewRecordError, errorMessage } from "../core/errors";
import { snapshot } from "../core/immutable";
import type { Journal } from "../core/journal";
import type { EngineLogger } from "../core/logger";
import type {
  ChronicleDraft,
  ChronicleRecord,
  ProposalId,
  RoleId,
} from "../core/types";

export type ChronicleEvent = { type: "append"; record: ChronicleRecord };

export interface ChronicleQuery {
  phase?: number;
  /** Inclusive ISO-8601 lower bound on `recorded_at`. */
  from?: string;
  /** Inclusive ISO-8601 upper bound on `recorded_at`; a bare date covers that whole UTC day. */
  to?: string;
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 86_400_000;

const upperBound = (to: string): number =>
  DATE_ONLY.test(to) ? Date.parse(to) + DAY_MS - 1 : Date.parse(to);

/** Roles with no vote in the last round the draft's transcript reached. */
export const missingFinalVotes = (draft: ChronicleDraft): RoleId[] => {
  const votes = draft.votes.filter(
    (vote) => vote.proposalId === draft.proposalId,
  );
  if (votes.length === 0) {
    return [...draft.requiredRoles];
  }

  const finalRound = Math.max(...votes.map((vote) => vote.round));
  return draft.requiredRoles.filter(
    (role) =>
      !votes.some((vote) => vote.role === role && vote.round === finalRound),
  );
};

export class ChronicleStore {
  private readonly records: ChronicleRecord[] = [];
  private nextSeq = 1;

  constructor(
    private readonly logger: EngineLogger,
    private readonly journal?: Journal<ChronicleEvent>,
  ) {}

  load(): number {
    if (!this.journal) {
      return 0;
    }

    return this.journal.replay((event) => {
      if (event.record.seq !== this.nextSeq) {
        throw new Error(
          `Chronicle journal out of sequence: expected ${this.nextSeq}, found ${event.record.seq}`,
        );
      }
      this.records.push(snapshot(event.record));
      this.nextSeq += 1;
    });
  }

  validate(draft: ChronicleDraft): void {
    if (draft.requiredRoles.length === 0) {
      throw new IncompleteReviewRecordError(
        draft.proposalId,
        [],
        "no required reviewer roles recorded",
      );
    }

    const missing = missingFinalVotes(draft);
    if (missing.length > 0) {
      throw new IncompleteReviewRecordError(
        draft.proposalId,
        missing,
        `missing votes from ${missing.join(", ")}`,
      );
    }

    if (draft.decision.trim().length === 0) {
      throw new IncompleteReviewRecordError(
        draft.proposalId,
        [],
        "decision is empty",
      );
    }
  }

  /**
   * Appends one record under the global sequence counter. The record is
   * validated and written to the journal before the counter moves, so a
   * rejected or failed append leaves no trace and no gap.
   */
  append(draft: ChronicleDraft): number {
    try {
      this.validate(draft);
    } catch (error) {
      this.logger.error("chronicle append rejected", {
        proposalId: draft.proposalId,
        error: errorMessage(error),
      });
      throw error;
    }

    const record = snapshot<ChronicleRecord>({
      ...draft,
      seq: this.nextSeq,
      recorded_at: new Date().toISOString(),
    });
    this.journal?.append({ type: "append", record });
    this.records.push(record);
    this.nextSeq += 1;

    this.logger.info("chronicle record appended", {
      seq: record.seq,
      proposalId: record.proposalId,
      decision: record.decision,
    });
    return record.seq;
  }

  get(seq: number): ChronicleRecord | undefined {
    return this.records[seq - 1];
  }

  findByProposal(proposalId: ProposalId): ChronicleRecord[] {
    return this.records.filter((record) => record.proposalId === proposalId);
  }

  list(query: ChronicleQuery = {}): ChronicleRecord[] {
    const from = query.from === undefined ? -Infinity : Date.parse(query.from);
    const to = query.to === undefined ? Infinity : upperBound(query.to);
    return this.records.filter((record) => {
      const recordedAt = Date.parse(record.recorded_at);
      return (
        (query.phase === undefined || record.phase === query.phase) &&
        recordedAt >= from &&
        recordedAt <= to
      );
    });
  }

  get size(): number {
    return this.records.length;
  }
}

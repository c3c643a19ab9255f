import {
  CatalogueLockViolationError,
  InvalidTransitionError,
  NotFoundError,
  VersionConflictError,
  errorMessage,
} from "../core/errors";
import type { Journal } from "../core/journal";
import type { EngineLogger } from "../core/logger";
import type {
  CatalogueEntry,
  EntryId,
  EntryStatus,
  Escalation,
  EscalationId,
  HumanDecision,
  ProposalId,
  RoleId,
  WorkItemId,
} from "../core/types";
import type { EscalationManager } from "../review/escalation-manager";

export type CatalogueEvent =
  | { type: "version"; entry: CatalogueEntry; supersededNote?: string }
  | {
      type: "status";
      entryId: EntryId;
      version: number;
      status: EntryStatus;
      note?: string;
    };

export type ChangeClass = "clerical" | "behavioral" | "deletion";

export interface ChangeRequest {
  kind: ChangeClass;
  content?: string;
  reason: string;
  requestedBy: RoleId;
  /** Head version the caller read; a mismatch fails the compare-and-swap. */
  expectedVersion?: number;
  itemId?: WorkItemId;
  proposalId?: ProposalId;
}

export type ChangeDecision =
  | { outcome: "applied"; entry: CatalogueEntry; previous: CatalogueEntry }
  | { outcome: "escalated"; escalation: Escalation }
  | { outcome: "rejected"; reason: string; entry: CatalogueEntry };

export interface CatalogueNotice {
  kind: "clerical-correction" | "behavioral-change";
  entryId: EntryId;
  fromVersion: number;
  toVersion: number;
  note: string;
}

interface PendingChange {
  entryId: EntryId;
  baseVersion: number;
  request: ChangeRequest;
  settled: Promise<ChangeDecision>;
}

const HEAD_TRANSITIONS: Record<EntryStatus, EntryStatus[]> = {
  Draft: ["UnderReview", "Approved", "Invalid"],
  UnderReview: ["Draft", "Approved", "Invalid"],
  Approved: ["UnderReview", "Locked", "Invalid"],
  Locked: [],
  Superseded: [],
  Invalid: [],
};

export const versionRef = (entryId: EntryId, version: number): string =>
  `${entryId}@v${version}`;

const freezeEntry = (entry: CatalogueEntry): CatalogueEntry =>
  Object.freeze({ ...entry });

export const diffNote = (before: string, after: string): string => {
  const beforeLines = before.split("\n");
  const afterLines = after.split("\n");
  const removed = beforeLines.filter((line) => !afterLines.includes(line));
  const added = afterLines.filter((line) => !beforeLines.includes(line));
  return `-${removed.length}/+${added.length} lines`;
};

/**
 * Versioned rule catalogue. Every content change allocates a new version
 * linked to its predecessor through `supersedes`; nothing is rewritten in
 * place and nothing is removed. Content of a Locked version never changes.
 */
export class CatalogueStore {
  private readonly chains = new Map<EntryId, CatalogueEntry[]>();
  private readonly pending = new Map<EscalationId, PendingChange>();
  private readonly listeners: Array<(notice: CatalogueNotice) => void> = [];

  constructor(
    private readonly escalations: EscalationManager,
    private readonly logger: EngineLogger,
    private readonly journal?: Journal<CatalogueEvent>,
  ) {}

  load(): number {
    if (!this.journal) {
      return 0;
    }

    return this.journal.replay((event) => {
      switch (event.type) {
        case "version":
          this.pushVersion(event.entry, event.supersededNote);
          break;
        case "status": {
          const entry = this.chains
            .get(event.entryId)
            ?.find((candidate) => candidate.version === event.version);
          if (!entry) {
            throw new NotFoundError(
              "catalogue version in journal",
              versionRef(event.entryId, event.version),
            );
          }
          entry.status = event.status;
          if (event.note !== undefined) {
            entry.note = event.note;
          }
          break;
        }
      }
    });
  }

  onNotice(listener: (notice: CatalogueNotice) => void): void {
    this.listeners.push(listener);
  }

  propose(input: { id: EntryId; content: string; phase: number }): CatalogueEntry {
    const head = this.chains.get(input.id)?.at(-1);
    if (head?.status === "Locked") {
      throw new CatalogueLockViolationError(
        input.id,
        "direct mutation of a locked entry",
      );
    }

    return this.appendVersion(input.id, head?.version ?? 0, {
      content: input.content,
      status: "Draft",
      phase: input.phase,
    });
  }

  markUnderReview(id: EntryId, expectedVersion?: number): CatalogueEntry {
    return this.transitionHead(id, "UnderReview", expectedVersion);
  }

  approve(id: EntryId, expectedVersion?: number): CatalogueEntry {
    return this.transitionHead(id, "Approved", expectedVersion);
  }

  invalidate(id: EntryId, reason: string): CatalogueEntry {
    const head = this.requireHead(id);
    if (head.status === "Locked") {
      throw new CatalogueLockViolationError(id, "invalidating a locked entry");
    }
    return this.transitionHead(id, "Invalid", head.version, reason);
  }

  /** Approved → Locked. Locking a Locked head is a no-op. */
  lock(id: EntryId): CatalogueEntry {
    const head = this.requireHead(id);
    if (head.status === "Locked") {
      return freezeEntry(head);
    }
    return this.transitionHead(id, "Locked", head.version);
  }

  lockApproved(): CatalogueEntry[] {
    return [...this.chains.keys()]
      .filter((id) => this.requireHead(id).status === "Approved")
      .map((id) => this.lock(id));
  }

  requestChange(id: EntryId, request: ChangeRequest): ChangeDecision {
    const head = this.requireHead(id);
    if (
      request.expectedVersion !== undefined &&
      request.expectedVersion !== head.version
    ) {
      throw new VersionConflictError(id, request.expectedVersion, head.version);
    }

    if (request.kind === "deletion") {
      this.logger.error("catalogue deletion refused", {
        entryId: id,
        requestedBy: request.requestedBy,
      });
      throw new CatalogueLockViolationError(id, "deletion");
    }

    const content = request.content ?? head.content;
    const baseVersion = head.version;
    if (head.status !== "Locked") {
      const entry = this.appendVersion(
        id,
        baseVersion,
        { content, status: head.status, phase: head.phase, note: request.reason },
        `replaced before lock: ${request.reason}`,
      );
      return {
        outcome: "applied",
        entry,
        previous: this.requireVersion(id, baseVersion),
      };
    }

    if (request.kind === "clerical") {
      const note = `clerical correction (${request.reason}): ${diffNote(head.content, content)}`;
      const entry = this.appendVersion(
        id,
        baseVersion,
        { content, status: "Locked", phase: head.phase, note: request.reason },
        note,
      );
      this.emit({
        kind: "clerical-correction",
        entryId: id,
        fromVersion: baseVersion,
        toVersion: entry.version,
        note,
      });
      return {
        outcome: "applied",
        entry,
        previous: this.requireVersion(id, baseVersion),
      };
    }

    const escalation = this.escalations.raise({
      subject: { kind: "catalogue", entryId: id, version: head.version },
      reason: "BehavioralChange",
      positions: [{ role: request.requestedBy, statement: request.reason }],
      phase: head.phase,
      ...(request.itemId ? { itemId: request.itemId } : {}),
    });

    const settled = this.escalations
      .awaitResolution(escalation.id)
      .then((decision) => this.settleChange(escalation.id, decision))
      .catch((error: unknown): ChangeDecision => {
        this.logger.error("behavioral change could not be applied", {
          entryId: id,
          escalationId: escalation.id,
          error: errorMessage(error),
        });
        return {
          outcome: "rejected",
          reason: errorMessage(error),
          entry: freezeEntry(this.requireHead(id)),
        };
      });

    this.pending.set(escalation.id, {
      entryId: id,
      baseVersion: head.version,
      request: { ...request, content },
      settled,
    });
    return { outcome: "escalated", escalation };
  }

  awaitChange(escalationId: EscalationId): Promise<ChangeDecision> {
    const change = this.pending.get(escalationId);
    if (!change) {
      throw new NotFoundError("pending catalogue change", escalationId);
    }
    return change.settled;
  }

  get(id: EntryId): CatalogueEntry | undefined {
    const head = this.chains.get(id)?.at(-1);
    return head ? freezeEntry(head) : undefined;
  }

  getVersion(id: EntryId, version: number): CatalogueEntry | undefined {
    const entry = this.chains
      .get(id)
      ?.find((candidate) => candidate.version === version);
    return entry ? freezeEntry(entry) : undefined;
  }

  history(id: EntryId): CatalogueEntry[] {
    return (this.chains.get(id) ?? []).map(freezeEntry);
  }

  list(): CatalogueEntry[] {
    return [...this.chains.keys()]
      .sort()
      .map((id) => freezeEntry(this.requireHead(id)));
  }

  unsettled(phase: number): EntryId[] {
    return this.list()
      .filter(
        (entry) =>
          entry.phase === phase &&
          (entry.status === "Draft" || entry.status === "UnderReview"),
      )
      .map((entry) => entry.id);
  }

  private settleChange(
    escalationId: EscalationId,
    decision: HumanDecision,
  ): ChangeDecision {
    const change = this.pending.get(escalationId);
    if (!change) {
      throw new NotFoundError("pending catalogue change", escalationId);
    }
    this.pending.delete(escalationId);

    const head = this.requireHead(change.entryId);
    if (decision.outcome !== "approve") {
      this.logger.info("behavioral change declined", {
        entryId: change.entryId,
        escalationId,
      });
      return { outcome: "rejected", reason: decision.text, entry: freezeEntry(head) };
    }

    if (head.version !== change.baseVersion) {
      this.logger.warn("behavioral change is stale", {
        entryId: change.entryId,
        baseVersion: change.baseVersion,
        headVersion: head.version,
      });
      return {
        outcome: "rejected",
        reason: `entry moved from v${change.baseVersion} to v${head.version} while the change awaited a decision`,
        entry: freezeEntry(head),
      };
    }

    const content = change.request.content ?? head.content;
    const note = `behavioral change approved (${decision.text}): ${diffNote(head.content, content)}`;
    const entry = this.appendVersion(
      change.entryId,
      head.version,
      { content, status: "Locked", phase: head.phase, note: change.request.reason },
      note,
    );
    this.emit({
      kind: "behavioral-change",
      entryId: change.entryId,
      fromVersion: head.version,
      toVersion: entry.version,
      note,
    });
    return {
      outcome: "applied",
      entry,
      previous: this.requireVersion(change.entryId, head.version),
    };
  }

  private transitionHead(
    id: EntryId,
    status: EntryStatus,
    expectedVersion?: number,
    note?: string,
  ): CatalogueEntry {
    const head = this.requireHead(id);
    if (expectedVersion !== undefined && expectedVersion !== head.version) {
      throw new VersionConflictError(id, expectedVersion, head.version);
    }
    if (!HEAD_TRANSITIONS[head.status].includes(status)) {
      throw new InvalidTransitionError(
        `catalogue entry ${versionRef(id, head.version)}`,
        head.status,
        status,
      );
    }

    this.journal?.append({
      type: "status",
      entryId: id,
      version: head.version,
      status,
      ...(note !== undefined ? { note } : {}),
    });
    head.status = status;
    if (note !== undefined) {
      head.note = note;
    }

    this.logger.info("catalogue entry status changed", {
      entryId: id,
      version: head.version,
      status,
    });
    return freezeEntry(head);
  }

  /** Compare-and-swap on the chain head: `expectedHead` 0 means "no entry yet". */
  private appendVersion(
    id: EntryId,
    expectedHead: number,
    fields: Pick<CatalogueEntry, "content" | "status" | "phase"> & {
      note?: string;
    },
    supersededNote?: string,
  ): CatalogueEntry {
    const previous = this.chains.get(id)?.at(-1);
    const actual = previous?.version ?? 0;
    if (actual !== expectedHead) {
      throw new VersionConflictError(id, expectedHead, actual);
    }

    const entry: CatalogueEntry = {
      id,
      version: actual + 1,
      status: fields.status,
      content: fields.content,
      supersedes: previous ? versionRef(id, previous.version) : null,
      phase: fields.phase,
      created_at: new Date().toISOString(),
      ...(fields.note !== undefined ? { note: fields.note } : {}),
    };

    this.journal?.append({
      type: "version",
      entry,
      ...(supersededNote !== undefined ? { supersededNote } : {}),
    });
    this.pushVersion(entry, supersededNote);

    this.logger.info("catalogue version created", {
      entryId: id,
      version: entry.version,
      status: entry.status,
      supersedes: entry.supersedes,
    });
    return freezeEntry(entry);
  }

  private pushVersion(entry: CatalogueEntry, supersededNote?: string): void {
    const chain = this.chains.get(entry.id) ?? [];
    const previous = chain.at(-1);
    if (previous) {
      previous.status = "Superseded";
      if (supersededNote !== undefined) {
        previous.note = supersededNote;
      }
    }
    chain.push({ ...entry });
    this.chains.set(entry.id, chain);
  }

  private emit(notice: CatalogueNotice): void {
    this.logger.info("catalogue notice", { ...notice });
    for (const listener of this.listeners) {
      listener(notice);
    }
  }

  private requireHead(id: EntryId): CatalogueEntry {
    const head = this.chains.get(id)?.at(-1);
    if (!head) {
      throw new NotFoundError("catalogue entry", id);
    }
    return head;
  }

  private requireVersion(id: EntryId, version: number): CatalogueEntry {
    const entry = this.getVersion(id, version);
    if (!entry) {
      throw new NotFoundError("catalogue version", versionRef(id, version));
    }
    return entry;
  }
}

export type Brand<T, B extends string> = T & { readonly __brand: B };

export type WorkItemId = Brand<string, "WorkItemId">;
export type ProposalId = Brand<string, "ProposalId">;
export type RoleId = Brand<string, "RoleId">;
export type EntryId = Brand<string, "EntryId">;
export type EscalationId = Brand<string, "EscalationId">;

export const asWorkItemId = (value: string): WorkItemId => value as WorkItemId;
export const asProposalId = (value: string): ProposalId => value as ProposalId;
export const asRoleId = (value: string): RoleId => value as RoleId;
export const asEntryId = (value: string): EntryId => value as EntryId;
export const asEscalationId = (value: string): EscalationId =>
  value as EscalationId;

export type SafetyConcern = "testability" | "fidelity" | "quality";

export type CriterionSource =
  | "manual"
  | "work-items-done"
  | "reviews-settled"
  | "catalogue-settled"
  | "no-open-escalations";

export interface CriterionDefinition {
  id: string;
  description: string;
  source: CriterionSource;
}

export interface PhaseDefinition {
  ordinal: number;
  name: string;
  /** Roles whose vote is required on every proposal raised in this phase. */
  reviewers: string[];
  safetyPriority: SafetyConcern;
  criteria: CriterionDefinition[];
}

export interface GateCriterion extends CriterionDefinition {
  satisfied: boolean;
  evidence?: string;
}

export type PhaseStatus = "pending" | "open" | "closed";

export interface Phase {
  ordinal: number;
  name: string;
  status: PhaseStatus;
  reviewers: RoleId[];
  safetyPriority: SafetyConcern;
  criteria: GateCriterion[];
  opened_at?: string;
  closed_at?: string;
}

export interface GateStatus {
  phase: number;
  satisfied: boolean;
  unmetCriteria: GateCriterion[];
  openEscalations: EscalationId[];
}

export type WorkItemStatus =
  | "Pending"
  | "InProgress"
  | "UnderReview"
  | "Done"
  | "Blocked";

export interface WorkItemDescriptor {
  id: string;
  phase: number;
  metadata?: Record<string, unknown>;
}

export interface WorkItem {
  id: WorkItemId;
  phase: number;
  status: WorkItemStatus;
  role?: RoleId;
  activeProposal?: ProposalId;
  blockedBy?: EscalationId;
  /** Status to return to once the blocking escalation is resolved. */
  blockedFrom?: WorkItemStatus;
  metadata: Record<string, unknown>;
  updated_at: string;
}

export type ChangeKind = "clerical" | "additive" | "behavioral" | "removal";

export type ProposalStatus =
  | "Proposed"
  | "ReviewRound1"
  | "Debate"
  | "Consensus"
  | "Rejected"
  | "Withdrawn"
  | "Committed";

export interface CatalogueTarget {
  entryId: EntryId;
  /** Content the entry should carry once the change is committed. */
  content: string;
}

export interface ChangeProposal {
  id: ProposalId;
  itemId: WorkItemId;
  phase: number;
  proposer: RoleId;
  payload: unknown;
  changeKind: ChangeKind;
  target?: CatalogueTarget;
  snapshots?: { before?: string; after?: string };
  status: ProposalStatus;
  revision: number;
  created_at: string;
  updated_at: string;
}

export type Verdict = "Approved" | "RequestedChange" | "Objection";

export interface ReviewVote {
  role: RoleId;
  proposalId: ProposalId;
  round: number;
  verdict: Verdict;
  rationale: string;
  cast_at: string;
}

export type EvidenceKind = "catalogue" | "decision" | "test" | "criterion";

export interface EvidenceRef {
  kind: EvidenceKind;
  ref: string;
  concern?: SafetyConcern;
}

export interface DebatePosition {
  role: RoleId;
  statement: string;
  evidence: EvidenceRef[];
  posted_at: string;
}

export interface DebateRound {
  number: number;
  positions: DebatePosition[];
}

export type EntryStatus =
  | "Draft"
  | "UnderReview"
  | "Approved"
  | "Locked"
  | "Superseded"
  | "Invalid";

export interface CatalogueEntry {
  id: EntryId;
  version: number;
  status: EntryStatus;
  content: string;
  /** Version reference (`<id>@v<n>`) of the entry this one replaced. */
  supersedes: string | null;
  phase: number;
  note?: string;
  created_at: string;
}

export interface CatalogueRef {
  entryId: EntryId;
  version: number;
}

export type ResolutionPath = "vote" | "resolver" | "human";

export interface ChronicleRecord {
  seq: number;
  proposalId: ProposalId;
  itemId: WorkItemId;
  phase: number;
  before: string | null;
  after: string | null;
  requiredRoles: RoleId[];
  votes: ReviewVote[];
  debate: DebateRound[];
  decision: string;
  resolvedBy: ResolutionPath;
  catalogueRefs: CatalogueRef[];
  escalations: EscalationId[];
  recorded_at: string;
}

export type ChronicleDraft = Omit<ChronicleRecord, "seq" | "recorded_at">;

export type EscalationSubject =
  | { kind: "proposal"; proposalId: ProposalId }
  | { kind: "catalogue"; entryId: EntryId; version: number }
  | { kind: "phase"; phase: number };

export type EscalationReason =
  | "MissingVote"
  | "MissingPosition"
  | "MissingRevision"
  | "RevisionLimit"
  | "ConsensusDeadlock"
  | "BehavioralChange"
  | "PhaseReopen";

export interface DisputePosition {
  role: RoleId;
  statement: string;
  evidence?: EvidenceRef[];
}

export type DecisionOutcome = "approve" | "reject" | "retry";

export interface HumanDecision {
  outcome: DecisionOutcome;
  text: string;
  decidedBy?: string;
}

export interface Escalation {
  id: EscalationId;
  subject: EscalationSubject;
  reason: EscalationReason;
  positions: DisputePosition[];
  itemId?: WorkItemId;
  phase: number;
  resolution: "Pending" | "Resolved";
  decision?: HumanDecision & { dismissed?: boolean };
  raised_at: string;
  resolved_at?: string;
}

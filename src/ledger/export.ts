import { type Static, Type } from "@sinclair/typebox";
import type { CatalogueEntry, ChronicleRecord } from "../core/types";

export const CatalogueExportSchema = Type.Object({
  id: Type.String(),
  version: Type.Integer({ minimum: 1 }),
  status: Type.Union([
    Type.Literal("Draft"),
    Type.Literal("UnderReview"),
    Type.Literal("Approved"),
    Type.Literal("Locked"),
    Type.Literal("Superseded"),
    Type.Literal("Invalid"),
  ]),
  content: Type.String(),
  supersedes: Type.Union([Type.String(), Type.Null()]),
});

export const ChronicleExportSchema = Type.Object({
  seq: Type.Integer({ minimum: 1 }),
  proposalId: Type.String(),
  before: Type.Union([Type.String(), Type.Null()]),
  after: Type.Union([Type.String(), Type.Null()]),
  votes: Type.Array(
    Type.Object({
      role: Type.String(),
      round: Type.Integer({ minimum: 1 }),
      verdict: Type.Union([
        Type.Literal("Approved"),
        Type.Literal("RequestedChange"),
        Type.Literal("Objection"),
      ]),
      rationale: Type.String(),
    }),
  ),
  decision: Type.String(),
});

export type CatalogueExport = Static<typeof CatalogueExportSchema>;
export type ChronicleExport = Static<typeof ChronicleExportSchema>;

export const toCatalogueExport = (entry: CatalogueEntry): CatalogueExport => ({
  id: entry.id,
  version: entry.version,
  status: entry.status,
  content: entry.content,
  supersedes: entry.supersedes,
});

export const toChronicleExport = (record: ChronicleRecord): ChronicleExport => ({
  seq: record.seq,
  proposalId: record.proposalId,
  before: record.before,
  after: record.after,
  votes: record.votes.map((vote) => ({
    role: vote.role,
    round: vote.round,
    verdict: vote.verdict,
    rationale: vote.rationale,
  })),
  decision: record.decision,
});

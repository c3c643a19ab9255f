import { describe, expect, it } from "vitest";
import {
  type WorkItem,
  asProposalId,
  asWorkItemId,
} from "../src/core/types";
import {
  type StatusSnapshot,
  buildGateLines,
  buildOverviewLines,
  buildReportLines,
  buildStatusReport,
} from "../src/observability/report";
import { createEngine } from "./helpers";

const item = (id: string, status: WorkItem["status"], proposal?: string): WorkItem => ({
  id: asWorkItemId(id),
  phase: 1,
  status,
  metadata: {},
  updated_at: "2026-01-01T00:00:00Z",
  ...(proposal ? { activeProposal: asProposalId(proposal) } : {}),
});

const snapshot = (overrides: Partial<StatusSnapshot> = {}): StatusSnapshot => ({
  phases: [],
  gate: null,
  items: [item("w-1", "Pending"), item("w-2", "UnderReview", "prop-1")],
  reviews: [],
  escalations: [],
  catalogueEntries: 3,
  chronicleRecords: 2,
  ...overrides,
});

describe("report", () => {
  it("summarises the engine in key=value lines", () => {
    expect(buildOverviewLines(snapshot())).toEqual([
      "phase=complete",
      "gate=n/a",
      "items=2",
      "done=0",
      "blocked=0",
      "in_review=0",
      "open_escalations=0",
      "catalogue_entries=3",
      "chronicle_records=2",
    ]);
  });

  it("lists each unmet criterion with its evidence", () => {
    expect(buildGateLines(null)).toEqual(["All phases closed"]);
    expect(
      buildGateLines({ phase: 1, satisfied: true, unmetCriteria: [], openEscalations: [] }),
    ).toEqual(["phase 1: all criteria met"]);
    expect(
      buildGateLines({
        phase: 1,
        satisfied: false,
        unmetCriteria: [
          { id: "signed-off", description: "Draft signed off", source: "manual", satisfied: false },
          {
            id: "work-items-done",
            description: "Every work item is Done",
            source: "work-items-done",
            satisfied: false,
            evidence: "1 of 2 work items done",
          },
        ],
        openEscalations: [],
      }),
    ).toEqual([
      "unmet signed-off: Draft signed off",
      "unmet work-items-done: 1 of 2 work items done",
    ]);
  });

  it("renders items as an aligned table", () => {
    expect(buildReportLines(snapshot(), "items")).toEqual([
      "=== items ===",
      "count=2",
      "id  | phase | status      | proposal",
      "----+-------+-------------+---------",
      "w-1 | 1     | Pending     | -",
      "w-2 | 1     | UnderReview | prop-1",
    ]);
  });

  it("marks empty tables", () => {
    expect(buildReportLines(snapshot(), "escalations")).toEqual([
      "=== escalations ===",
      "open=0",
      "(empty)",
    ]);
  });

  it("reports a live engine", () => {
    const engine = createEngine();
    engine.ingest([{ id: "w-1", phase: 1 }]);

    const lines = buildStatusReport(engine).split("\n");

    expect(lines.slice(0, 12)).toEqual([
      "=== overview ===",
      "phase=1:draft",
      "gate=open",
      "items=1",
      "done=0",
      "blocked=0",
      "in_review=0",
      "open_escalations=0",
      "catalogue_entries=0",
      "chronicle_records=0",
      "=== gate ===",
      "unmet signed-off: Draft signed off",
    ]);
    expect(lines[12]).toBe("unmet work-items-done: 0 of 1 work items done");
  });
});

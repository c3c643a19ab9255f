import type { PhaseGateEngine } from "../core/engine";
import type {
  ChangeProposal,
  Escalation,
  GateStatus,
  Phase,
  WorkItem,
} from "../core/types";

export type ReportSection = "overview" | "phases" | "items" | "reviews" | "escalations";

export interface StatusSnapshot {
  phases: Phase[];
  gate: GateStatus | null;
  items: WorkItem[];
  reviews: ChangeProposal[];
  escalations: Escalation[];
  catalogueEntries: number;
  chronicleRecords: number;
}

export const buildOverviewLines = (snapshot: StatusSnapshot): string[] => {
  const current = snapshot.phases.find((phase) => phase.status === "open");
  const done = snapshot.items.filter((item) => item.status === "Done").length;
  const blocked = snapshot.items.filter((item) => item.status === "Blocked").length;
  return [
    `phase=${current ? `${current.ordinal}:${current.name}` : "complete"}`,
    `gate=${snapshot.gate ? (snapshot.gate.satisfied ? "satisfied" : "open") : "n/a"}`,
    `items=${snapshot.items.length}`,
    `done=${done}`,
    `blocked=${blocked}`,
    `in_review=${snapshot.reviews.length}`,
    `open_escalations=${snapshot.escalations.length}`,
    `catalogue_entries=${snapshot.catalogueEntries}`,
    `chronicle_records=${snapshot.chronicleRecords}`,
  ];
};

export const buildGateLines = (gate: GateStatus | null): string[] => {
  if (!gate) {
    return ["All phases closed"];
  }
  if (gate.satisfied) {
    return [`phase ${gate.phase}: all criteria met`];
  }
  return gate.unmetCriteria.map(
    (criterion) =>
      `unmet ${criterion.id}: ${criterion.evidence ?? criterion.description}`,
  );
};

const renderSection = (title: string, lines: string[]): string[] => [
  `=== ${title} ===`,
  ...(lines.length > 0 ? lines : ["(empty)"]),
];

const renderTable = (headers: string[], rows: string[][]): string[] => {
  if (rows.length === 0) {
    return ["(empty)"];
  }

  const widths = headers.map((header, index) =>
    Math.max(header.length, ...rows.map((row) => (row[index] ?? "").length)),
  );

  const formatRow = (values: string[]): string =>
    values
      .map((value, index) => value.padEnd(widths[index] ?? 0))
      .join(" | ")
      .trimEnd();

  return [
    formatRow(headers),
    widths.map((width) => "-".repeat(width)).join("-+-"),
    ...rows.map((row) => formatRow(row)),
  ];
};

export const buildReportLines = (
  snapshot: StatusSnapshot,
  section: ReportSection = "overview",
): string[] => {
  if (section === "overview") {
    return [
      ...renderSection("overview", buildOverviewLines(snapshot)),
      ...renderSection("gate", buildGateLines(snapshot.gate)),
    ];
  }

  if (section === "phases") {
    return [
      ...renderSection("phases", [`count=${snapshot.phases.length}`]),
      ...renderTable(
        ["#", "name", "status", "priority", "reviewers"],
        snapshot.phases.map((phase) => [
          `${phase.ordinal}`,
          phase.name,
          phase.status,
          phase.safetyPriority,
          phase.reviewers.join(","),
        ]),
      ),
    ];
  }

  if (section === "items") {
    return [
      ...renderSection("items", [`count=${snapshot.items.length}`]),
      ...renderTable(
        ["id", "phase", "status", "proposal"],
        snapshot.items.map((item) => [
          item.id,
          `${item.phase}`,
          item.status,
          item.activeProposal ?? "-",
        ]),
      ),
    ];
  }

  if (section === "reviews") {
    return [
      ...renderSection("reviews", [`active=${snapshot.reviews.length}`]),
      ...renderTable(
        ["proposal", "item", "status", "revision"],
        snapshot.reviews.map((proposal) => [
          proposal.id,
          proposal.itemId,
          proposal.status,
          `${proposal.revision}`,
        ]),
      ),
    ];
  }

  return [
    ...renderSection("escalations", [`open=${snapshot.escalations.length}`]),
    ...renderTable(
      ["id", "reason", "item", "raised"],
      snapshot.escalations.map((escalation) => [
        escalation.id,
        escalation.reason,
        escalation.itemId ?? "-",
        escalation.raised_at,
      ]),
    ),
  ];
};

export const snapshotEngine = (engine: PhaseGateEngine): StatusSnapshot => {
  const current = engine.phases.current();
  return {
    phases: engine.phases.list(),
    gate: current ? engine.gateStatus(current.ordinal) : null,
    items: engine.router.list(),
    reviews: engine.reviews.active(),
    escalations: engine.escalations.open(),
    catalogueEntries: engine.catalogue.list().length,
    chronicleRecords: engine.chronicle.size,
  };
};

/** Plain-text report of every section, one line per fact. */
export const buildStatusReport = (engine: PhaseGateEngine): string => {
  const snapshot = snapshotEngine(engine);
  const sections: ReportSection[] = ["overview", "phases", "items", "reviews", "escalations"];
  return sections
    .flatMap((section) => buildReportLines(snapshot, section))
    .join("\n");
};

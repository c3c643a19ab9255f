import { describe, expect, it } from "vitest";
import { type DisputePosition, asRoleId } from "../src/core/types";
import {
  type ResolutionOption,
  decideConflict,
} from "../src/review/conflict-resolver";

const architect = asRoleId("architect");
const tester = asRoleId("tester");

const options: ResolutionOption[] = [
  { id: "adopt", label: "adopt the proposal", changeKind: "behavioral", favouredBy: [architect] },
  { id: "retain", label: "retain the current state", changeKind: "none", favouredBy: [tester] },
];

const position = (
  role: typeof architect,
  concern?: "testability" | "fidelity" | "quality",
): DisputePosition => ({
  role,
  statement: "see evidence",
  evidence: [{ kind: "test", ref: "case-1", ...(concern ? { concern } : {}) }],
});

describe("decideConflict", () => {
  it("follows safety-priority evidence cited on one side only", () => {
    expect(
      decideConflict({
        priority: "fidelity",
        options,
        positions: [position(architect, "fidelity"), position(tester, "quality")],
      }),
    ).toEqual({
      kind: "choose",
      optionId: "adopt",
      rule: "safety-priority",
      rationale: 'fidelity evidence cited only in favour of "adopt the proposal"',
    });
  });

  it("defers when both sides cite the safety priority", () => {
    expect(
      decideConflict({
        priority: "fidelity",
        options,
        positions: [position(architect, "fidelity"), position(tester, "fidelity")],
      }),
    ).toEqual({
      kind: "defer",
      rule: "safety-conflict",
      rationale:
        'fidelity evidence cited for "adopt the proposal" and "retain the current state"',
    });
  });

  it("falls back to the option that changes the least", () => {
    expect(
      decideConflict({
        priority: "testability",
        options,
        positions: [position(architect), position(tester)],
      }),
    ).toEqual({
      kind: "choose",
      optionId: "retain",
      rule: "conservative",
      rationale: '"retain the current state" changes the least (none)',
    });
  });

  it("defers when the least-change options tie", () => {
    expect(
      decideConflict({
        priority: "quality",
        options: [
          { id: "a", label: "a", changeKind: "clerical", favouredBy: [architect] },
          { id: "b", label: "b", changeKind: "clerical", favouredBy: [tester] },
        ],
        positions: [],
      }),
    ).toEqual({
      kind: "defer",
      rule: "no-unique-conservative",
      rationale: "2 options tie at change rank 1",
    });
  });

  it("defers when there is nothing to choose from", () => {
    expect(decideConflict({ priority: "quality", options: [], positions: [] })).toMatchObject({
      kind: "defer",
      rule: "no-options",
    });
  });
});

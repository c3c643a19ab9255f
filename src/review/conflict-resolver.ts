import type {
  ChangeKind,
  DisputePosition,
  RoleId,
  SafetyConcern,
} from "../core/types";

/** Lower rank changes less existing behaviour or content. */
export const changeRank: Record<ChangeKind | "none", number> = {
  none: 0,
  clerical: 1,
  additive: 2,
  behavioral: 3,
  removal: 4,
};

export interface ResolutionOption {
  id: string;
  label: string;
  changeKind: ChangeKind | "none";
  favouredBy: RoleId[];
}

export interface ResolverInput {
  priority: SafetyConcern;
  options: ResolutionOption[];
  positions: DisputePosition[];
}

export type ResolverDecision =
  | {
      kind: "choose";
      optionId: string;
      rule: "safety-priority" | "conservative";
      rationale: string;
    }
  | {
      kind: "defer";
      rule: "safety-conflict" | "no-unique-conservative" | "no-options";
      rationale: string;
    };

export type ConflictResolver = (input: ResolverInput) => ResolverDecision;

/**
 * Binding tie-break for a dispute that survived every debate round.
 *
 * 1. Positions citing evidence tagged with the phase's safety priority decide,
 *    provided they all favour the same option. Citations on both sides are
 *    a safety conflict and are deferred.
 * 2. Otherwise the option with the strictly lowest change rank wins.
 * 3. Anything left is deferred to a human.
 */
export const decideConflict: ConflictResolver = (input) => {
  if (input.options.length === 0) {
    return {
      kind: "defer",
      rule: "no-options",
      rationale: "no options were put forward",
    };
  }

  const citing = new Set(
    input.positions
      .filter((position) =>
        (position.evidence ?? []).some(
          (evidence) => evidence.concern === input.priority,
        ),
      )
      .map((position) => position.role),
  );

  const backed = input.options.filter((option) =>
    option.favouredBy.some((role) => citing.has(role)),
  );

  const [onlyBacked] = backed;
  if (backed.length === 1 && onlyBacked) {
    return {
      kind: "choose",
      optionId: onlyBacked.id,
      rule: "safety-priority",
      rationale: `${input.priority} evidence cited only in favour of "${onlyBacked.label}"`,
    };
  }

  if (backed.length > 1) {
    return {
      kind: "defer",
      rule: "safety-conflict",
      rationale: `${input.priority} evidence cited for ${backed.map((o) => `"${o.label}"`).join(" and ")}`,
    };
  }

  const lowest = Math.min(
    ...input.options.map((option) => changeRank[option.changeKind]),
  );
  const candidates = input.options.filter(
    (option) => changeRank[option.changeKind] === lowest,
  );
  const [conservative] = candidates;
  if (candidates.length === 1 && conservative) {
    return {
      kind: "choose",
      optionId: conservative.id,
      rule: "conservative",
      rationale: `"${conservative.label}" changes the least (${conservative.changeKind})`,
    };
  }

  return {
    kind: "defer",
    rule: "no-unique-conservative",
    rationale: `${candidates.length} options tie at change rank ${lowest}`,
  };
};

import type {
  CriterionDefinition,
  CriterionSource,
  PhaseDefinition,
} from "./types";

export const definePhase = (phase: PhaseDefinition): PhaseDefinition => phase;

export const manual = (config: {
  id: string;
  description: string;
}): CriterionDefinition => ({
  id: config.id,
  description: config.description,
  source: "manual",
});

const derivedDescriptions: Record<
  Exclude<CriterionSource, "manual">,
  string
> = {
  "work-items-done": "Every work item assigned to the phase is Done",
  "reviews-settled": "No change proposal from the phase is still in review",
  "catalogue-settled":
    "No catalogue entry raised in the phase is still Draft or UnderReview",
  "no-open-escalations": "No escalation raised in the phase is pending",
};

/**
 * A criterion whose satisfaction the phase controller computes from the
 * router, the review coordinator, the catalogue or the escalation ledger.
 */
export const derived = (
  source: Exclude<CriterionSource, "manual">,
  description?: string,
): CriterionDefinition => ({
  id: source,
  description: description ?? derivedDescriptions[source],
  source,
});

export const standardCriteria = (): CriterionDefinition[] => [
  derived("work-items-done"),
  derived("reviews-settled"),
  derived("catalogue-settled"),
  derived("no-open-escalations"),
];

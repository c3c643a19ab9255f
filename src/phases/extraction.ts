import {
  definePhase,
  manual,
  standardCriteria,
} from "../core/phase-definition";

export default definePhase({
  ordinal: 2,
  name: "extraction",
  reviewers: ["architect", "domain-expert", "test-engineer"],
  safetyPriority: "fidelity",
  criteria: [
    manual({
      id: "rules-catalogued",
      description: "Every extracted rule has an Approved catalogue entry",
    }),
    ...standardCriteria(),
  ],
});

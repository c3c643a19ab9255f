import { definePhase, standardCriteria } from "../core/phase-definition";

export default definePhase({
  ordinal: 3,
  name: "implementation",
  reviewers: ["architect", "domain-expert", "test-engineer"],
  safetyPriority: "fidelity",
  criteria: standardCriteria(),
});

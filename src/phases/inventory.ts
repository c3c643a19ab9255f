import {
  definePhase,
  manual,
  standardCriteria,
} from "../core/phase-definition";

export default definePhase({
  ordinal: 1,
  name: "inventory",
  reviewers: ["architect", "test-engineer"],
  safetyPriority: "testability",
  criteria: [
    manual({
      id: "inventory-complete",
      description: "Every tracked component has a work item",
    }),
    ...standardCriteria(),
  ],
});

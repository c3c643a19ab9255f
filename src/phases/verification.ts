import {
  definePhase,
  manual,
  standardCriteria,
} from "../core/phase-definition";

export default definePhase({
  ordinal: 4,
  name: "verification",
  reviewers: ["architect", "quality-reviewer", "test-engineer"],
  safetyPriority: "quality",
  criteria: [
    manual({
      id: "acceptance-signed-off",
      description: "Acceptance run recorded against the locked catalogue",
    }),
    ...standardCriteria(),
  ],
});

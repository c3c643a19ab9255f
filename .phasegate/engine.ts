import { defineEngineConfig } from "../src/project/config";

export default defineEngineConfig({
  name: "phasegate",
  logLevel: "info",
  stateDir: ".phasegate/state",
  socketPath: ".phasegate/control.sock",
  review: {
    voteTimeoutMs: 120_000,
    maxRevisions: 2,
  },
  workers: { concurrency: 8 },
});

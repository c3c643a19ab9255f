import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import {
  CatalogueLockViolationError,
  InvalidTransitionError,
  NotFoundError,
  VersionConflictError,
} from "../src/core/errors";
import { Journal } from "../src/core/journal";
import { silentLogger } from "../src/core/logger";
import { asEntryId, asRoleId } from "../src/core/types";
import {
  type CatalogueEvent,
  type CatalogueNotice,
  CatalogueStore,
  diffNote,
} from "../src/ledger/catalogue-store";
import { EscalationManager } from "../src/review/escalation-manager";

const RULE = asEntryId("rule-1");
const architect = asRoleId("architect");

const createStore = (journal?: Journal<CatalogueEvent>) => {
  const escalations = new EscalationManager(silentLogger());
  const store = new CatalogueStore(escalations, silentLogger(), journal);
  return { escalations, store };
};

const lockedStore = () => {
  const setup = createStore();
  setup.store.propose({ id: RULE, content: "totals round half up", phase: 1 });
  setup.store.approve(RULE);
  setup.store.lock(RULE);
  return setup;
};

describe("CatalogueStore", () => {
  it("links every new version to its predecessor", () => {
    const { store } = createStore();
    store.propose({ id: RULE, content: "first", phase: 1 });
    const second = store.propose({ id: RULE, content: "second", phase: 1 });

    expect(second).toMatchObject({
      version: 2,
      status: "Draft",
      supersedes: "rule-1@v1",
    });
    expect(
      store.history(RULE).map((entry) => [entry.version, entry.status]),
    ).toEqual([
      [1, "Superseded"],
      [2, "Draft"],
    ]);
  });

  it("moves a head through review, approval and lock", () => {
    const { store } = createStore();
    store.propose({ id: RULE, content: "first", phase: 1 });

    expect(store.markUnderReview(RULE, 1).status).toBe("UnderReview");
    expect(store.approve(RULE, 1).status).toBe("Approved");
    expect(store.lock(RULE).status).toBe("Locked");
    expect(store.lock(RULE).status).toBe("Locked");
  });

  it("rejects transitions the lifecycle does not allow", () => {
    const { store } = createStore();
    store.propose({ id: RULE, content: "first", phase: 1 });

    expect(() => store.lock(RULE)).toThrow(InvalidTransitionError);
    expect(() => store.approve(RULE, 2)).toThrow(VersionConflictError);
    expect(() => store.approve(asEntryId("missing"))).toThrow(NotFoundError);
  });

  it("returns the same content for a locked entry on every read", () => {
    const { store } = lockedStore();
    const first = store.get(RULE);
    const second = store.getVersion(RULE, 1);

    expect(first).toEqual(second);
    expect(first?.content).toBe("totals round half up");
    expect(Object.isFrozen(first)).toBe(true);
  });

  it("refuses direct mutation, invalidation and deletion of a locked entry", () => {
    const { store } = lockedStore();

    expect(() => store.propose({ id: RULE, content: "other", phase: 1 })).toThrow(
      CatalogueLockViolationError,
    );
    expect(() => store.invalidate(RULE, "obsolete")).toThrow(
      CatalogueLockViolationError,
    );
    expect(() =>
      store.requestChange(RULE, {
        kind: "deletion",
        reason: "unused",
        requestedBy: architect,
      }),
    ).toThrow("Catalogue entry rule-1: deletion is not permitted");
    expect(store.get(RULE)?.version).toBe(1);
  });

  it("fails a change whose expected version is stale", () => {
    const { store } = lockedStore();

    expect(() =>
      store.requestChange(RULE, {
        kind: "clerical",
        content: "totals round half-up",
        reason: "hyphen",
        requestedBy: architect,
        expectedVersion: 3,
      }),
    ).toThrow("Catalogue entry rule-1 is at v1, expected v3");
  });

  it("applies a clerical correction to a locked entry as a new locked version", () => {
    const { store } = lockedStore();
    const notices: CatalogueNotice[] = [];
    store.onNotice((notice) => notices.push(notice));

    const decision = store.requestChange(RULE, {
      kind: "clerical",
      content: "totals round half-up",
      reason: "hyphen",
      requestedBy: architect,
      expectedVersion: 1,
    });

    expect(decision.outcome).toBe("applied");
    expect(store.get(RULE)).toMatchObject({
      version: 2,
      status: "Locked",
      content: "totals round half-up",
      supersedes: "rule-1@v1",
      note: "hyphen",
    });
    expect(store.getVersion(RULE, 1)).toMatchObject({
      status: "Superseded",
      content: "totals round half up",
      note: "clerical correction (hyphen): -1/+1 lines",
    });
    expect(notices).toEqual([
      {
        kind: "clerical-correction",
        entryId: RULE,
        fromVersion: 1,
        toVersion: 2,
        note: "clerical correction (hyphen): -1/+1 lines",
      },
    ]);
  });

  it("escalates a behavioural change to a locked entry and applies it on approval", async () => {
    const { escalations, store } = lockedStore();

    const decision = store.requestChange(RULE, {
      kind: "behavioral",
      content: "totals round half even",
      reason: "match the ledger",
      requestedBy: architect,
    });
    if (decision.outcome !== "escalated") {
      throw new Error(`expected an escalation, got ${decision.outcome}`);
    }
    expect(decision.escalation).toMatchObject({
      reason: "BehavioralChange",
      subject: { kind: "catalogue", entryId: RULE, version: 1 },
      positions: [{ role: architect, statement: "match the ledger" }],
    });
    expect(store.get(RULE)?.version).toBe(1);

    escalations.resolve(decision.escalation.id, { outcome: "approve", text: "agreed" });
    const settled = await store.awaitChange(decision.escalation.id);

    expect(settled.outcome).toBe("applied");
    expect(store.get(RULE)).toMatchObject({
      version: 2,
      status: "Locked",
      content: "totals round half even",
    });
    expect(store.getVersion(RULE, 1)?.note).toBe(
      "behavioral change approved (agreed): -1/+1 lines",
    );
  });

  it("keeps the locked version when a behavioural change is declined", async () => {
    const { escalations, store } = lockedStore();
    const decision = store.requestChange(RULE, {
      kind: "behavioral",
      content: "totals truncate",
      reason: "simpler",
      requestedBy: architect,
    });
    if (decision.outcome !== "escalated") {
      throw new Error(`expected an escalation, got ${decision.outcome}`);
    }

    escalations.resolve(decision.escalation.id, { outcome: "reject", text: "keep rounding" });
    const settled = await store.awaitChange(decision.escalation.id);

    expect(settled).toMatchObject({ outcome: "rejected", reason: "keep rounding" });
    expect(store.get(RULE)).toMatchObject({ version: 1, status: "Locked" });
  });

  it("declines an approved behavioural change when the entry moved meanwhile", async () => {
    const { escalations, store } = lockedStore();
    const decision = store.requestChange(RULE, {
      kind: "behavioral",
      content: "totals truncate",
      reason: "simpler",
      requestedBy: architect,
    });
    if (decision.outcome !== "escalated") {
      throw new Error(`expected an escalation, got ${decision.outcome}`);
    }
    store.requestChange(RULE, {
      kind: "clerical",
      content: "totals round half up.",
      reason: "punctuation",
      requestedBy: architect,
    });

    escalations.resolve(decision.escalation.id, { outcome: "approve", text: "fine" });
    const settled = await store.awaitChange(decision.escalation.id);

    expect(settled).toMatchObject({
      outcome: "rejected",
      reason: "entry moved from v1 to v2 while the change awaited a decision",
    });
    expect(store.get(RULE)?.content).toBe("totals round half up.");
  });

  it("replaces an unlocked entry directly and keeps its status", () => {
    const { store } = createStore();
    store.propose({ id: RULE, content: "first", phase: 1 });
    store.approve(RULE);

    const decision = store.requestChange(RULE, {
      kind: "behavioral",
      content: "second",
      reason: "rework",
      requestedBy: architect,
    });

    expect(decision.outcome).toBe("applied");
    expect(store.get(RULE)).toMatchObject({
      version: 2,
      status: "Approved",
      content: "second",
    });
    expect(store.getVersion(RULE, 1)?.note).toBe("replaced before lock: rework");
  });

  it("invalidates an unlocked entry", () => {
    const { store } = createStore();
    store.propose({ id: RULE, content: "first", phase: 1 });

    expect(store.invalidate(RULE, "duplicate")).toMatchObject({
      status: "Invalid",
      note: "duplicate",
    });
  });

  it("locks approved heads only and lists unsettled drafts by phase", () => {
    const { store } = createStore();
    store.propose({ id: asEntryId("a"), content: "a", phase: 1 });
    store.approve(asEntryId("a"));
    store.propose({ id: asEntryId("b"), content: "b", phase: 1 });
    store.propose({ id: asEntryId("c"), content: "c", phase: 2 });

    expect(store.unsettled(1)).toEqual(["b"]);
    expect(store.lockApproved().map((entry) => entry.id)).toEqual(["a"]);
    expect(store.list().map((entry) => [entry.id, entry.status])).toEqual([
      ["a", "Locked"],
      ["b", "Draft"],
      ["c", "Draft"],
    ]);
  });

  it("rebuilds every chain from its journal", () => {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), "phasegate-catalogue-"));
    const file = path.join(root, "catalogue.jsonl");
    const { store } = createStore(new Journal<CatalogueEvent>(file));
    store.propose({ id: RULE, content: "first", phase: 1 });
    store.approve(RULE);
    store.lock(RULE);
    store.requestChange(RULE, {
      kind: "clerical",
      content: "first.",
      reason: "period",
      requestedBy: architect,
    });

    const reloaded = createStore(new Journal<CatalogueEvent>(file)).store;
    expect(reloaded.load()).toBe(4);
    expect(reloaded.history(RULE)).toEqual(store.history(RULE));
  });
});

describe("diffNote", () => {
  it("counts removed and added lines", () => {
    expect(diffNote("a\nb\nc", "a\nc\nd\ne")).toBe("-1/+2 lines");
  });
});

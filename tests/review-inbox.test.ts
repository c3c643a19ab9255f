import { afterEach, describe, expect, it, vi } from "vitest";
import {
  type ChangeProposal,
  asProposalId,
  asRoleId,
  asWorkItemId,
} from "../src/core/types";
import { type ReviewRequest, ReviewInbox } from "../src/review/review-inbox";

const tester = asRoleId("tester");
const architect = asRoleId("architect");

const proposal: ChangeProposal = {
  id: asProposalId("p-1"),
  itemId: asWorkItemId("w-1"),
  phase: 1,
  proposer: architect,
  payload: {},
  changeKind: "additive",
  status: "ReviewRound1",
  revision: 1,
  created_at: "2026-01-01T00:00:00Z",
  updated_at: "2026-01-01T00:00:00Z",
};

const voteRequest = (role = tester, round = 1, attempt = 0, proposalId = "p-1"): ReviewRequest => ({
  kind: "vote",
  proposalId: asProposalId(proposalId),
  role,
  round,
  attempt,
  proposal,
});

describe("ReviewInbox", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("queues requests per role until acknowledged", () => {
    const inbox = new ReviewInbox();
    inbox.notify(voteRequest(tester));
    inbox.notify(voteRequest(architect));

    const [message] = inbox.pending(tester);
    expect(message?.request).toEqual(voteRequest(tester));
    expect(inbox.pending(architect)).toHaveLength(1);

    inbox.ack(message?.id ?? "");
    expect(inbox.pending(tester)).toEqual([]);
    expect(inbox.pending(architect)).toHaveLength(1);
  });

  it("replaces a re-sent request for the same round", () => {
    const inbox = new ReviewInbox();
    inbox.notify(voteRequest(tester, 1, 0));
    inbox.notify(voteRequest(tester, 1, 1));
    inbox.notify(voteRequest(tester, 2, 0));

    expect(
      inbox.pending(tester).map((message) =>
        message.request.kind === "vote" ? [message.request.round, message.request.attempt] : [],
      ),
    ).toEqual([
      [1, 1],
      [2, 0],
    ]);
  });

  it("drops every request of a retracted proposal", () => {
    const inbox = new ReviewInbox();
    inbox.notify(voteRequest(tester, 1, 0, "p-1"));
    inbox.notify(voteRequest(tester, 1, 0, "p-2"));
    inbox.notify(voteRequest(architect, 1, 0, "p-1"));

    inbox.retract(asProposalId("p-1"));

    expect(inbox.pending(tester).map((message) => message.request.proposalId)).toEqual(["p-2"]);
    expect(inbox.pending(architect)).toEqual([]);
  });

  it("answers a long poll as soon as a request arrives", async () => {
    const inbox = new ReviewInbox();
    const polled = inbox.longPoll(tester, 5_000);

    inbox.notify(voteRequest(tester));

    const messages = await polled;
    expect(messages.map((message) => message.request.role)).toEqual(["tester"]);
  });

  it("returns queued requests without waiting", async () => {
    const inbox = new ReviewInbox();
    inbox.notify(voteRequest(tester));

    await expect(inbox.longPoll(tester, 5_000)).resolves.toHaveLength(1);
  });

  it("returns an empty list when a long poll times out", async () => {
    vi.useFakeTimers();
    const inbox = new ReviewInbox();
    const polled = inbox.longPoll(tester, 1_000);

    await vi.advanceTimersByTimeAsync(1_000);

    await expect(polled).resolves.toEqual([]);
    inbox.notify(voteRequest(tester));
    expect(inbox.pending(tester)).toHaveLength(1);
  });
});

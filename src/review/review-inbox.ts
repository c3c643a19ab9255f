import { nanoid } from "nanoid";
import type { ChangeProposal, ProposalId, ReviewVote, RoleId } from "../core/types";

export type ReviewRequest =
  | {
      kind: "vote";
      proposalId: ProposalId;
      role: RoleId;
      round: number;
      attempt: number;
      proposal: ChangeProposal;
    }
  | {
      kind: "position";
      proposalId: ProposalId;
      role: RoleId;
      debateRound: number;
      attempt: number;
      objections: ReviewVote[];
    }
  | {
      kind: "revision";
      proposalId: ProposalId;
      role: RoleId;
      round: number;
      attempt: number;
      requests: ReviewVote[];
    };

export interface ReviewerChannel {
  notify(request: ReviewRequest): void;
  /** Drops every undelivered request for a proposal that left review. */
  retract(proposalId: ProposalId): void;
}

export interface InboxMessage {
  id: string;
  queued_at: string;
  request: ReviewRequest;
}

interface PendingInboxWaiter {
  resolve: (messages: InboxMessage[]) => void;
  timeout: NodeJS.Timeout;
}

const requestKey = (request: ReviewRequest): string => {
  switch (request.kind) {
    case "vote":
      return `${request.proposalId}:vote:${request.role}:${request.round}`;
    case "position":
      return `${request.proposalId}:position:${request.role}:${request.debateRound}`;
    case "revision":
      return `${request.proposalId}:revision:${request.role}:${request.round}`;
  }
};

/**
 * In-process reviewer channel. Requests queue per role until acknowledged;
 * a re-sent request for the same proposal, role and round replaces the
 * queued one instead of piling up.
 */
export class ReviewInbox implements ReviewerChannel {
  private readonly messages = new Map<string, InboxMessage>();
  private readonly keys = new Map<string, string>();
  private readonly inboxes = new Map<RoleId, string[]>();
  private readonly waiters = new Map<RoleId, PendingInboxWaiter[]>();

  notify(request: ReviewRequest): void {
    const key = requestKey(request);
    const previous = this.keys.get(key);
    if (previous) {
      this.ack(previous);
    }

    const message: InboxMessage = {
      id: nanoid(),
      queued_at: new Date().toISOString(),
      request,
    };
    this.messages.set(message.id, message);
    this.keys.set(key, message.id);
    const queue = this.inboxes.get(request.role);
    if (queue) {
      queue.push(message.id);
    } else {
      this.inboxes.set(request.role, [message.id]);
    }
    this.deliverIfWaiting(request.role);
  }

  retract(proposalId: ProposalId): void {
    for (const message of [...this.messages.values()]) {
      if (message.request.proposalId === proposalId) {
        this.ack(message.id);
      }
    }
  }

  ack(messageId: string): void {
    const message = this.messages.get(messageId);
    if (!message) {
      return;
    }

    this.messages.delete(messageId);
    this.keys.delete(requestKey(message.request));
    const role = message.request.role;
    const queue = this.inboxes.get(role);
    if (queue) {
      const index = queue.indexOf(messageId);
      if (index >= 0) {
        queue.splice(index, 1);
      }
      if (queue.length === 0) {
        this.inboxes.delete(role);
      }
    }
  }

  pending(role: RoleId): InboxMessage[] {
    return this.drain(role);
  }

  async longPoll(role: RoleId, timeoutMs: number): Promise<InboxMessage[]> {
    const current = this.drain(role);
    if (current.length > 0) {
      return current;
    }

    return new Promise<InboxMessage[]>((resolve) => {
      const timeout = setTimeout(() => {
        this.removeWaiter(role, resolve);
        resolve([]);
      }, timeoutMs);

      const entries = this.waiters.get(role) ?? [];
      entries.push({ resolve, timeout });
      this.waiters.set(role, entries);
    });
  }

  private drain(role: RoleId): InboxMessage[] {
    const queue = this.inboxes.get(role);
    if (!queue) {
      return [];
    }

    const messages: InboxMessage[] = [];
    for (const id of queue) {
      const message = this.messages.get(id);
      if (message) {
        messages.push(message);
      }
    }
    return messages;
  }

  private deliverIfWaiting(role: RoleId): void {
    const waiters = this.waiters.get(role);
    if (!waiters || waiters.length === 0) {
      return;
    }

    const messages = this.drain(role);
    if (messages.length === 0) {
      return;
    }

    this.waiters.set(role, []);
    for (const waiter of waiters) {
      clearTimeout(waiter.timeout);
      waiter.resolve(messages);
    }
  }

  private removeWaiter(
    role: RoleId,
    resolver: (messages: InboxMessage[]) => void,
  ): void {
    const waiters = this.waiters.get(role);
    if (!waiters) {
      return;
    }

    this.waiters.set(
      role,
      waiters.filter((entry) => entry.resolve !== resolver),
    );
  }
}

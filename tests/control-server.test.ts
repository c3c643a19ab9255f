import fs from "node:fs";
import http from "node:http";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { PhaseGateEngine } from "../src/core/engine";
import { GateNotSatisfiedError, NotFoundError } from "../src/core/errors";
import {
  BadRequestError,
  ControlServer,
  statusForError,
} from "../src/runtime/control-server";
import { createEngine } from "./helpers";

interface Reply {
  status: number;
  body: unknown;
  text: string;
}

const request = (
  socketPath: string,
  method: string,
  urlPath: string,
  body?: unknown,
): Promise<Reply> =>
  new Promise((resolve, reject) => {
    const req = http.request(
      {
        socketPath,
        path: urlPath,
        method,
        headers: { "Content-Type": "application/json" },
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on("data", (chunk: Buffer) => chunks.push(chunk));
        res.on("end", () => {
          const text = Buffer.concat(chunks).toString("utf8");
          const json = res.headers["content-type"]?.startsWith("application/json");
          resolve({
            status: res.statusCode ?? 0,
            text,
            body: json ? (JSON.parse(text) as unknown) : text,
          });
        });
      },
    );
    req.on("error", reject);
    if (body !== undefined) {
      req.write(typeof body === "string" ? body : JSON.stringify(body));
    }
    req.end();
  });

const proposalIdOf = (body: unknown): string => {
  if (typeof body === "object" && body !== null && "id" in body && typeof body.id === "string") {
    return body.id;
  }
  throw new Error("response carries no proposal id");
};

describe("ControlServer", () => {
  let server: ControlServer | undefined;

  afterEach(async () => {
    await server?.stop();
    server = undefined;
  });

  const startServer = async (
    engine: PhaseGateEngine = createEngine(),
  ): Promise<{ engine: PhaseGateEngine; socketPath: string }> => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "pg-"));
    const socketPath = path.join(dir, "control.sock");
    server = new ControlServer(engine, socketPath, { pollTimeoutMs: 50 });
    await server.start();
    return { engine, socketPath };
  };

  it("serves the engine status on an owner-only socket", async () => {
    const { socketPath } = await startServer();

    const reply = await request(socketPath, "GET", "/status");

    expect(reply.status).toBe(200);
    expect(reply.body).toMatchObject({
      name: "phasegate-test",
      current: { ordinal: 1, name: "draft", status: "open" },
      items: [],
      reviews: [],
      escalations: [],
      pool: { running: 0, queued: 0, concurrency: 4 },
    });
    expect(fs.statSync(socketPath).mode & 0o777).toBe(0o600);
  });

  it("maps engine and validation errors onto status codes", async () => {
    const { socketPath } = await startServer();

    expect((await request(socketPath, "POST", "/items", [{ id: "w-1", phase: 1 }])).status).toBe(200);
    expect(await request(socketPath, "POST", "/items", [{ id: "w-1", phase: 1 }])).toMatchObject({
      status: 409,
      body: { error: "DuplicateSubmission", message: "Work item w-1 was already ingested" },
    });
    expect(await request(socketPath, "POST", "/items", { id: "w-2" })).toMatchObject({
      status: 400,
      body: { error: "bad_request" },
    });
    expect(await request(socketPath, "POST", "/items", "{")).toMatchObject({
      status: 400,
      body: { error: "bad_request" },
    });
    expect(await request(socketPath, "GET", "/catalogue/rule-9")).toMatchObject({
      status: 404,
      body: { error: "NotFound", message: "Unknown catalogue entry: rule-9" },
    });
    expect(await request(socketPath, "GET", "/nowhere")).toMatchObject({
      status: 404,
      body: { error: "not_found" },
    });
  });

  it("runs a review end to end over the socket", async () => {
    const { engine, socketPath } = await startServer();
    await request(socketPath, "POST", "/items", [{ id: "w-1", phase: 1 }]);
    await request(socketPath, "POST", "/items/w-1/assign", { role: "architect" });

    const completed = await request(socketPath, "POST", "/items/w-1/complete", {
      proposer: "architect",
      payload: { rule: "totals" },
      target: { entryId: "rule-1", content: "totals round half up" },
    });
    expect(completed.status).toBe(202);
    const proposalId = proposalIdOf(completed.body);

    const inbox = await request(socketPath, "GET", "/inbox/tester");
    expect(inbox.body).toMatchObject([
      { request: { kind: "vote", proposalId, role: "tester", round: 1, attempt: 0 } },
    ]);

    for (const role of ["architect", "tester"]) {
      expect(
        await request(socketPath, "POST", "/votes", {
          proposalId,
          role,
          round: 1,
          verdict: "Approved",
          rationale: `${role} agrees`,
        }),
      ).toMatchObject({ status: 200, body: { status: "recorded" } });
    }

    await vi.waitFor(() => {
      expect(engine.itemStatus("w-1")).toBe("Done");
    });
    expect(await request(socketPath, "GET", "/items/w-1")).toMatchObject({
      status: 200,
      body: { id: "w-1", status: "Done" },
    });
    expect((await request(socketPath, "GET", "/catalogue/rule-1")).body).toEqual([
      { id: "rule-1", version: 1, status: "Approved", content: "totals round half up", supersedes: null },
    ]);
    expect((await request(socketPath, "GET", "/chronicle?phase=1")).body).toMatchObject([
      { seq: 1, proposalId, after: "totals round half up" },
    ]);
    expect((await request(socketPath, "GET", "/chronicle?phase=2")).body).toEqual([]);
    expect(await request(socketPath, "GET", "/chronicle?to=yesterday")).toMatchObject({
      status: 400,
      body: { error: "bad_request", issues: ["/to: not a date"] },
    });
    expect(await request(socketPath, "GET", `/proposals/${proposalId}`)).toMatchObject({
      status: 200,
      body: { round: 1, proposal: { status: "Committed" } },
    });

    expect(await request(socketPath, "POST", "/phases/advance")).toMatchObject({
      status: 409,
      body: { error: "GateNotSatisfied", unmet: ["signed-off"] },
    });
    expect(
      await request(socketPath, "POST", "/phases/1/criteria/signed-off", { evidence: "lead" }),
    ).toMatchObject({ status: 200, body: { id: "signed-off", satisfied: true, evidence: "lead" } });
    expect(await request(socketPath, "POST", "/phases/advance")).toMatchObject({
      status: 200,
      body: { closed: { ordinal: 1, status: "closed" }, opened: { ordinal: 2 } },
    });

    const report = await request(socketPath, "GET", "/report");
    expect(report.text.split("\n").slice(0, 3)).toEqual([
      "=== overview ===",
      "phase=2:check",
      "gate=satisfied",
    ]);
  });

  it("answers an idle long poll with an empty list", async () => {
    const { socketPath } = await startServer();

    expect(await request(socketPath, "GET", "/inbox/auditor")).toMatchObject({
      status: 200,
      body: [],
    });
  });

  it("resolves escalations and lists them with ?all=true", async () => {
    const { engine, socketPath } = await startServer();
    engine.ingest([{ id: "w-1", phase: 1 }]);
    const escalation = engine.escalations.raise({
      subject: { kind: "phase", phase: 1 },
      reason: "PhaseReopen",
      positions: [],
      phase: 1,
    });

    expect((await request(socketPath, "GET", "/escalations")).body).toMatchObject([
      { id: escalation.id, resolution: "Pending" },
    ]);
    expect(
      await request(socketPath, "POST", `/escalations/${escalation.id}/resolve`, {
        outcome: "approve",
        text: "go",
      }),
    ).toMatchObject({ status: 200, body: { resolution: "Resolved" } });
    expect((await request(socketPath, "GET", "/escalations")).body).toEqual([]);
    expect((await request(socketPath, "GET", "/escalations?all=true")).body).toMatchObject([
      { id: escalation.id, decision: { outcome: "approve", text: "go" } },
    ]);
    expect(
      await request(socketPath, "POST", `/escalations/${escalation.id}/resolve`, {
        outcome: "reject",
        text: "again",
      }),
    ).toMatchObject({ status: 409, body: { error: "EscalationResolved" } });
  });
});

describe("statusForError", () => {
  it("maps error classes onto HTTP statuses", () => {
    expect(statusForError(new BadRequestError(["/: bad"]))).toBe(400);
    expect(statusForError(new SyntaxError("Unexpected end of JSON input"))).toBe(400);
    expect(statusForError(new NotFoundError("phase", "9"))).toBe(404);
    expect(statusForError(new GateNotSatisfiedError(1, []))).toBe(409);
    expect(statusForError(new Error("boom"))).toBe(500);
  });
});

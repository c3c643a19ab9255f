import fs from "node:fs";
import http from "node:http";
import path from "node:path";
import { type Static, type TSchema, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { PhaseGateEngine } from "../core/engine";
import { EngineError, GateNotSatisfiedError, errorMessage } from "../core/errors";
import {
  asEscalationId,
  asProposalId,
  asRoleId,
  asWorkItemId,
} from "../core/types";
import { buildStatusReport } from "../observability/report";

const EvidenceRefSchema = Type.Object({
  kind: Type.Union([
    Type.Literal("catalogue"),
    Type.Literal("decision"),
    Type.Literal("test"),
    Type.Literal("criterion"),
  ]),
  ref: Type.String({ minLength: 1 }),
  concern: Type.Optional(
    Type.Union([
      Type.Literal("testability"),
      Type.Literal("fidelity"),
      Type.Literal("quality"),
    ]),
  ),
});

const ChangeKindSchema = Type.Union([
  Type.Literal("clerical"),
  Type.Literal("additive"),
  Type.Literal("behavioral"),
  Type.Literal("removal"),
]);

const TargetSchema = Type.Object({
  entryId: Type.String({ minLength: 1 }),
  content: Type.String(),
});

const SnapshotsSchema = Type.Object({
  before: Type.Optional(Type.String()),
  after: Type.Optional(Type.String()),
});

const IngestSchema = Type.Array(
  Type.Object({
    id: Type.String({ minLength: 1 }),
    phase: Type.Integer({ minimum: 1 }),
    metadata: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  }),
);

const AssignSchema = Type.Object({ role: Type.String({ minLength: 1 }) });

const CompleteSchema = Type.Object({
  proposer: Type.String({ minLength: 1 }),
  payload: Type.Unknown(),
  changeKind: Type.Optional(ChangeKindSchema),
  target: Type.Optional(TargetSchema),
  snapshots: Type.Optional(SnapshotsSchema),
});

const VoteSchema = Type.Object({
  proposalId: Type.String({ minLength: 1 }),
  role: Type.String({ minLength: 1 }),
  round: Type.Integer({ minimum: 1 }),
  verdict: Type.Union([
    Type.Literal("Approved"),
    Type.Literal("RequestedChange"),
    Type.Literal("Objection"),
  ]),
  rationale: Type.String(),
});

const PositionSchema = Type.Object({
  proposalId: Type.String({ minLength: 1 }),
  role: Type.String({ minLength: 1 }),
  statement: Type.String(),
  evidence: Type.Array(EvidenceRefSchema),
});

const RevisionSchema = Type.Object({
  proposalId: Type.String({ minLength: 1 }),
  role: Type.String({ minLength: 1 }),
  payload: Type.Unknown(),
  changeKind: Type.Optional(ChangeKindSchema),
  target: Type.Optional(TargetSchema),
  snapshots: Type.Optional(SnapshotsSchema),
});

const ReasonSchema = Type.Object({ reason: Type.String({ minLength: 1 }) });

const EvidenceSchema = Type.Object({ evidence: Type.String({ minLength: 1 }) });

const DecisionSchema = Type.Object({
  outcome: Type.Union([
    Type.Literal("approve"),
    Type.Literal("reject"),
    Type.Literal("retry"),
  ]),
  text: Type.String({ minLength: 1 }),
  decidedBy: Type.Optional(Type.String()),
});

/** A request the server refuses before it reaches the engine. */
export class BadRequestError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid request: ${issues.join("; ")}`);
    this.name = "BadRequestError";
  }
}

const parse = <T extends TSchema>(schema: T, body: unknown): Static<T> => {
  if (!Value.Check(schema, body)) {
    throw new BadRequestError(
      [...Value.Errors(schema, body)].map(
        (error) => `${error.path || "/"}: ${error.message}`,
      ),
    );
  }
  return body;
};

export const statusForError = (error: unknown): number => {
  if (error instanceof BadRequestError || error instanceof SyntaxError) {
    return 400;
  }
  if (error instanceof EngineError) {
    return error.code === "NotFound" ? 404 : 409;
  }
  return 500;
};

const errorBody = (error: unknown): Record<string, unknown> => {
  if (error instanceof GateNotSatisfiedError) {
    return {
      error: error.code,
      message: error.message,
      unmet: error.unmet.map((criterion) => criterion.id),
    };
  }
  if (error instanceof EngineError) {
    return { error: error.code, message: error.message };
  }
  if (error instanceof BadRequestError) {
    return { error: "bad_request", issues: error.issues };
  }
  if (error instanceof SyntaxError) {
    return { error: "bad_request", issues: [`/: ${error.message}`] };
  }
  return { error: "internal", message: errorMessage(error) };
};

export interface ControlServerOptions {
  /** How long an inbox long-poll waits before answering with `[]`. */
  pollTimeoutMs?: number;
}

/**
 * JSON over HTTP on a unix socket: status and reports, work intake, reviewer
 * inbox and votes, escalation decisions, and ledger export.
 */
export class ControlServer {
  private server?: http.Server;
  private readonly pollTimeoutMs: number;

  constructor(
    private readonly engine: PhaseGateEngine,
    private readonly socketPath: string,
    options: ControlServerOptions = {},
  ) {
    this.pollTimeoutMs = options.pollTimeoutMs ?? 30_000;
  }

  start(): Promise<void> {
    fs.mkdirSync(path.dirname(this.socketPath), { recursive: true });
    fs.rmSync(this.socketPath, { force: true });

    const logger = this.engine.logger.child({ component: "control" });
    this.server = http.createServer((req, res) => {
      this.handle(req, res).catch((error: unknown) => {
        const status = statusForError(error);
        if (status === 500) {
          logger.error("control request failed", {
            method: req.method,
            url: req.url,
            error: errorMessage(error),
          });
        }
        respondJson(res, status, errorBody(error));
      });
    });

    const server = this.server;
    return new Promise((resolve) => {
      server.listen(this.socketPath, () => {
        fs.chmodSync(this.socketPath, 0o600);
        logger.info("control server listening", { socketPath: this.socketPath });
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    if (!this.server) {
      return;
    }

    const server = this.server;
    this.server = undefined;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });

    fs.rmSync(this.socketPath, { force: true });
  }

  private async handle(
    req: http.IncomingMessage,
    res: http.ServerResponse,
  ): Promise<void> {
    const engine = this.engine;
    const url = new URL(req.url ?? "/", "http://localhost");
    const method = req.method ?? "GET";
    const route = url.pathname;
    let match: RegExpMatchArray | null;

    if (method === "GET" && route === "/status") {
      respondJson(res, 200, {
        name: engine.config.name,
        current: engine.phases.current(),
        phases: engine.phases.list(),
        items: engine.router.list(),
        reviews: engine.reviews.active(),
        escalations: engine.escalations.open(),
        pool: engine.pool.stats(),
      });
      return;
    }

    if (method === "GET" && route === "/report") {
      res.writeHead(200, { "Content-Type": "text/plain; charset=utf-8" });
      res.end(buildStatusReport(engine));
      return;
    }

    if (method === "GET" && (match = route.match(/^\/gate\/(\d+)$/))) {
      respondJson(res, 200, engine.gateStatus(Number(match[1])));
      return;
    }

    if (method === "POST" && route === "/phases/advance") {
      respondJson(res, 200, engine.phases.advancePhase());
      return;
    }

    if (
      method === "POST" &&
      (match = route.match(/^\/phases\/(\d+)\/criteria\/([^/]+)$/))
    ) {
      const body = parse(EvidenceSchema, await readBody(req));
      respondJson(
        res,
        200,
        engine.phases.recordCriterion(
          Number(match[1]),
          decodeURIComponent(match[2] ?? ""),
          body.evidence,
        ),
      );
      return;
    }

    if (method === "POST" && route === "/items") {
      respondJson(res, 200, engine.ingest(parse(IngestSchema, await readBody(req))));
      return;
    }

    if (method === "GET" && (match = route.match(/^\/items\/([^/]+)$/))) {
      const item = engine.router.get(asWorkItemId(decodeURIComponent(match[1] ?? "")));
      respondJson(res, item ? 200 : 404, item ?? { error: "NotFound" });
      return;
    }

    if (method === "POST" && (match = route.match(/^\/items\/([^/]+)\/assign$/))) {
      const body = parse(AssignSchema, await readBody(req));
      respondJson(
        res,
        200,
        engine.router.assign(
          asWorkItemId(decodeURIComponent(match[1] ?? "")),
          asRoleId(body.role),
        ),
      );
      return;
    }

    if (method === "POST" && (match = route.match(/^\/items\/([^/]+)\/complete$/))) {
      const draft = parse(CompleteSchema, await readBody(req));
      const submission = engine.router.complete(
        asWorkItemId(decodeURIComponent(match[1] ?? "")),
        draft,
      );
      respondJson(res, 202, submission.proposal);
      return;
    }

    if (method === "GET" && (match = route.match(/^\/inbox\/([^/]+)$/))) {
      const role = asRoleId(decodeURIComponent(match[1] ?? ""));
      respondJson(res, 200, await engine.inbox.longPoll(role, this.pollTimeoutMs));
      return;
    }

    if (method === "POST" && (match = route.match(/^\/ack\/([^/]+)$/))) {
      engine.inbox.ack(decodeURIComponent(match[1] ?? ""));
      respondJson(res, 200, { ok: true });
      return;
    }

    if (method === "POST" && route === "/votes") {
      respondJson(res, 200, engine.reviews.castVote(parse(VoteSchema, await readBody(req))));
      return;
    }

    if (method === "POST" && route === "/positions") {
      respondJson(
        res,
        200,
        engine.reviews.postPosition(parse(PositionSchema, await readBody(req))),
      );
      return;
    }

    if (method === "POST" && route === "/revisions") {
      respondJson(res, 200, engine.reviews.revise(parse(RevisionSchema, await readBody(req))));
      return;
    }

    if (method === "GET" && (match = route.match(/^\/proposals\/([^/]+)$/))) {
      const transcript = engine.reviews.transcript(
        asProposalId(decodeURIComponent(match[1] ?? "")),
      );
      respondJson(res, transcript ? 200 : 404, transcript ?? { error: "NotFound" });
      return;
    }

    if (
      method === "POST" &&
      (match = route.match(/^\/proposals\/([^/]+)\/withdraw$/))
    ) {
      const body = parse(ReasonSchema, await readBody(req));
      respondJson(
        res,
        200,
        engine.reviews.withdraw(
          asProposalId(decodeURIComponent(match[1] ?? "")),
          body.reason,
        ),
      );
      return;
    }

    if (method === "GET" && route === "/escalations") {
      const all = url.searchParams.get("all") === "true";
      respondJson(res, 200, all ? engine.escalations.list() : engine.escalations.open());
      return;
    }

    if (
      method === "POST" &&
      (match = route.match(/^\/escalations\/([^/]+)\/resolve$/))
    ) {
      const decision = parse(DecisionSchema, await readBody(req));
      respondJson(
        res,
        200,
        engine.resolveEscalation(
          asEscalationId(decodeURIComponent(match[1] ?? "")),
          decision,
        ),
      );
      return;
    }

    if (method === "GET" && route === "/catalogue") {
      const pattern = url.searchParams.get("match");
      respondJson(
        res,
        200,
        engine.exportCatalogueAll(pattern ? { match: pattern } : {}),
      );
      return;
    }

    if (method === "GET" && (match = route.match(/^\/catalogue\/([^/]+)$/))) {
      respondJson(res, 200, engine.exportCatalogue(decodeURIComponent(match[1] ?? "")));
      return;
    }

    if (method === "GET" && route === "/chronicle") {
      const phase = url.searchParams.get("phase");
      const from = url.searchParams.get("from");
      const to = url.searchParams.get("to");
      const bounds: Array<[string, string | null]> = [
        ["from", from],
        ["to", to],
      ];
      const badBounds = bounds.flatMap(([name, value]) =>
        value && Number.isNaN(Date.parse(value)) ? [`/${name}: not a date`] : [],
      );
      if (badBounds.length > 0) {
        throw new BadRequestError(badBounds);
      }
      respondJson(
        res,
        200,
        engine.exportChronicle({
          ...(phase ? { phase: Number(phase) } : {}),
          ...(from ? { from } : {}),
          ...(to ? { to } : {}),
        }),
      );
      return;
    }

    respondJson(res, 404, { error: "not_found" });
  }
}

const readBody = async (req: http.IncomingMessage): Promise<unknown> => {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.from(chunk));
  }
  const raw = Buffer.concat(chunks).toString("utf8").trim();
  if (!raw) {
    return {};
  }
  return JSON.parse(raw) as unknown;
};

const respondJson = (
  res: http.ServerResponse,
  status: number,
  payload: unknown,
): void => {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(payload));
};

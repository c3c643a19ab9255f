import { minimatch } from "minimatch";
import { NotFoundError } from "./errors";
import { Journal } from "./journal";
import { EngineLogger, type LogSink } from "./logger";
import { PhaseController } from "./phase-controller";
import { StateStore } from "./state-store";
import {
  type EscalationId,
  type Escalation,
  type GateStatus,
  type HumanDecision,
  type WorkItem,
  type WorkItemDescriptor,
  type WorkItemStatus,
  asEntryId,
  asWorkItemId,
} from "./types";
import {
  type CatalogueEvent,
  CatalogueStore,
} from "../ledger/catalogue-store";
import {
  type ChronicleEvent,
  type ChronicleQuery,
  ChronicleStore,
} from "../ledger/chronicle-store";
import {
  type CatalogueExport,
  type ChronicleExport,
  toCatalogueExport,
  toChronicleExport,
} from "../ledger/export";
import { type EngineConfig, loadEngineConfig } from "../project/config";
import type { ConflictResolver } from "../review/conflict-resolver";
import {
  EscalationManager,
  type HumanDecisionPort,
} from "../review/escalation-manager";
import { ReviewCoordinator } from "../review/review-coordinator";
import { ReviewInbox, type ReviewerChannel } from "../review/review-inbox";
import { TaskRouter } from "../routing/task-router";
import { WorkerPool } from "../routing/worker-pool";

export interface EngineOptions {
  /** Answers escalations; without one they wait for `resolveEscalation`. */
  humans?: HumanDecisionPort;
  /** Outbound reviewer channel; defaults to an in-process `ReviewInbox`. */
  channel?: ReviewerChannel;
  resolver?: ConflictResolver;
  logSink?: LogSink;
}

/**
 * Wires the phase controller, router, review coordinator, ledgers and
 * escalation manager from one `EngineConfig`. With `stateDir` set the ledgers
 * journal to disk and phase and item state are snapshotted after each change.
 */
export class PhaseGateEngine {
  readonly logger: EngineLogger;
  readonly escalations: EscalationManager;
  readonly catalogue: CatalogueStore;
  readonly chronicle: ChronicleStore;
  readonly router: TaskRouter;
  readonly reviews: ReviewCoordinator;
  readonly phases: PhaseController;
  readonly pool: WorkerPool;
  readonly inbox = new ReviewInbox();

  private readonly store: StateStore | undefined;

  constructor(
    readonly config: EngineConfig,
    options: EngineOptions = {},
  ) {
    this.logger = new EngineLogger({
      level: config.logLevel,
      service: config.name,
      ...(options.logSink ? { sink: options.logSink } : {}),
    });
    this.store = config.stateDir ? new StateStore(config.stateDir) : undefined;
    this.store?.ensure();

    this.escalations = new EscalationManager(
      this.logger.child({ component: "escalations" }),
      options.humans,
    );
    this.catalogue = new CatalogueStore(
      this.escalations,
      this.logger.child({ component: "catalogue" }),
      this.store
        ? new Journal<CatalogueEvent>(this.store.journalPath("catalogue"))
        : undefined,
    );
    this.chronicle = new ChronicleStore(
      this.logger.child({ component: "chronicle" }),
      this.store
        ? new Journal<ChronicleEvent>(this.store.journalPath("chronicle"))
        : undefined,
    );

    this.pool = new WorkerPool(config.workers.concurrency);
    this.router = new TaskRouter(this.logger.child({ component: "router" }));
    this.escalations.bindBlocker(this.router);

    this.reviews = new ReviewCoordinator({
      items: this.router,
      catalogue: this.catalogue,
      chronicle: this.chronicle,
      escalations: this.escalations,
      phases: {
        requiredReviewerRoles: (phase) => this.phases.requiredReviewerRoles(phase),
        safetyPriority: (phase) => this.phases.safetyPriority(phase),
      },
      channel: options.channel ?? this.inbox,
      policy: config.review,
      logger: this.logger,
      pool: this.pool,
      ...(options.resolver ? { resolver: options.resolver } : {}),
    });

    this.catalogue.load();
    this.chronicle.load();
    this.router.restore(this.store?.loadItems() ?? []);

    const phases = new PhaseController(
      config.phases,
      {
        items: this.router,
        reviews: this.reviews,
        catalogue: this.catalogue,
        escalations: this.escalations,
      },
      this.logger.child({ component: "phases" }),
      this.store?.loadPhases(),
    );
    this.phases = phases;
    this.router.bind({ reviewer: this.reviews, phases });

    const store = this.store;
    if (store) {
      this.phases.onTransition(() => store.savePhases(this.phases.list()));
      this.router.onChange(() => store.saveItems(this.router.list()));
      store.savePhases(this.phases.list());
    }
  }

  static async fromDirectory(
    cwd: string,
    options: EngineOptions = {},
  ): Promise<PhaseGateEngine> {
    return new PhaseGateEngine(await loadEngineConfig(cwd), options);
  }

  ingest(descriptors: WorkItemDescriptor[]): WorkItem[] {
    return this.router.ingest(descriptors);
  }

  gateStatus(phase: number): GateStatus {
    return this.phases.evaluateGate(phase);
  }

  itemStatus(itemId: string): WorkItemStatus {
    return this.router.status(asWorkItemId(itemId));
  }

  resolveEscalation(id: EscalationId, decision: HumanDecision): Escalation {
    return this.escalations.resolve(id, decision);
  }

  exportCatalogue(entryId: string): CatalogueExport[] {
    const history = this.catalogue.history(asEntryId(entryId));
    if (history.length === 0) {
      throw new NotFoundError("catalogue entry", entryId);
    }
    return history.map(toCatalogueExport);
  }

  /** Every version of every entry whose id matches the glob. */
  exportCatalogueAll(query: { match?: string } = {}): CatalogueExport[] {
    const pattern = query.match;
    return this.catalogue
      .list()
      .filter((entry) => pattern === undefined || minimatch(entry.id, pattern))
      .flatMap((entry) => this.catalogue.history(entry.id))
      .map(toCatalogueExport);
  }

  exportChronicle(query: ChronicleQuery = {}): ChronicleExport[] {
    return this.chronicle.list(query).map(toChronicleExport);
  }
}

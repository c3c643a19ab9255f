import { errorMessage } from "../core/errors";
import type { PhaseGateEngine } from "../core/engine";
import type { EngineLogger } from "../core/logger";
import type { Escalation, EscalationId, WorkItem, WorkItemId } from "../core/types";

export type StalledSubject =
  | {
      kind: "escalation";
      id: EscalationId;
      phase: number;
      since: string;
      itemId?: WorkItemId;
    }
  | {
      kind: "item";
      id: WorkItemId;
      phase: number;
      since: string;
      blockedBy?: EscalationId;
    };

export interface StallAlert {
  at: string;
  subject: StalledSubject;
  /** Consecutive sweeps the subject had been stalled for. */
  sweeps: number;
}

export interface StallSources {
  escalations: { open(): Escalation[] };
  router: { list(): WorkItem[] };
}

export interface StallMonitorOptions {
  intervalMs: number;
  maxAgeMs: number;
  /** Sweeps a subject must stay stalled for before its alert. */
  threshold: number;
  logger: EngineLogger;
  onAlert?: (alert: StallAlert) => void;
}

export interface StallMonitor {
  /** One pass over the engine; returns the alerts it raised. */
  sweep(now?: number): StallAlert[];
  /** Stalled subjects keyed `kind:id`, with the sweeps each has been seen in. */
  sightings(): Record<string, number>;
  start(): void;
  stop(): void;
}

const ageMs = (iso: string, now: number): number => now - Date.parse(iso);

const subjectKey = (subject: StalledSubject): string => `${subject.kind}:${subject.id}`;

/** Escalations still pending, and items still Blocked, after `maxAgeMs`. */
export const findStalled = (
  sources: StallSources,
  maxAgeMs: number,
  now = Date.now(),
): StalledSubject[] => [
  ...sources.escalations
    .open()
    .filter((escalation) => ageMs(escalation.raised_at, now) > maxAgeMs)
    .map(
      (escalation): StalledSubject => ({
        kind: "escalation",
        id: escalation.id,
        phase: escalation.phase,
        since: escalation.raised_at,
        ...(escalation.itemId ? { itemId: escalation.itemId } : {}),
      }),
    ),
  ...sources.router
    .list()
    .filter((item) => item.status === "Blocked" && ageMs(item.updated_at, now) > maxAgeMs)
    .map(
      (item): StalledSubject => ({
        kind: "item",
        id: item.id,
        phase: item.phase,
        since: item.updated_at,
        ...(item.blockedBy ? { blockedBy: item.blockedBy } : {}),
      }),
    ),
];

/**
 * Sweeps the engine for stalled work on an interval. A subject alerts once,
 * on the sweep where it reaches `threshold`; it alerts again only after it
 * has cleared and stalled anew.
 */
export const watchStalls = (
  sources: StallSources,
  options: StallMonitorOptions,
): StallMonitor => {
  const seen = new Map<string, number>();
  let timer: NodeJS.Timeout | undefined;

  const sweep = (now = Date.now()): StallAlert[] => {
    const stalled = findStalled(sources, options.maxAgeMs, now);
    const current = new Set(stalled.map(subjectKey));
    for (const key of [...seen.keys()]) {
      if (!current.has(key)) {
        seen.delete(key);
      }
    }

    const alerts: StallAlert[] = [];
    for (const subject of stalled) {
      const key = subjectKey(subject);
      const sweeps = (seen.get(key) ?? 0) + 1;
      seen.set(key, sweeps);
      if (sweeps === options.threshold) {
        alerts.push({ at: new Date(now).toISOString(), subject, sweeps });
      }
    }

    if (stalled.length > 0) {
      options.logger.warn("stalled work found", { stalled: [...current] });
    }
    for (const alert of alerts) {
      options.logger.error("work stalled", {
        subject: subjectKey(alert.subject),
        phase: alert.subject.phase,
        since: alert.subject.since,
        sweeps: alert.sweeps,
      });
      options.onAlert?.(alert);
    }
    return alerts;
  };

  return {
    sweep,
    sightings: () => Object.fromEntries(seen),
    start: () => {
      if (timer) {
        return;
      }
      timer = setInterval(() => {
        try {
          sweep();
        } catch (error) {
          options.logger.error("stall sweep failed", { error: errorMessage(error) });
        }
      }, options.intervalMs);
    },
    stop: () => {
      clearInterval(timer);
      timer = undefined;
    },
  };
};

/** Monitor over an engine, using its monitor settings; anything older than one interval counts. */
export const createStallMonitor = (
  engine: PhaseGateEngine,
  onAlert?: (alert: StallAlert) => void,
): StallMonitor => {
  const { intervalMs, stallThreshold } = engine.config.monitor;
  return watchStalls(engine, {
    intervalMs,
    maxAgeMs: intervalMs,
    threshold: stallThreshold,
    logger: engine.logger.child({ component: "monitor" }),
    ...(onAlert ? { onAlert } : {}),
  });
};

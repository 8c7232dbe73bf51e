import type { Probe, ProbeResult, Target, WorkerEvent } from "../types";
import { errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import type { EventChannel } from "./channel";
import { runWithDeadline } from "./deadline";

export type WorkerOptions = {
  runId: number;
  targets: readonly Target[];
  probe: Probe;
  deadlineMs: number;
  channel: EventChannel<WorkerEvent>;
  now?: () => number;
};

export type WorkerHandle = {
  readonly runId: number;
  /** Stops the run before the next target. An in-flight probe still finishes. */
  cancel(): void;
  readonly cancelRequested: boolean;
  readonly done: Promise<void>;
};

/**
 * Probes every target in order, one at a time, and reports through the
 * channel. Returns immediately; the run itself starts on a later tick.
 */
export function startWorker(options: WorkerOptions): WorkerHandle {
  let cancelRequested = false;
  const done = Promise.resolve().then(() => runTargets(options, () => cancelRequested));

  return {
    runId: options.runId,
    cancel() {
      cancelRequested = true;
    },
    get cancelRequested() {
      return cancelRequested;
    },
    done,
  };
}

async function runTargets(options: WorkerOptions, isCancelled: () => boolean): Promise<void> {
  const { runId, targets, probe, deadlineMs, channel } = options;
  const now = options.now ?? Date.now;
  const total = targets.length;

  for (let index = 0; index < total; index++) {
    if (isCancelled()) {
      logger.info(`run ${runId} cancelled after ${index} of ${total} targets`);
      channel.send({ type: "cancelled", runId });
      return;
    }

    const target = targets[index];
    const outcome = await runWithDeadline((signal) => probe(target, signal), deadlineMs, now);
    const result: ProbeResult = {
      target,
      index,
      status: { kind: "pending" },
      elapsedMs: outcome.elapsedMs,
      completedAt: now(),
    };

    switch (outcome.kind) {
      case "completed":
        result.status = { kind: "success" };
        result.latencyMs = outcome.value.latencyMs;
        result.throughputMbps = outcome.value.throughputMbps;
        break;
      case "timeout":
        result.status = { kind: "timeout" };
        break;
      case "failed":
        result.status = { kind: "failed", reason: errorMessage(outcome.error) };
        break;
    }

    logger.debug(`${target.identifier}: ${result.status.kind} in ${Math.round(outcome.elapsedMs)}ms`);
    channel.send({ type: "result", runId, result });
    channel.send({ type: "progress", runId, completed: index + 1, total });
  }

  channel.send({ type: "complete", runId });
}

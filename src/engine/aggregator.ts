import type { BestBy, ProbeResult, RunStatus, SortSpec, Target, WorkerEvent } from "../types";
import { pickBest, sortResults } from "./ranking";

/**
 * Result table for one run. Slots start Pending, index-aligned with the
 * run's targets, and are filled in place as worker events arrive.
 */
export class ResultAggregator {
  private runTargets: readonly Target[] = [];
  private slots: ProbeResult[] = [];
  private runStatus: RunStatus = "idle";
  private activeRunId: number | null = null;
  private completedCount = 0;
  private latest: ProbeResult | undefined;

  begin(runId: number, targets: readonly Target[]): void {
    this.activeRunId = runId;
    this.runTargets = [...targets];
    this.slots = this.runTargets.map((target, index) => ({ target, index, status: { kind: "pending" } }));
    this.runStatus = "running";
    this.completedCount = 0;
    this.latest = undefined;
  }

  /** Applies one worker event. Returns false for events from any other run. */
  apply(event: WorkerEvent): boolean {
    if (this.activeRunId === null || event.runId !== this.activeRunId) return false;

    switch (event.type) {
      case "result": {
        const slot = this.slots[event.result.index];
        if (!slot || slot.status.kind !== "pending") return false;
        this.slots[event.result.index] = event.result;
        this.latest = event.result;
        return true;
      }
      case "progress":
        this.completedCount = event.completed;
        return true;
      case "complete":
        this.runStatus = "completed";
        return true;
      case "cancelled":
        this.runStatus = "cancelled";
        this.slots = this.slots.filter((r) => r.status.kind !== "pending");
        return true;
    }
  }

  clear(): void {
    this.activeRunId = null;
    this.runTargets = [];
    this.slots = [];
    this.runStatus = "idle";
    this.completedCount = 0;
    this.latest = undefined;
  }

  get status(): RunStatus {
    return this.runStatus;
  }

  get runId(): number | null {
    return this.activeRunId;
  }

  get targets(): readonly Target[] {
    return this.runTargets;
  }

  get results(): readonly ProbeResult[] {
    return this.slots;
  }

  get completed(): number {
    return this.completedCount;
  }

  get total(): number {
    return this.runTargets.length;
  }

  get currentTarget(): Target | undefined {
    return this.runStatus === "running" ? this.runTargets[this.completedCount] : undefined;
  }

  get lastResult(): ProbeResult | undefined {
    return this.latest;
  }

  view(sort: SortSpec): ProbeResult[] {
    return sortResults(this.slots, sort);
  }

  best(bestBy: BestBy): ProbeResult | undefined {
    return pickBest(this.slots, bestBy);
  }
}

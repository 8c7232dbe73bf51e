import type { AppConfig } from "../config";
import type { DnsApplier } from "../platform";
import type {
  ActionOutcome,
  Mode,
  Probe,
  ProbeResult,
  Screen,
  SortSpec,
  StatusMessage,
  StatusTone,
  Target,
  WorkerEvent,
} from "../types";
import { errorMessage, PlatformMechanismError } from "../utils/errors";
import { exportFileName, saveCsvAs, toResultsCsv } from "../utils/export";
import { logger } from "../utils/logger";
import { parseTargetList } from "../utils/targets";
import { ResultAggregator } from "./aggregator";
import { EventChannel } from "./channel";
import { defaultSort, nextSortColumn } from "./ranking";
import { startWorker, type WorkerHandle } from "./worker";

export const STATUS_TTL_MS = 4000;

export type SessionAction =
  | { type: "addTarget"; raw: string }
  | { type: "removeLastTarget" }
  | { type: "start" }
  | { type: "cancel" }
  | { type: "reset" }
  | { type: "cycleSort" }
  | { type: "toggleDirection" }
  | { type: "toggleMode" }
  | { type: "applyBest" }
  | { type: "export" }
  | { type: "quit" };

export type SessionOptions = {
  config: Pick<AppConfig, "mode" | "timeoutMs" | "bestBy">;
  probe: Probe;
  applier: DnsApplier;
  /** Distro mirror set, used the first time Mirror mode is entered with no mirrors listed. */
  mirrorSet?: readonly Target[];
  initialTargets?: readonly Target[];
  /** Set when the initial targets came from a file; reports the load in the status line. */
  initialSkipped?: number;
  /** Command-line entries that failed validation; shown as the input error. */
  initialRejected?: readonly string[];
  now?: () => number;
  saveCsv?: (csv: string, name: string) => Promise<string>;
};

const accepted: ActionOutcome = { accepted: true };
const rejected = (reason: string): ActionOutcome => ({ accepted: false, reason });

/**
 * Owns everything one interactive session knows: mode, screen, target lists,
 * the current run and presentation state. Handlers never block; probing,
 * applying and exporting run as background promises whose results come back
 * through `poll` or a status message.
 */
export class Session {
  private currentMode: Mode;
  private currentScreen: Screen = "input";
  private readonly targetsByMode: Record<Mode, Target[]> = { dns: [], mirror: [] };
  private mirrorsSeeded = false;
  private sortSpec: SortSpec;
  private readonly aggregator = new ResultAggregator();
  private readonly channel = new EventChannel<WorkerEvent>();
  private worker: WorkerHandle | undefined;
  private nextRunId = 0;
  private error: string | undefined;
  private statusMessage: StatusMessage | undefined;
  private applyInFlight = false;
  private quitRequested = false;
  private readonly background = new Set<Promise<void>>();
  private readonly listeners = new Set<() => void>();
  private readonly now: () => number;
  private readonly saveCsv: (csv: string, name: string) => Promise<string>;

  constructor(private readonly options: SessionOptions) {
    this.currentMode = options.config.mode;
    this.sortSpec = defaultSort(options.config.bestBy);
    this.now = options.now ?? Date.now;
    this.saveCsv = options.saveCsv ?? ((csv, name) => saveCsvAs(csv, name));
    this.targetsByMode[this.currentMode] = [...(options.initialTargets ?? [])];
    if (this.currentMode === "mirror") this.seedMirrors();
    if (options.initialSkipped !== undefined) this.announceLoad(this.targets.length, options.initialSkipped);
    if (options.initialRejected && options.initialRejected.length > 0) {
      this.error = options.initialRejected.map((entry) => this.invalidEntry(entry)).join("; ");
    }
  }

  get mode(): Mode {
    return this.currentMode;
  }

  get screen(): Screen {
    return this.currentScreen;
  }

  get targets(): readonly Target[] {
    return this.targetsByMode[this.currentMode];
  }

  get run(): ResultAggregator {
    return this.aggregator;
  }

  get sort(): SortSpec {
    return this.sortSpec;
  }

  get sortedResults(): ProbeResult[] {
    return this.aggregator.view(this.sortSpec);
  }

  get best(): ProbeResult | undefined {
    return this.aggregator.best(this.options.config.bestBy);
  }

  get inputError(): string | undefined {
    return this.error;
  }

  get status(): StatusMessage | undefined {
    return this.statusMessage;
  }

  get shouldQuit(): boolean {
    return this.quitRequested;
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  dispatch(action: SessionAction): ActionOutcome {
    const outcome = this.handle(action);
    if (outcome.accepted) this.notify();
    return outcome;
  }

  /**
   * Drains worker events without waiting and expires the status banner.
   * Called once per frame by the renderer. Returns whether anything changed.
   */
  poll(): boolean {
    let changed = false;
    for (const event of this.channel.drain()) {
      if (!this.aggregator.apply(event)) continue;
      changed = true;
      if (event.type === "complete" || event.type === "cancelled") this.finishRun(event.type);
    }
    if (this.statusMessage && this.now() >= this.statusMessage.expiresAt) {
      this.statusMessage = undefined;
      changed = true;
    }
    if (changed) this.notify();
    return changed;
  }

  /** Resolves once the worker and any apply or export work have settled. */
  async idle(): Promise<void> {
    await Promise.all([this.worker?.done, ...this.background]);
  }

  private handle(action: SessionAction): ActionOutcome {
    switch (action.type) {
      case "addTarget":
        return this.addTarget(action.raw);
      case "removeLastTarget":
        if (this.currentScreen !== "input") return rejected("Targets can only be edited before a run");
        if (this.targets.length === 0) return rejected("No targets to remove");
        this.targetsByMode[this.currentMode] = this.targets.slice(0, -1);
        this.error = undefined;
        return accepted;
      case "start":
        return this.start();
      case "cancel":
        return this.cancel();
      case "reset":
        if (this.currentScreen === "running") return this.cancel();
        if (this.currentScreen !== "results") return rejected("Nothing to reset");
        this.aggregator.clear();
        this.currentScreen = "input";
        this.statusMessage = undefined;
        return accepted;
      case "cycleSort":
        this.sortSpec = { ...this.sortSpec, column: nextSortColumn(this.sortSpec.column, this.currentMode) };
        return accepted;
      case "toggleDirection":
        this.sortSpec = { ...this.sortSpec, direction: this.sortSpec.direction === "asc" ? "desc" : "asc" };
        return accepted;
      case "toggleMode":
        return this.toggleMode();
      case "applyBest":
        return this.applyBest();
      case "export":
        return this.exportResults();
      case "quit":
        this.worker?.cancel();
        this.quitRequested = true;
        return accepted;
    }
  }

  private addTarget(raw: string): ActionOutcome {
    if (this.currentScreen !== "input") return rejected("Targets can only be edited before a run");
    if (!raw.trim()) return rejected("Nothing to add");

    const { targets, rejected: bad } = parseTargetList(raw, this.currentMode);
    const list = [...this.targets];
    const duplicates: string[] = [];
    for (const target of targets) {
      if (list.some((t) => t.identifier === target.identifier)) duplicates.push(target.identifier);
      else list.push(target);
    }
    this.targetsByMode[this.currentMode] = list;

    const problems = [
      ...bad.map((entry) => this.invalidEntry(entry)),
      ...duplicates.map((id) => `${id} is already in the list`),
    ];
    this.error = problems.length > 0 ? problems.join("; ") : undefined;
    return accepted;
  }

  private start(): ActionOutcome {
    if (this.currentScreen !== "input") return rejected("A run can only start from the input screen");
    if (this.worker) return rejected("The previous run is still stopping");
    if (this.targets.length === 0) {
      this.error = "Add at least one target before starting";
      this.notify();
      return rejected(this.error);
    }

    const runId = ++this.nextRunId;
    const targets = [...this.targets];
    this.error = undefined;
    this.statusMessage = undefined;
    this.channel.clear();
    this.aggregator.begin(runId, targets);
    this.currentScreen = "running";
    logger.info(`run ${runId}: ${targets.length} ${this.currentMode} targets`);
    this.worker = startWorker({
      runId,
      targets,
      probe: this.options.probe,
      deadlineMs: this.options.config.timeoutMs,
      channel: this.channel,
      now: this.now,
    });
    return accepted;
  }

  private cancel(): ActionOutcome {
    if (this.currentScreen !== "running" || !this.worker) return rejected("No run in progress");
    if (this.worker.cancelRequested) return rejected("Already cancelling");
    this.worker.cancel();
    this.setStatus("Cancelling after the current target…", "info", Infinity);
    return accepted;
  }

  private finishRun(kind: "complete" | "cancelled"): void {
    this.worker = undefined;
    if (this.currentScreen === "running") this.currentScreen = "results";
    if (kind === "cancelled") this.setStatus("Benchmark cancelled", "info");
    else if (this.statusMessage?.expiresAt === Infinity) this.statusMessage = undefined;
  }

  private toggleMode(): ActionOutcome {
    if (this.currentScreen === "running") return rejected("Mode cannot change while a run is in progress");
    this.currentMode = this.currentMode === "dns" ? "mirror" : "dns";
    this.aggregator.clear();
    this.currentScreen = "input";
    this.error = undefined;
    this.statusMessage = undefined;
    if (this.currentMode === "mirror") this.seedMirrors();
    if (this.sortSpec.column === "label") this.sortSpec = defaultSort(this.options.config.bestBy);
    return accepted;
  }

  private seedMirrors(): void {
    if (this.mirrorsSeeded) return;
    this.mirrorsSeeded = true;
    if (this.targetsByMode.mirror.length === 0) this.targetsByMode.mirror = [...(this.options.mirrorSet ?? [])];
  }

  private applyBest(): ActionOutcome {
    if (this.currentMode !== "dns") return rejected("Only DNS results can be applied");
    if (this.currentScreen !== "results") return rejected("Finish a run before applying");
    if (this.applyInFlight) return rejected("Already applying");

    const best = this.best;
    if (!best) {
      const error = new PlatformMechanismError("no-candidate", "No successful target to apply");
      this.setStatus(error.message, "error");
      return accepted;
    }

    const address = best.target.identifier;
    this.applyInFlight = true;
    this.setStatus(`Setting system DNS to ${address}…`, "info", Infinity);
    this.track(
      this.options.applier
        .apply(address)
        .then((outcome) => {
          if (outcome.ok) {
            this.setStatus(`System DNS set to ${address} via ${outcome.mechanism}`, "success");
          } else {
            logger.warn(`apply ${address} failed (${outcome.error.kind}): ${outcome.error.message}`);
            this.setStatus(`Failed to set system DNS: ${outcome.error.message}`, "error");
          }
        })
        .catch((e: unknown) => {
          logger.error(`apply ${address} threw`, e);
          this.setStatus(`Failed to set system DNS: ${errorMessage(e)}`, "error");
        })
        .finally(() => {
          this.applyInFlight = false;
          this.notify();
        }),
    );
    return accepted;
  }

  private exportResults(): ActionOutcome {
    if (this.currentScreen !== "results") return rejected("Nothing to export yet");
    const csv = toResultsCsv(this.sortedResults);
    const name = exportFileName(this.currentMode, new Date(this.now()));
    this.track(
      this.saveCsv(csv, name)
        .then((path) => this.setStatus(`Exported results to ${path}`, "success"))
        .catch((e: unknown) => this.setStatus(`Export failed: ${errorMessage(e)}`, "error"))
        .finally(() => this.notify()),
    );
    return accepted;
  }

  private invalidEntry(entry: string): string {
    return this.currentMode === "dns" ? `Invalid IP address: ${entry}` : `Invalid URL: ${entry}`;
  }

  private announceLoad(count: number, skipped: number): void {
    this.setStatus(
      `Loaded ${count} target${count === 1 ? "" : "s"}` + (skipped > 0 ? ` (${skipped} malformed skipped)` : ""),
      skipped > 0 ? "error" : "info",
    );
  }

  private setStatus(text: string, tone: StatusTone, ttlMs: number = STATUS_TTL_MS): void {
    this.statusMessage = { text, tone, expiresAt: this.now() + ttlMs };
  }

  private track(task: Promise<void>): void {
    this.background.add(task);
    void task.finally(() => this.background.delete(task));
  }

  private notify(): void {
    for (const listener of this.listeners) listener();
  }
}

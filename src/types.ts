export type TargetKind = "dns" | "mirror";

export type Mode = TargetKind;

export type Screen = "input" | "running" | "results";

export type Target = {
  readonly identifier: string;
  readonly kind: TargetKind;
  readonly label?: string;
};

export type ProbeStatus =
  | { kind: "pending" }
  | { kind: "success" }
  | { kind: "timeout" }
  | { kind: "failed"; reason: string };

export type ProbeResult = {
  target: Target;
  index: number;
  status: ProbeStatus;
  latencyMs?: number;
  throughputMbps?: number;
  elapsedMs?: number;
  completedAt?: number;
};

export type ProbeMeasurement = {
  latencyMs: number;
  throughputMbps: number;
};

export type Probe = (target: Target, signal: AbortSignal) => Promise<ProbeMeasurement>;

export type RunStatus = "idle" | "running" | "cancelled" | "completed";

export type WorkerEvent =
  | { type: "result"; runId: number; result: ProbeResult }
  | { type: "progress"; runId: number; completed: number; total: number }
  | { type: "complete"; runId: number }
  | { type: "cancelled"; runId: number };

export type SortColumn = "identifier" | "latency" | "throughput" | "label";

export type SortDirection = "asc" | "desc";

export type SortSpec = {
  column: SortColumn;
  direction: SortDirection;
};

export type BestBy = "latency" | "throughput";

export type LoadReport = {
  targets: Target[];
  skipped: number;
};

export type StatusTone = "info" | "success" | "error";

export type StatusMessage = {
  text: string;
  tone: StatusTone;
  expiresAt: number;
};

export type ActionOutcome = { accepted: true } | { accepted: false; reason: string };

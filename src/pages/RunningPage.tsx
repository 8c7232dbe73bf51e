import { Box, Text } from "ink";
import ProgressBar from "../components/ProgressBar";
import { detail } from "../components/ResultsTable";
import type { ProbeResult, Target } from "../types";
import { fmtMbps, fmtMs } from "../utils/format";

const FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

type Props = {
  frame: number;
  completed: number;
  total: number;
  current?: Target;
  last?: ProbeResult;
  best?: ProbeResult;
  timeoutMs: number;
};

function describe(r: ProbeResult): string {
  return r.status.kind === "success"
    ? `${r.target.identifier}  ${fmtMs(r.latencyMs)}  ${fmtMbps(r.throughputMbps)}`
    : `${r.target.identifier}  ${detail(r)}`;
}

export default function RunningPage({ frame, completed, total, current, last, best, timeoutMs }: Props) {
  return (
    <Box flexDirection="column">
      <Box>
        <Text color="cyan">{`${FRAMES[frame % FRAMES.length]} `}</Text>
        <Text wrap="truncate-end">
          {current ? `Testing ${current.label ?? current.identifier}` : "Finishing…"}
        </Text>
        <Text dimColor>{`  (limit ${(timeoutMs / 1000).toFixed(1)}s per target)`}</Text>
      </Box>
      <Box marginTop={1}>
        <ProgressBar completed={completed} total={total} />
      </Box>
      <Box marginTop={1} flexDirection="column">
        <Text dimColor>Last result</Text>
        <Text wrap="truncate-end">{last ? describe(last) : "No tests completed yet."}</Text>
        <Text dimColor>Best so far</Text>
        <Text color="green" wrap="truncate-end">{best ? describe(best) : "Awaiting best result..."}</Text>
      </Box>
    </Box>
  );
}

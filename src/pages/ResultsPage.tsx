import { Box, Text } from "ink";
import ResultsTable from "../components/ResultsTable";
import type { Mode, ProbeResult, RunStatus, SortSpec } from "../types";
import { fmtMbps, fmtMs } from "../utils/format";

type Props = {
  mode: Mode;
  results: readonly ProbeResult[];
  sort: SortSpec;
  best?: ProbeResult;
  runStatus: RunStatus;
};

export default function ResultsPage({ mode, results, sort, best, runStatus }: Props) {
  const failed = results.filter((r) => r.status.kind !== "success").length;

  return (
    <Box flexDirection="column">
      <Text bold>
        {runStatus === "cancelled" ? "Results (cancelled)" : "Results"}
        <Text dimColor>{`  ${results.length - failed} ok, ${failed} failed or timed out`}</Text>
      </Text>
      <Box marginTop={1}>
        <ResultsTable mode={mode} results={results} sort={sort} best={best} />
      </Box>
      <Box marginTop={1}>
        {best ? (
          <Text color="green">
            {`Fastest: ${best.target.label ?? best.target.identifier}  ${fmtMs(best.latencyMs)}  ${fmtMbps(best.throughputMbps)}`}
          </Text>
        ) : (
          <Text color="yellow">No target completed successfully.</Text>
        )}
      </Box>
    </Box>
  );
}

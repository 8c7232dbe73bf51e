import { Box, Text } from "ink";
import type { Mode, Target } from "../types";

type Props = {
  mode: Mode;
  targets: readonly Target[];
  draft: string;
  error?: string;
};

export default function InputPage({ mode, targets, draft, error }: Props) {
  const noun = mode === "dns" ? "DNS server" : "mirror";

  return (
    <Box flexDirection="column">
      <Box flexDirection="column" borderStyle="round" borderColor="gray" paddingX={1}>
        <Text bold>{`Targets (${targets.length})`}</Text>
        {targets.map((t, i) => (
          <Text key={`${i}:${t.identifier}`} wrap="truncate-end">
            {`${String(i + 1).padStart(3)}. ${t.label ? `${t.label}  ` : ""}${t.identifier}`}
          </Text>
        ))}
        {targets.length === 0 && <Text dimColor>{`No ${noun}s yet. Type one below and press Enter.`}</Text>}
      </Box>
      <Box borderStyle="round" borderColor="cyan" paddingX={1}>
        <Text color="cyan">{mode === "dns" ? "DNS IP › " : "Mirror URL › "}</Text>
        <Text>{draft}</Text>
        <Text inverse> </Text>
      </Box>
      {error && <Text color="red">{error}</Text>}
    </Box>
  );
}

import { Box, Text } from "ink";

export default function KeyHints({ hints }: { hints: string[] }) {
  return (
    <Box marginTop={1}>
      <Text dimColor>{hints.join(" | ")}</Text>
    </Box>
  );
}

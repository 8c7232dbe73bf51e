import { Box, Text } from "ink";
import type { Mode } from "../types";

export default function ModeTabs({ current, distro }: { current: Mode; distro?: string }) {
  const item = (key: Mode, label: string) => {
    const active = current === key;
    return (
      <Text key={key} inverse={active} color={active ? "blue" : undefined} dimColor={!active}>
        {` ${label} `}
      </Text>
    );
  };

  return (
    <Box>
      {item("dns", "DNS Benchmark")}
      <Text> </Text>
      {item("mirror", distro ? `Mirrors · ${distro}` : "Mirrors")}
    </Box>
  );
}

import { Box, Text } from "ink";
import type { Mode } from "../types";
import ModeTabs from "./ModeTabs";

export default function Header({ mode, distro }: { mode: Mode; distro?: string }) {
  return (
    <Box justifyContent="space-between" paddingX={1} marginBottom={1}>
      <Box>
        <Text bold color="cyan">dnspeed</Text>
        <Text dimColor>{"  DNS & Mirror Benchmark"}</Text>
      </Box>
      <ModeTabs current={mode} distro={distro} />
    </Box>
  );
}

import { Text } from "ink";
import type { StatusMessage } from "../types";

const COLORS = { info: "cyan", success: "green", error: "red" } as const;

export default function StatusBanner({ status }: { status?: StatusMessage }) {
  if (!status) return null;
  return <Text color={COLORS[status.tone]}>{status.text}</Text>;
}

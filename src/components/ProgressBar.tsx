import { Text } from "ink";

type Props = {
  completed: number;
  total: number;
  width?: number;
};

export function progressLine(completed: number, total: number, width = 30): string {
  const ratio = total > 0 ? Math.min(1, completed / total) : 0;
  const filled = Math.round(ratio * width);
  return `${"█".repeat(filled)}${"░".repeat(width - filled)} ${completed}/${total}`;
}

export default function ProgressBar({ completed, total, width = 30 }: Props) {
  return <Text color="green">{progressLine(completed, total, width)}</Text>;
}

export const fmtMs = (v?: number) => (v == null ? "–" : v < 1 ? `${v.toFixed(1)} ms` : `${Math.round(v)} ms`);

export const fmtMbps = (v?: number) => (v == null ? "–" : `${v.toFixed(2)} Mbps`);

export function fit(text: string, width: number): string {
  if (text.length <= width) return text.padEnd(width);
  return `${text.slice(0, Math.max(0, width - 1))}…`;
}

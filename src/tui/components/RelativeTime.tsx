import { Text } from "ink";

export function formatRelative(isoDate: string, now: number = Date.now()): string {
  const then = new Date(isoDate).getTime();
  const diffMs = now - then;
  const diffSecs = Math.floor(diffMs / 1000);
  if (diffSecs < 60) return `${diffSecs}s ago`;
  const diffMins = Math.floor(diffSecs / 60);
  if (diffMins < 60) return `${diffMins}m ago`;
  const diffHours = Math.floor(diffMins / 60);
  if (diffHours < 24) return `${diffHours}h ago`;
  const diffDays = Math.floor(diffHours / 24);
  if (diffDays < 30) return `${diffDays}d ago`;
  const diffMonths = Math.floor(diffDays / 30);
  return `${diffMonths}mo ago`;
}

interface Props {
  isoDate: string;
  dimColor?: boolean;
}

export function RelativeTime({ isoDate, dimColor = false }: Props) {
  return <Text dimColor={dimColor}>{formatRelative(isoDate)}</Text>;
}

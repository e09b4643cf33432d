import { Text } from "ink";

export function StatusDot({ enabled }: { enabled: boolean }) {
  return <Text color={enabled ? "green" : "gray"}>●</Text>;
}

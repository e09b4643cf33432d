import { Box, Text, useInput } from "ink";

interface Props {
  message: string;
  onConfirm: () => void;
  onCancel: () => void;
  destructive?: boolean; // highlight the question, for deletions
}

/**
 * y/n question. Anything other than y, n or Esc is ignored.
 */
export function Confirm({ message, onConfirm, onCancel, destructive = false }: Props) {
  useInput((input, key) => {
    if (input === "y" || input === "Y") {
      onConfirm();
    } else if (input === "n" || input === "N" || key.escape) {
      onCancel();
    }
  });

  return (
    <Box flexDirection="column" marginTop={1}>
      <Text color={destructive ? "red" : undefined} bold={destructive}>
        {message}
      </Text>
      <Text dimColor>y: yes n: no Esc: cancel</Text>
    </Box>
  );
}

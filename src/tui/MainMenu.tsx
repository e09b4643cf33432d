import { Box, Text, useApp, useInput } from "ink";
import SelectInput from "ink-select-input";

export type Screen = "apps" | "archives";

interface MenuItem {
  label: string;
  value: Screen;
}

const items: MenuItem[] = [
  { label: "Deployed Apps", value: "apps" },
  { label: "Archived Data", value: "archives" },
];

interface Props {
  onSelect: (screen: Screen) => void;
}

export function MainMenu({ onSelect }: Props) {
  const { exit } = useApp();

  useInput((input) => {
    if (input === "q") {
      exit();
    }
  });

  return (
    <Box flexDirection="column" padding={1}>
      <Text bold>dockhand · Compose App Reconciler</Text>
      <Box marginTop={1}>
        <SelectInput<Screen> items={items} onSelect={(item) => onSelect(item.value)} />
      </Box>
      <Box marginTop={1}>
        <Text dimColor>↑/↓ navigate  Enter select  q quit</Text>
      </Box>
    </Box>
  );
}

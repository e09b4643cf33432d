import { Box } from "ink";
import { useState } from "react";
import type { WorkPaths } from "../core/paths.js";
import { AppsPanel } from "./AppsPanel.js";
import { ArchivesPanel } from "./ArchivesPanel.js";
import type { Screen } from "./MainMenu.js";
import { MainMenu } from "./MainMenu.js";

interface AppProps {
  paths: WorkPaths;
}

export function App({ paths }: AppProps) {
  const [screen, setScreen] = useState<Screen | "menu">("menu");

  switch (screen) {
    case "menu":
      return <MainMenu onSelect={setScreen} />;
    case "apps":
      return <AppsPanel paths={paths} onBack={() => setScreen("menu")} />;
    case "archives":
      return <ArchivesPanel paths={paths} onBack={() => setScreen("menu")} />;
    default:
      return <Box />;
  }
}

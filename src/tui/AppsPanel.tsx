import { Box, Text, useApp, useInput } from "ink";
import { useEffect, useState } from "react";
import type { WorkPaths } from "../core/paths.js";
import type { AppState } from "../core/state.js";
import { readState } from "../core/state.js";
import { RelativeTime } from "./components/RelativeTime.js";
import { StatusDot } from "./components/StatusDot.js";

interface AppEntry {
  name: string;
  app: AppState;
}

type Mode = "list" | "detail";

interface Props {
  paths: WorkPaths;
  onBack: () => void;
}

async function loadApps(paths: WorkPaths): Promise<AppEntry[]> {
  const state = await readState(paths.stateFile);
  return Object.entries(state.apps)
    .map(([name, app]) => ({ name, app }))
    .sort((a, b) => a.name.localeCompare(b.name));
}

export function AppsPanel({ paths, onBack }: Props) {
  const { exit } = useApp();

  const [mode, setMode] = useState<Mode>("list");
  const [entries, setEntries] = useState<AppEntry[]>([]);
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);
  const [selectedIdx, setSelectedIdx] = useState(0);

  useEffect(() => {
    loadApps(paths)
      .then((e) => {
        setEntries(e);
        setLoading(false);
      })
      .catch((err: unknown) => {
        setError(String(err));
        setLoading(false);
      });
  }, [paths]);

  // Poll so a run in another terminal shows up
  useEffect(() => {
    if (loading) return;
    const id = setInterval(() => {
      loadApps(paths)
        .then((next) => {
          setEntries((prev) => (JSON.stringify(prev) !== JSON.stringify(next) ? next : prev));
        })
        .catch((err: unknown) => setError(String(err)));
    }, 2000);
    return () => clearInterval(id);
  }, [loading, paths]);

  const current = entries[selectedIdx];

  useInput((input, key) => {
    if (error !== null) {
      if (input === "q") exit();
      else setError(null);
      return;
    }

    if (mode === "detail") {
      if (key.escape || key.return) setMode("list");
      else if (input === "q") exit();
      return;
    }

    if (key.escape) {
      onBack();
    } else if (input === "q") {
      exit();
    } else if (key.upArrow || input === "k") {
      setSelectedIdx((i) => Math.max(0, i - 1));
    } else if (key.downArrow || input === "j") {
      setSelectedIdx((i) => (entries.length === 0 ? 0 : Math.min(entries.length - 1, i + 1)));
    } else if (key.return && current) {
      setMode("detail");
    }
  });

  if (loading) {
    return (
      <Box flexDirection="column" padding={1}>
        <Text bold>Deployed Apps</Text>
        <Box marginTop={1}>
          <Text dimColor>Loading...</Text>
        </Box>
      </Box>
    );
  }

  if (error !== null) {
    return (
      <Box flexDirection="column" padding={1}>
        <Text bold>Deployed Apps</Text>
        <Box marginTop={1}>
          <Text color="red">Error: {error}</Text>
        </Box>
        <Box marginTop={1}>
          <Text dimColor>Press any key to continue, q to quit</Text>
        </Box>
      </Box>
    );
  }

  if (mode === "detail" && current) {
    const { name, app } = current;
    return (
      <Box flexDirection="column" padding={1}>
        <Text bold>{name}</Text>
        <Box marginTop={1} flexDirection="column">
          <Text>Enabled: {app.enabled ? "yes" : "no"}</Text>
          <Text>Revision: {app.revision ?? "unknown"}</Text>
          <Text>Fingerprint: {app.fingerprint}</Text>
          <Text>Deployed: {app.deployed_at}</Text>
          <Text>Data: {app.paths.data}</Text>
          <Text>Cache: {app.paths.cache}</Text>
          <Text>Checkout: {app.paths.repo}</Text>
        </Box>
        <Box marginTop={1}>
          <Text dimColor>Esc: back q: quit</Text>
        </Box>
      </Box>
    );
  }

  return (
    <Box flexDirection="column" padding={1}>
      <Text bold>Deployed Apps</Text>
      {entries.length === 0 ? (
        <Box marginTop={1}>
          <Text dimColor>No apps deployed yet.</Text>
        </Box>
      ) : (
        <Box marginTop={1} flexDirection="column">
          {entries.map(({ name, app }, i) => {
            const isSelected = i === selectedIdx;
            return (
              <Box key={name}>
                <Text color={isSelected ? "cyan" : undefined}>{isSelected ? "› " : "  "}</Text>
                <StatusDot enabled={app.enabled} />
                <Text bold={isSelected} color={isSelected ? "cyan" : undefined}>
                  {" "}
                  {name}
                </Text>
                {app.revision && <Text dimColor> {app.revision.slice(0, 7)}</Text>}
                <Text dimColor> </Text>
                <RelativeTime isoDate={app.deployed_at} dimColor />
              </Box>
            );
          })}
        </Box>
      )}
      <Box marginTop={1}>
        <Text dimColor>Enter: details Esc: back q: quit</Text>
      </Box>
    </Box>
  );
}

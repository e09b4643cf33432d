import { Box, Text, useApp, useInput } from "ink";
import { useEffect, useState } from "react";
import type { ArchiveEntry } from "../core/directories.js";
import { deleteArchive, listArchives } from "../core/directories.js";
import type { WorkPaths } from "../core/paths.js";
import { Confirm } from "./components/Confirm.js";
import { RelativeTime } from "./components/RelativeTime.js";

type Mode = "list" | "confirm_delete" | "deleting";

interface Props {
  paths: WorkPaths;
  onBack: () => void;
}

export function ArchivesPanel({ paths, onBack }: Props) {
  const { exit } = useApp();

  const [mode, setMode] = useState<Mode>("list");
  const [archives, setArchives] = useState<ArchiveEntry[]>([]);
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);
  const [selectedIdx, setSelectedIdx] = useState(0);

  const reload = () => {
    setLoading(true);
    setError(null);
    listArchives(paths)
      .then((a) => {
        setArchives(a);
        setSelectedIdx((i) => Math.min(i, Math.max(0, a.length - 1)));
        setLoading(false);
      })
      .catch((err: unknown) => {
        setError(String(err));
        setLoading(false);
      });
  };

  useEffect(() => {
    reload();
  }, []); // eslint-disable-line react-hooks/exhaustive-deps

  const current = archives[selectedIdx];

  const doDelete = () => {
    if (!current) return;
    setMode("deleting");
    deleteArchive(paths, current.name)
      .then(() => {
        setMode("list");
        reload();
      })
      .catch((err: unknown) => {
        setError(String(err));
        setMode("list");
      });
  };

  useInput(
    (input, key) => {
      if (error !== null) {
        if (input === "q") exit();
        else setError(null);
        return;
      }

      if (key.escape) {
        onBack();
      } else if (input === "q") {
        exit();
      } else if (key.upArrow || input === "k") {
        setSelectedIdx((i) => Math.max(0, i - 1));
      } else if (key.downArrow || input === "j") {
        setSelectedIdx((i) => (archives.length === 0 ? 0 : Math.min(archives.length - 1, i + 1)));
      } else if (input === "d" && current) {
        setMode("confirm_delete");
      }
    },
    { isActive: mode === "list" },
  );

  if (loading) {
    return (
      <Box flexDirection="column" padding={1}>
        <Text bold>Archived Data</Text>
        <Box marginTop={1}>
          <Text dimColor>Loading...</Text>
        </Box>
      </Box>
    );
  }

  if (error !== null) {
    return (
      <Box flexDirection="column" padding={1}>
        <Text bold>Archived Data</Text>
        <Box marginTop={1}>
          <Text color="red">Error: {error}</Text>
        </Box>
        <Box marginTop={1}>
          <Text dimColor>Press any key to continue, q to quit</Text>
        </Box>
      </Box>
    );
  }

  if (mode === "deleting") {
    return (
      <Box flexDirection="column" padding={1}>
        <Text bold>Archived Data</Text>
        <Box marginTop={1}>
          <Text>Deleting {current?.name}...</Text>
        </Box>
      </Box>
    );
  }

  return (
    <Box flexDirection="column" padding={1}>
      <Text bold>Archived Data</Text>
      {archives.length === 0 ? (
        <Box marginTop={1}>
          <Text dimColor>No archived data.</Text>
        </Box>
      ) : (
        <Box marginTop={1} flexDirection="column">
          {archives.map((a, i) => {
            const isSelected = i === selectedIdx;
            return (
              <Box key={a.name}>
                <Text color={isSelected ? "cyan" : undefined}>{isSelected ? "› " : "  "}</Text>
                <Text bold={isSelected} color={isSelected ? "cyan" : undefined}>
                  {a.name}
                </Text>
                <Text dimColor> ({a.app}, </Text>
                <RelativeTime isoDate={a.archivedAt} dimColor />
                <Text dimColor>)</Text>
              </Box>
            );
          })}
        </Box>
      )}
      {mode === "confirm_delete" && current ? (
        <Confirm
          message={`Delete ${current.name}? This cannot be undone.`}
          onConfirm={doDelete}
          onCancel={() => setMode("list")}
          destructive
        />
      ) : (
        <Box marginTop={1}>
          <Text dimColor>d: delete Esc: back q: quit</Text>
        </Box>
      )}
    </Box>
  );
}

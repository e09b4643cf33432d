import { render } from "ink-testing-library";
import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../../src/core/directories.js", () => ({
  listArchives: vi.fn(),
  deleteArchive: vi.fn(),
}));

import { deleteArchive, listArchives } from "../../src/core/directories.js";
import { workPaths } from "../../src/core/paths.js";
import { ArchivesPanel } from "../../src/tui/ArchivesPanel.js";

const mockPaths = workPaths("/fake/dockhand");

function waitForEffects(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 20));
}

const archives = [
  {
    name: "web-2026-02-22_10-00-00",
    path: "/fake/dockhand/archives/web-2026-02-22_10-00-00",
    app: "web",
    archivedAt: "2026-02-22T10:00:00.000Z",
  },
  {
    name: "db-2026-02-01_10-00-00",
    path: "/fake/dockhand/archives/db-2026-02-01_10-00-00",
    app: "db",
    archivedAt: "2026-02-01T10:00:00.000Z",
  },
];

describe("ArchivesPanel", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(deleteArchive).mockResolvedValue(undefined);
  });

  it("shows empty state when nothing was archived", async () => {
    vi.mocked(listArchives).mockResolvedValue([]);
    const { lastFrame } = render(<ArchivesPanel paths={mockPaths} onBack={() => {}} />);
    await waitForEffects();
    expect(lastFrame()).toContain("No archived data.");
  });

  it("lists archives", async () => {
    vi.mocked(listArchives).mockResolvedValue(archives);
    const { lastFrame } = render(<ArchivesPanel paths={mockPaths} onBack={() => {}} />);
    await waitForEffects();
    const frame = lastFrame() ?? "";
    expect(frame).toContain("web-2026-02-22_10-00-00");
    expect(frame).toContain("db-2026-02-01_10-00-00");
    expect(frame).toContain("d: delete");
  });

  it("deletes the selected archive after confirmation", async () => {
    vi.mocked(listArchives).mockResolvedValue(archives);
    const { lastFrame, stdin } = render(<ArchivesPanel paths={mockPaths} onBack={() => {}} />);
    await waitForEffects();
    stdin.write("j");
    await waitForEffects();
    stdin.write("d");
    await waitForEffects();
    expect(lastFrame()).toContain("Delete db-2026-02-01_10-00-00? This cannot be undone.");
    stdin.write("y");
    await waitForEffects();
    expect(deleteArchive).toHaveBeenCalledWith(mockPaths, "db-2026-02-01_10-00-00");
  });

  it("keeps the archive when the deletion is declined", async () => {
    vi.mocked(listArchives).mockResolvedValue(archives);
    const { stdin } = render(<ArchivesPanel paths={mockPaths} onBack={() => {}} />);
    await waitForEffects();
    stdin.write("d");
    await waitForEffects();
    stdin.write("n");
    await waitForEffects();
    expect(deleteArchive).not.toHaveBeenCalled();
  });
});

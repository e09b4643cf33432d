import { describe, expect, it } from "vitest";
import { computeFingerprint, detectAction } from "../../src/core/fingerprint.js";
import type { RenderedArtifact } from "../../src/core/render.js";
import type { AppState } from "../../src/core/state.js";

function artifact(content: string, environment: Record<string, string> = {}): RenderedArtifact {
  return {
    fragments: [{ source: "docker-compose.yml", content }],
    content,
    replacements: {},
    environment,
  };
}

function previous(fingerprint: string, enabled: boolean): AppState {
  return {
    fingerprint,
    enabled,
    revision: null,
    deployed_at: "2024-01-01T00:00:00.000Z",
    updated_at: "2024-01-01T00:00:00.000Z",
    paths: { data: "", cache: "", repo: "" },
  };
}

describe("computeFingerprint", () => {
  it("is a hex SHA-256", () => {
    expect(computeFingerprint("web", artifact("a"), true)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("is stable for identical input", () => {
    expect(computeFingerprint("web", artifact("a", { X: "1" }), true)).toBe(
      computeFingerprint("web", artifact("a", { X: "1" }), true),
    );
  });

  it("ignores environment key order", () => {
    expect(computeFingerprint("web", artifact("a", { X: "1", Y: "2" }), true)).toBe(
      computeFingerprint("web", artifact("a", { Y: "2", X: "1" }), true),
    );
  });

  it("changes with content, environment, name and enabled flag", () => {
    const base = computeFingerprint("web", artifact("a", { X: "1" }), true);
    expect(computeFingerprint("web", artifact("b", { X: "1" }), true)).not.toBe(base);
    expect(computeFingerprint("web", artifact("a", { X: "2" }), true)).not.toBe(base);
    expect(computeFingerprint("api", artifact("a", { X: "1" }), true)).not.toBe(base);
    expect(computeFingerprint("web", artifact("a", { X: "1" }), false)).not.toBe(base);
  });

  it("distinguishes how content is split across fragments", () => {
    const one: RenderedArtifact = { ...artifact("ab"), fragments: [{ source: "a.yml", content: "ab" }] };
    const two: RenderedArtifact = {
      ...artifact("ab"),
      fragments: [
        { source: "a.yml", content: "a" },
        { source: "b.yml", content: "b" },
      ],
    };
    expect(computeFingerprint("web", one, true)).not.toBe(computeFingerprint("web", two, true));
  });
});

describe("detectAction", () => {
  it.each([
    [true, undefined, "f", false, "deploy"],
    [true, previous("f", true), "f", false, "none"],
    [true, previous("f", true), "g", false, "restart"],
    [true, previous("f", true), "f", true, "restart"],
    [true, previous("f", false), "f", false, "start"],
    [true, previous("f", false), "g", false, "restart"],
    [true, previous("f", false), "f", true, "restart"],
    [false, previous("f", true), null, false, "stop"],
    [false, previous("f", false), null, false, "none"],
    [false, undefined, null, false, "none"],
  ] as const)("enabled=%s previous=%o fingerprint=%s force=%s → %s", (enabled, prev, fingerprint, force, expected) => {
    expect(detectAction({ enabled, previous: prev, fingerprint, force })).toBe(expected);
  });
});

import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { z } from "zod";
import type { ArtifactStore, ArtifactWriteResult } from "./artifact-store.js";
import { ErrorCode, ReportError } from "./errors.js";
import { emitArtifacts, exitCodeFor, failAll, mergeRunResults, type ArtifactJob } from "./report-run.js";

class MemoryStore implements ArtifactStore {
  readonly files = new Map<string, unknown>();

  async write(name: string, payload: unknown): Promise<ArtifactWriteResult> {
    if (name === "readonly") throw new Error("EACCES");
    this.files.set(name, payload);
    return { name, path: `memory://${name}.json`, sizeBytes: 1, checksum: "test-checksum" };
  }
}

const countSchema = z.object({ n: z.number() });

describe("report-run", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("emitArtifacts", () => {
    it("keeps writing after a failed artifact", async () => {
      const store = new MemoryStore();
      const jobs: ArtifactJob[] = [
        { name: "first", schema: countSchema, build: () => ({ n: 1 }) },
        { name: "invalid", schema: countSchema, build: () => ({ n: "one" }) },
        {
          name: "crashed",
          schema: countSchema,
          build: () => {
            throw new Error("boom");
          },
        },
        { name: "readonly", schema: countSchema, build: () => ({ n: 3 }) },
        { name: "last", schema: countSchema, build: () => ({ n: 4 }) },
      ];

      const result = await emitArtifacts(store, jobs, "test");

      expect(result.written.map((w) => w.name)).toEqual(["first", "last"]);
      expect(result.failed.map((f) => [f.name, f.code])).toEqual([
        ["invalid", ErrorCode.ARTIFACT_INVALID],
        ["crashed", ErrorCode.ARTIFACT_INVALID],
        ["readonly", ErrorCode.ARTIFACT_WRITE_FAILED],
      ]);
      expect(result.failed[1]?.error).toBe("boom");
      expect(result.failed[0]?.details).toEqual({ issues: ["n: Expected number, received string"] });
      expect([...store.files.keys()]).toEqual(["first", "last"]);
      expect(console.error).toHaveBeenCalledTimes(3);
    });

    it("writes the payload as built", async () => {
      const store = new MemoryStore();
      await emitArtifacts(store, [{ name: "extra", schema: countSchema, build: () => ({ n: 1, note: "kept" }) }], "test");
      expect(store.files.get("extra")).toEqual({ n: 1, note: "kept" });
    });
  });

  describe("failAll", () => {
    it("records one failure per artifact", () => {
      const err = new ReportError(ErrorCode.WORKOUT_SOURCE_UNAVAILABLE, "Workout cache not found");
      expect(failAll(["a", "b"], err, ErrorCode.ARTIFACT_INVALID)).toEqual({
        written: [],
        failed: [
          { name: "a", code: "WORKOUT_SOURCE_UNAVAILABLE", error: "Workout cache not found" },
          { name: "b", code: "WORKOUT_SOURCE_UNAVAILABLE", error: "Workout cache not found" },
        ],
      });
    });
  });

  describe("exitCodeFor", () => {
    const written: ArtifactWriteResult = { name: "a", path: "a.json", sizeBytes: 2, checksum: "x" };
    const failed = { name: "b", code: ErrorCode.ARTIFACT_INVALID, error: "bad" };

    it("maps complete, partial and empty runs", () => {
      expect(exitCodeFor({ written: [written], failed: [] })).toBe(0);
      expect(exitCodeFor({ written: [written], failed: [failed] })).toBe(2);
      expect(exitCodeFor({ written: [], failed: [failed] })).toBe(1);
    });

    it("merges runs in order", () => {
      const merged = mergeRunResults({ written: [written], failed: [] }, { written: [], failed: [failed] });
      expect(merged).toEqual({ written: [written], failed: [failed] });
      expect(exitCodeFor(merged)).toBe(2);
    });
  });
});

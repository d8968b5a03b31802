import type { ZodTypeAny } from "zod";
import type { ArtifactStore, ArtifactWriteResult } from "./artifact-store.js";
import { artifactFileName } from "./artifact-store.js";
import type { ReporterConfig } from "./config.js";
import { ErrorCode, ReportError, toErrorBody, type ErrorCodeType } from "./errors.js";

/** Everything a report generator needs. `now` is read once per process. */
export interface ReportContext {
  config: ReporterConfig;
  store: ArtifactStore;
  now: Date;
}

export interface FailedArtifact {
  name: string;
  code: ErrorCodeType;
  error: string;
  details?: object;
}

export interface RunResult {
  written: ArtifactWriteResult[];
  failed: FailedArtifact[];
}

export interface ArtifactJob {
  name: string;
  schema: ZodTypeAny;
  build: () => unknown;
}

export function mergeRunResults(...results: RunResult[]): RunResult {
  return {
    written: results.flatMap((r) => r.written),
    failed: results.flatMap((r) => r.failed),
  };
}

/**
 * Build, validate and write each artifact in turn. A failing artifact is
 * logged and recorded; the remaining ones are still written.
 */
export async function emitArtifacts(
  store: ArtifactStore,
  jobs: readonly ArtifactJob[],
  tag: string,
): Promise<RunResult> {
  const result: RunResult = { written: [], failed: [] };

  for (const job of jobs) {
    const fileName = artifactFileName(job.name);
    let stage: ErrorCodeType = ErrorCode.ARTIFACT_INVALID;
    try {
      const payload = job.build();
      const parsed = job.schema.safeParse(payload);
      if (!parsed.success) {
        throw new ReportError(ErrorCode.ARTIFACT_INVALID, `${fileName} failed validation`, {
          issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
        });
      }
      stage = ErrorCode.ARTIFACT_WRITE_FAILED;
      const written = await store.write(job.name, payload);
      result.written.push(written);
      console.log(`[${tag}] ✓ ${fileName}`);
    } catch (err) {
      const body = toErrorBody(err, stage);
      result.failed.push({ name: job.name, ...body });
      console.error(`[${tag}] ✗ ${fileName} (${body.code}): ${body.error}`);
    }
  }

  return result;
}

/** Record every named artifact as failed with the same cause. */
export function failAll(names: readonly string[], err: unknown, fallback: ErrorCodeType): RunResult {
  const body = toErrorBody(err, fallback);
  return { written: [], failed: names.map((name) => ({ name, ...body })) };
}

/** 0 when everything was written, 1 when nothing was, 2 for a partial run. */
export function exitCodeFor(result: RunResult): number {
  if (result.written.length === 0) return 1;
  return result.failed.length > 0 ? 2 : 0;
}

/**
 * Artifact Store
 *
 * Storage interface for the JSON documents the dashboard reads. Report
 * generators write through this adapter, never to the filesystem directly.
 */

import { createHash } from "node:crypto";
import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { ErrorCode, ReportError } from "./errors.js";

export interface ArtifactWriteResult {
  name: string;
  path: string;
  sizeBytes: number;
  checksum: string;
}

export interface ArtifactStore {
  write(name: string, payload: unknown): Promise<ArtifactWriteResult>;
}

export function artifactFileName(name: string): string {
  return `${name}.json`;
}

/** Pretty-printed JSON, two-space indent, trailing newline. */
export function serializeArtifact(payload: unknown): Buffer {
  return Buffer.from(`${JSON.stringify(payload, null, 2)}\n`, "utf8");
}

/**
 * Local filesystem store. The directory is created on first write.
 */
export class LocalArtifactStore implements ArtifactStore {
  private basePath: string;

  constructor(basePath: string) {
    this.basePath = basePath;
  }

  async write(name: string, payload: unknown): Promise<ArtifactWriteResult> {
    const filePath = join(this.basePath, artifactFileName(name));
    const data = serializeArtifact(payload);
    try {
      mkdirSync(this.basePath, { recursive: true });
      writeFileSync(filePath, data);
    } catch (err) {
      throw new ReportError(ErrorCode.ARTIFACT_WRITE_FAILED, `Cannot write ${filePath}`, {
        cause: String(err),
      });
    }
    const checksum = createHash("sha256").update(data).digest("hex");
    return { name, path: filePath, sizeBytes: data.length, checksum };
  }
}

import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { errorMessage, Logger } from "../config/logger";
import { CandidateRecord } from "../shared/types/domain.types";

export interface CandidateStore {
  appendCandidate(record: CandidateRecord): Promise<void>;
}

/**
 * Candidates live in one JSON array file. Each append is a full
 * read-modify-write with no locking, so only one writer may use a file.
 */
export class CandidateStorageService implements CandidateStore {
  constructor(
    private readonly filePath: string,
    private readonly logger?: Logger,
  ) {}

  getFilePath(): string {
    return this.filePath;
  }

  async appendCandidate(record: CandidateRecord): Promise<void> {
    const records = await this.readRecords();
    records.push(record);
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(records, null, 2), "utf-8");
    this.logger?.info("candidate.saved", {
      filePath: this.filePath,
      total: records.length,
    });
  }

  async listCandidates(): Promise<CandidateRecord[]> {
    return this.readRecords();
  }

  // Unreadable or malformed content counts as an empty collection.
  private async readRecords(): Promise<CandidateRecord[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (!isNotFound(error)) {
        this.logger?.warn("candidate.store.read_failed", {
          filePath: this.filePath,
          error: errorMessage(error),
        });
      }
      return [];
    }

    const parsed = tryParseJson(raw);
    if (parsed.ok && Array.isArray(parsed.data)) {
      return parsed.data as CandidateRecord[];
    }
    this.logger?.warn("candidate.store.corrupt_file_reset", { filePath: this.filePath });
    return [];
  }
}

function tryParseJson(raw: string): { ok: true; data: unknown } | { ok: false } {
  try {
    return { ok: true, data: JSON.parse(raw) };
  } catch {
    return { ok: false };
  }
}

function isNotFound(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

import assert from "node:assert/strict";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { after, before, describe, it } from "node:test";
import { CandidateStorageService } from "../../storage/candidate-storage.service";
import { CandidateRecord } from "../../shared/types/domain.types";

function candidate(name: string): CandidateRecord {
  return {
    name,
    email: `${name.toLowerCase()}@example.com`,
    phone: "+1234567890",
    experience: 3,
    position: "Developer",
    location: "Test City",
    tech_stack: ["Python", "Django"],
    questions: [],
  };
}

describe("CandidateStorageService", () => {
  let dir = "";

  before(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "candidates-"));
  });

  after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads back N appended records in order", async () => {
    const filePath = path.join(dir, "nested", "candidates.json");
    const store = new CandidateStorageService(filePath);

    for (const name of ["Ann", "Ben", "Cai"]) {
      await store.appendCandidate(candidate(name));
    }

    const records = await store.listCandidates();
    assert.deepEqual(
      records.map((record) => record.name),
      ["Ann", "Ben", "Cai"],
    );
    const raw = await readFile(filePath, "utf-8");
    assert.equal(raw, JSON.stringify(records, null, 2));
  });

  it("treats unparsable content as an empty collection", async () => {
    const filePath = path.join(dir, "corrupt.json");
    await writeFile(filePath, "{ not json", "utf-8");
    const store = new CandidateStorageService(filePath);

    await store.appendCandidate(candidate("Dee"));

    assert.deepEqual(await store.listCandidates(), [candidate("Dee")]);
  });

  it("treats a non-array document as empty", async () => {
    const filePath = path.join(dir, "object.json");
    await writeFile(filePath, JSON.stringify({ name: "stale" }), "utf-8");
    const store = new CandidateStorageService(filePath);
    assert.deepEqual(await store.listCandidates(), []);
  });
});

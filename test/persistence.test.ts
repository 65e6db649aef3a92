import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { createMatch, hashMatch, playShot, tryBeginShot } from "../src/engine";
import { hasPersistedTable, loadTable, saveTable } from "../src/server/persistence";

describe("table persistence", () => {
  let dir: string;
  let filePath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "carrom-persist-"));
    filePath = path.join(dir, "nested", "T1.json");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("saves and loads a match with the same hash", () => {
    const match = createMatch();
    playShot(match, { angle: -Math.PI / 2, power: 1 });

    expect(hasPersistedTable({ filePath })).toBe(false);
    const saved = saveTable(match, { filePath });
    expect(hasPersistedTable({ filePath })).toBe(true);

    const loaded = loadTable({ filePath });

    expect(saved.version).toBe(1);
    expect(saved.stateHash).toBe(hashMatch(match));
    expect(hashMatch(loaded)).toBe(hashMatch(match));
  });

  it("refuses to save while a shot is in flight", () => {
    const match = createMatch();
    tryBeginShot(match, { angle: 0, power: 0.5 });

    expect(() => saveTable(match, { filePath })).toThrow("Cannot save while a shot is in flight.");
    expect(hasPersistedTable({ filePath })).toBe(false);
  });

  it("detects a tampered save", () => {
    saveTable(createMatch(), { filePath });
    const payload = JSON.parse(fs.readFileSync(filePath, "utf8"));
    payload.snapshot.state.scores[0] = 9;
    fs.writeFileSync(filePath, JSON.stringify(payload), "utf8");

    expect(() => loadTable({ filePath })).toThrow("Persisted table hash mismatch.");
  });

  it("rejects an unknown version", () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify({ version: 2 }), "utf8");

    expect(() => loadTable({ filePath })).toThrow("Unsupported persisted table version: 2");
  });
});

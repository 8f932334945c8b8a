import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";

import {
  countRuns,
  listModels,
  listVersions,
  parseTrainingHistory,
  readTrainingHistory,
  serializeTrainingHistory
} from "./read-ledger.js";
import { makeRun, makeTmpDir, sampleDocument, writeJson } from "../test-utils.js";

describe("parseTrainingHistory", () => {
  it("keeps model and version order from the document", () => {
    const history = parseTrainingHistory(sampleDocument());

    expect(listModels(history)).toEqual(["resnet18", "mobilenet"]);
    expect(listVersions(history, "resnet18")).toEqual(["v0", "v1"]);
    expect(listVersions(history, "unknown")).toEqual([]);
    expect(countRuns(history)).toBe(3);
    expect(history.scriptAuthors.get("train.py")).toEqual(["alice", "bob"]);
  });

  it("serializes back to the same document with script_authors last", () => {
    const document = sampleDocument();
    const serialized = serializeTrainingHistory(parseTrainingHistory(document));

    expect(serialized).toEqual(document);
    expect(Object.keys(serialized)).toEqual(["resnet18", "mobilenet", "script_authors"]);
    expect(Object.keys(serialized.resnet18)).toEqual(["v0", "v1"]);
  });

  it("reports a missing required field with its location", () => {
    const { contributor: _dropped, ...withoutContributor } = makeRun();
    const broken = { ...sampleDocument(), resnet18: { v0: withoutContributor } };

    expect(() => parseTrainingHistory(broken)).toThrow(
      "training_history/resnet18/v0: must have required property 'contributor'"
    );
  });

  it("rejects accuracies that are not plain decimals", () => {
    const broken = { ...sampleDocument(), mobilenet: { v0: makeRun({ validation_accuracy: "72%" }) } };

    expect(() => parseTrainingHistory(broken)).toThrow(
      "training_history/mobilenet/v0/validation_accuracy: must match pattern"
    );
  });

  it("rejects log links that are not URIs", () => {
    const broken = { ...sampleDocument(), mobilenet: { v0: makeRun({ tensorboard_logs: "not a link" }) } };

    expect(() => parseTrainingHistory(broken)).toThrow(
      'training_history/mobilenet/v0/tensorboard_logs: must match format "uri"'
    );
  });

  it("rejects version labels outside the vN form", () => {
    const broken = { ...sampleDocument(), mobilenet: { v01: makeRun() } };
    expect(() => parseTrainingHistory(broken)).toThrow("training_history/mobilenet: must match pattern");
  });

  it("requires the script_authors table", () => {
    const { script_authors: _authors, ...rest } = sampleDocument();
    expect(() => parseTrainingHistory(rest)).toThrow(
      "training_history: must have required property 'script_authors'"
    );
  });
});

describe("readTrainingHistory", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = makeTmpDir();
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("reads a ledger from disk", () => {
    const path = writeJson(tmpDir, "training_history.json", sampleDocument());
    expect(countRuns(readTrainingHistory(path))).toBe(3);
  });

  it("names the path of a missing file", () => {
    const path = join(tmpDir, "absent.json");
    expect(() => readTrainingHistory(path)).toThrow(`File not found: ${path}`);
  });

  it("names the path of malformed JSON", () => {
    const path = join(tmpDir, "broken.json");
    writeFileSync(path, "{ not json", "utf8");
    expect(() => readTrainingHistory(path)).toThrow(`Malformed JSON in ${path}`);
  });

  it("prefixes schema failures with the path", () => {
    const path = writeJson(tmpDir, "bad.json", { script_authors: [] });
    expect(() => readTrainingHistory(path)).toThrow(`Invalid training history ${path}:`);
  });
});

import { describe, it, expect } from "vitest";

import { bestRun, isAccuracyInRange, lookupRun, parseAccuracy } from "./lookup.js";
import { parseTrainingHistory } from "./read-ledger.js";
import { makeRun, sampleDocument } from "../test-utils.js";

const history = () => parseTrainingHistory(sampleDocument());

describe("parseAccuracy", () => {
  it("accepts plain decimals", () => {
    expect(parseAccuracy("0.7713")).toBe(0.7713);
    expect(parseAccuracy("1")).toBe(1);
    expect(parseAccuracy("0")).toBe(0);
  });

  it("rejects signs, exponents and bare dots", () => {
    expect(parseAccuracy("-0.5")).toBeNull();
    expect(parseAccuracy("1e-1")).toBeNull();
    expect(parseAccuracy(".5")).toBeNull();
    expect(parseAccuracy("")).toBeNull();
  });
});

describe("isAccuracyInRange", () => {
  it("accepts the closed unit interval", () => {
    for (const text of ["0", "0.0", "0.7713", "00.5", "1", "1.0", "1.000"]) {
      expect(isAccuracyInRange(text)).toBe(true);
    }
  });

  it("rejects values above 1 even when they round to 1", () => {
    for (const text of ["1.00000000000000001", "1.5", "2", "10.0"]) {
      expect(isAccuracyInRange(text)).toBe(false);
    }
  });
});

describe("lookupRun", () => {
  it("returns the requested version with its script authors", () => {
    const result = lookupRun(history(), "resnet18", "v0");

    expect(result.version).toBe("v0");
    expect(result.record.contributor).toBe("alice");
    expect(result.accuracy).toBe(0.6512);
    expect(result.authors).toEqual(["alice", "bob"]);
  });

  it("resolves latest to the highest version", () => {
    expect(lookupRun(history(), "resnet18").version).toBe("v1");
    expect(lookupRun(history(), "resnet18", "latest").record.contributor).toBe("bob");
  });

  it("orders latest by suffix rather than position", () => {
    const document = { ...sampleDocument(), resnet18: { v10: makeRun(), v9: makeRun({ contributor: "bob" }) } };
    expect(lookupRun(parseTrainingHistory(document), "resnet18").version).toBe("v10");
  });

  it("lists known models when the name is unknown", () => {
    expect(() => lookupRun(history(), "vgg16")).toThrow("Unknown model: vgg16 (known: mobilenet, resnet18)");
  });

  it("reports unknown and malformed versions", () => {
    expect(() => lookupRun(history(), "mobilenet", "v3")).toThrow("Unknown version v3 for model mobilenet");
    expect(() => lookupRun(history(), "mobilenet", "3")).toThrow("Invalid version label: 3");
  });

  it("reports a model without runs", () => {
    const document = { ...sampleDocument(), empty: {} };
    expect(() => lookupRun(parseTrainingHistory(document), "empty")).toThrow("Model empty has no recorded runs");
  });

  it("returns a copy of the authors list", () => {
    const ledger = history();
    lookupRun(ledger, "mobilenet").authors.push("mallory");
    expect(ledger.scriptAuthors.get("distill.py")).toEqual(["carol"]);
  });
});

describe("bestRun", () => {
  it("picks the most accurate version", () => {
    expect(bestRun(history(), "resnet18")?.version).toBe("v1");
  });

  it("keeps the earlier version on ties", () => {
    const document = {
      ...sampleDocument(),
      resnet18: { v0: makeRun({ validation_accuracy: "0.70" }), v1: makeRun({ validation_accuracy: "0.7" }) }
    };
    expect(bestRun(parseTrainingHistory(document), "resnet18")?.version).toBe("v0");
  });

  it("returns undefined for a model without runs", () => {
    const document = { ...sampleDocument(), empty: {} };
    expect(bestRun(parseTrainingHistory(document), "empty")).toBeUndefined();
  });
});

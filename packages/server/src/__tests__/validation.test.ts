import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { z } from "zod";
import { ValidationError } from "../errors.js";
import { parseClusterName, parseWith } from "../validation.js";

describe("parseClusterName", () => {
  it("accepts lowercase names with inner hyphens", () => {
    assert.equal(parseClusterName("train-01"), "train-01");
    assert.equal(parseClusterName("a"), "a");
  });

  for (const bad of ["", "Train", "-train", "train-", "train_01", "a/b"]) {
    it(`rejects "${bad}"`, () => {
      assert.throws(() => parseClusterName(bad), ValidationError);
    });
  }

  it("rejects names over 120 characters", () => {
    assert.throws(() => parseClusterName("a".repeat(121)), {
      message: "Cluster name is 121 characters; the limit is 120",
    });
  });
});

describe("parseWith", () => {
  const schema = z.object({ targetCount: z.number().int().positive() });

  it("returns the parsed value", () => {
    assert.deepEqual(parseWith(schema, { targetCount: 2 }, "request"), { targetCount: 2 });
  });

  it("names the failing field", () => {
    assert.throws(() => parseWith(schema, { targetCount: "2" }, "request"), {
      name: "ValidationError",
      message: "Invalid request: targetCount: Expected number, received string",
    });
  });
});

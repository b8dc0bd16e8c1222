import { describe, expect, it } from "vitest";
import {
  buildCriteriaSet,
  buildCriteriaSetStrict,
  criteriaForItems
} from "../lib/criteria/criteriaSet";
import { createMemoryCriteriaStore, loadCriteriaEntries } from "../lib/criteria/criteriaStore";
import { parseCriteriaJson, parseCriteriaRecords, serializeCriteria } from "../lib/criteria/format";
import { ConfigurationError, CriteriaFormatError } from "../lib/errors";
import { captureError, warpCriterion } from "./helpers";

describe("criteria set construction", () => {
  it("accepts valid bounds and refuses inverted or non-finite ones", () => {
    const result = buildCriteriaSet([
      warpCriterion,
      { itemNumber: "A001", resultName: "Dim Stab Fill", lowerBound: 2, upperBound: 1 },
      { itemNumber: "B002", resultName: "Dim Stab Warp", lowerBound: Number.NaN, upperBound: 1 }
    ]);

    expect(result.accepted).toEqual([warpCriterion]);
    expect(result.rejected).toHaveLength(2);
    expect(result.rejected[0].error).toBeInstanceOf(ConfigurationError);
    expect(result.rejected[0].error.message).toBe(
      "Invalid bounds for A001 / Dim Stab Fill: lower bound 2 is greater than upper bound 1"
    );
    expect(result.rejected[1].error.message).toBe(
      "Invalid bounds for B002 / Dim Stab Warp: bounds must be finite numbers"
    );
    expect(result.criteria.size).toBe(1);
    expect(result.criteria.lookup("A001", "Dim Stab Warp")).toEqual({ lower: -4.75, upper: -2.75 });
    expect(result.criteria.lookup("A001", "Dim Stab Fill")).toBeUndefined();
  });

  it("matches keys exactly", () => {
    const { criteria } = buildCriteriaSet([warpCriterion]);

    expect(criteria.lookup("a001", "Dim Stab Warp")).toBeUndefined();
    expect(criteria.lookup("A001", "dim stab warp")).toBeUndefined();
    expect(criteria.lookup("A001 ", "Dim Stab Warp")).toBeUndefined();
  });

  it("allows a zero-width bound", () => {
    const { rejected } = buildCriteriaSet([
      { itemNumber: "A001", resultName: "Thickness", lowerBound: 3, upperBound: 3 }
    ]);

    expect(rejected).toEqual([]);
  });

  it("lets a later entry replace an earlier one", () => {
    const { criteria } = buildCriteriaSet([
      { ...warpCriterion, lowerBound: 0, upperBound: 1 },
      { ...warpCriterion, lowerBound: 2, upperBound: 3 }
    ]);

    expect(criteria.size).toBe(1);
    expect(criteria.lookup("A001", "Dim Stab Warp")).toEqual({ lower: 2, upper: 3 });
  });

  it("throws the first refusal in strict mode", () => {
    const error = captureError(() =>
      buildCriteriaSetStrict([
        warpCriterion,
        { itemNumber: "A001", resultName: "Dim Stab Fill", lowerBound: 5, upperBound: -5 }
      ])
    );

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({
      code: "CONFIGURATION_ERROR",
      criterion: { itemNumber: "A001", resultName: "Dim Stab Fill" }
    });
  });

  it("expands test-type bounds to every selected product", () => {
    const entries = criteriaForItems(
      ["A001", "B002", "A001"],
      [{ resultName: "Dim Stab Warp", lowerBound: -4.75, upperBound: -2.75 }]
    );

    expect(entries).toEqual([
      warpCriterion,
      { itemNumber: "B002", resultName: "Dim Stab Warp", lowerBound: -4.75, upperBound: -2.75 }
    ]);
  });
});

describe("criteria sharing format", () => {
  it("parses flat records", () => {
    const entries = parseCriteriaRecords([
      { item_number: "A001", result_name: "Dim Stab Warp", lower_bound: -4.75, upper_bound: " -2.75" },
      { item_number: 1234, result_name: "Dim Stab Fill", lower_bound: 0, upper_bound: 1 }
    ]);

    expect(entries).toEqual([
      warpCriterion,
      { itemNumber: "1234", resultName: "Dim Stab Fill", lowerBound: 0, upperBound: 1 }
    ]);
  });

  it("reports the path of a bad value", () => {
    const error = captureError(() =>
      parseCriteriaRecords([
        { item_number: "A001", result_name: "Dim Stab Warp", lower_bound: "low", upper_bound: 1 }
      ])
    );

    expect(error).toBeInstanceOf(CriteriaFormatError);
    expect(error).toMatchObject({
      code: "CRITERIA_FORMAT_ERROR",
      issues: [expect.stringMatching(/^0\.lower_bound: /)]
    });
  });

  it("rejects malformed json", () => {
    const error = captureError(() => parseCriteriaJson("{not json"));

    expect(error).toBeInstanceOf(CriteriaFormatError);
    expect(error).toMatchObject({ issues: [expect.stringMatching(/^Invalid JSON: /)] });
  });

  it("serialises in insertion order and reads back", () => {
    const { criteria } = buildCriteriaSet([
      warpCriterion,
      { itemNumber: "B002", resultName: "Dim Stab Fill", lowerBound: 0.5, upperBound: 1.5 }
    ]);

    const serialized = serializeCriteria(criteria);

    expect(serialized).toEqual([
      { item_number: "A001", result_name: "Dim Stab Warp", lower_bound: -4.75, upper_bound: -2.75 },
      { item_number: "B002", result_name: "Dim Stab Fill", lower_bound: 0.5, upper_bound: 1.5 }
    ]);
    expect(parseCriteriaJson(JSON.stringify(serialized))).toEqual(criteria.entries());
  });
});

describe("memory criteria store", () => {
  it("saves, lists and removes entries by product and test type", async () => {
    const store = createMemoryCriteriaStore([warpCriterion]);
    await store.save({ itemNumber: "B002", resultName: "Dim Stab Fill", lowerBound: 0, upperBound: 1 });

    expect(await store.load("A001", "Dim Stab Warp")).toEqual(warpCriterion);
    expect(await store.load("A001", "Dim Stab Fill")).toBeNull();
    expect((await store.list("B002")).map((entry) => entry.resultName)).toEqual(["Dim Stab Fill"]);
    expect(await store.list()).toHaveLength(2);
    expect(await store.remove("A001", "Dim Stab Warp")).toBe(true);
    expect(await store.remove("A001", "Dim Stab Warp")).toBe(false);
  });

  it("loads the stored entries for a selection", async () => {
    const store = createMemoryCriteriaStore([
      warpCriterion,
      { itemNumber: "B002", resultName: "Dim Stab Fill", lowerBound: 0, upperBound: 1 }
    ]);

    const entries = await loadCriteriaEntries(store, ["A001", "B002"], ["Dim Stab Warp"]);

    expect(entries).toEqual([warpCriterion]);
  });
});

import { describe, expect, it } from "vitest";
import {
  formatPercentage,
  selectAnomalyRecords,
  summarizeClassifiedRecords
} from "../lib/analysis/summary";
import { EMPTY_CRITERIA, buildCriteriaSet } from "../lib/criteria/criteriaSet";
import { classifyRecords } from "../lib/detection/classify";
import { loadRecordStore } from "../lib/records/recordStore";
import { buildClassified, buildTable, warpCriterion, warpRows } from "./helpers";

describe("analysis summary", () => {
  it("summarises the warp scenario", () => {
    const store = loadRecordStore(buildTable(warpRows()));
    const records = classifyRecords(store.records, buildCriteriaSet([warpCriterion]).criteria);

    const summary = summarizeClassifiedRecords(records);

    expect(summary).toMatchObject({ total: 3, normal: 2, abnormal: 1, notAnalyzed: 0 });
    expect(summary.abnormalPercentage).toBeCloseTo(33.333, 3);
    expect(formatPercentage(summary.abnormalPercentage)).toBe("33.3%");
    expect(summary.byResultName).toEqual([{ resultName: "Dim Stab Warp", abnormalCount: 1 }]);
    expect(summary.bySession).toEqual([
      { testNumber: 100, abnormalCount: 1, resultNames: ["Dim Stab Warp"] }
    ]);
  });

  it("reports zero abnormal without criteria", () => {
    const store = loadRecordStore(buildTable(warpRows()));

    const summary = summarizeClassifiedRecords(classifyRecords(store.records, EMPTY_CRITERIA));

    expect(summary).toEqual({
      total: 3,
      normal: 0,
      abnormal: 0,
      notAnalyzed: 3,
      abnormalPercentage: 0,
      byResultName: [],
      bySession: []
    });
    expect(formatPercentage(summary.abnormalPercentage)).toBe("0.0%");
  });

  it("leaves unanalyzed rows out of the percentage", () => {
    const summary = summarizeClassifiedRecords([
      buildClassified({ status: "ABNORMAL" }),
      buildClassified({ status: "NORMAL" }),
      buildClassified({ status: "NOT_ANALYZED" }),
      buildClassified({ status: "NOT_ANALYZED" })
    ]);

    expect(summary.total).toBe(summary.normal + summary.abnormal + summary.notAnalyzed);
    expect(summary.total).toBe(4);
    expect(summary.abnormalPercentage).toBe(50);
  });

  it("orders breakdowns by count with first-seen tie breaks", () => {
    const summary = summarizeClassifiedRecords([
      buildClassified({ testNumber: 1, resultName: "Fill", status: "ABNORMAL" }),
      buildClassified({ testNumber: 2, resultName: "Warp", status: "ABNORMAL" }),
      buildClassified({ testNumber: 2, resultName: "Warp", status: "ABNORMAL" }),
      buildClassified({ testNumber: 3, resultName: "Fill", status: "ABNORMAL" }),
      buildClassified({ testNumber: 2, resultName: "Thickness", status: "ABNORMAL" }),
      buildClassified({ testNumber: 1, resultName: "Thickness", status: "NORMAL" }),
      buildClassified({ testNumber: null, resultName: "Thickness", status: "ABNORMAL" }),
      buildClassified({ testNumber: 3, resultName: "Warp", status: "ABNORMAL" })
    ]);

    expect(summary.byResultName).toEqual([
      { resultName: "Warp", abnormalCount: 3 },
      { resultName: "Fill", abnormalCount: 2 },
      { resultName: "Thickness", abnormalCount: 2 }
    ]);
    expect(summary.bySession).toEqual([
      { testNumber: 2, abnormalCount: 3, resultNames: ["Warp", "Thickness"] },
      { testNumber: 3, abnormalCount: 2, resultNames: ["Fill", "Warp"] },
      { testNumber: 1, abnormalCount: 1, resultNames: ["Fill"] }
    ]);
    expect(summary.abnormalPercentage).toBe(87.5);
  });

  it("keeps text session ids apart from numeric ones", () => {
    const summary = summarizeClassifiedRecords([
      buildClassified({ testNumber: "100", status: "ABNORMAL" }),
      buildClassified({ testNumber: 100, status: "ABNORMAL" })
    ]);

    expect(summary.bySession.map((session) => session.testNumber)).toEqual(["100", 100]);
  });

  it("handles an empty sequence", () => {
    expect(summarizeClassifiedRecords([])).toMatchObject({
      total: 0,
      abnormalPercentage: 0,
      bySession: []
    });
  });
});

describe("anomaly records view", () => {
  it("keeps only abnormal rows with the display columns", () => {
    const rows = selectAnomalyRecords([
      buildClassified({ rowIndex: 0, status: "NORMAL" }),
      buildClassified({
        rowIndex: 1,
        itemNumber: "A001",
        testNumber: 100,
        resultName: "Dim Stab Warp",
        response: -5,
        lowerBound: -4.75,
        upperBound: -2.75,
        status: "ABNORMAL"
      })
    ]);

    expect(rows).toEqual([
      {
        rowIndex: 1,
        values: {
          ITEM_NUMBER: "A001",
          TEST_NUMBER: 100,
          RESULT_NAME: "Dim Stab Warp",
          RESPONSE: -5,
          Lower_Bound: -4.75,
          Upper_Bound: -2.75,
          IS_OUTLIER: "ABNORMAL"
        }
      }
    ]);
  });
});

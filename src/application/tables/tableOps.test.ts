import { describe, expect, it } from "vitest";
import { comparePeriods, renameLabels, transposeTable } from "./tableOps";

describe("renameLabels", () => {
  it("passes unmatched and numeric labels through", () => {
    expect(renameLabels(["revenue", "custom", 2022], { revenue: "Revenue" })).toEqual([
      "Revenue",
      "custom",
      2022,
    ]);
  });

  it("skips a rename whose target is already on the axis", () => {
    expect(renameLabels(["revenue", "Revenue"], { revenue: "Revenue" })).toEqual([
      "revenue",
      "Revenue",
    ]);
  });

  it("ignores inherited object keys", () => {
    expect(renameLabels(["toString"], {})).toEqual(["toString"]);
  });
});

describe("transposeTable", () => {
  it("swaps axes", () => {
    expect(
      transposeTable({
        kind: "canonical",
        index: [2021, 2022],
        columns: ["a", "b"],
        values: [
          [1, 2],
          [3, null],
        ],
      }),
    ).toEqual({
      kind: "canonical",
      index: ["a", "b"],
      columns: [2021, 2022],
      values: [
        [1, 3],
        [2, null],
      ],
    });
  });
});

describe("comparePeriods", () => {
  it("orders years numerically and year-months lexically", () => {
    expect([2023, 999, 2021].sort(comparePeriods)).toEqual([999, 2021, 2023]);
    expect(["2023-03", "2022-12", "2023-01"].sort(comparePeriods)).toEqual([
      "2022-12",
      "2023-01",
      "2023-03",
    ]);
  });
});

import { describe, expect, it } from "vitest";
import type { CombinedTable } from "../../core/entities/table";
import { LabelStatementFormatter } from "./statementFormatter";

const statements: CombinedTable = {
  kind: "combined",
  index: [
    ["AAPL", "revenue"],
    ["AAPL", "netIncome"],
    ["MSFT", "netIncome"],
    ["MSFT", "revenue"],
  ],
  columns: [2022],
  values: [[1], [2], [3], [4]],
};

describe("LabelStatementFormatter", () => {
  const formatter = new LabelStatementFormatter();

  it("relabels line items and keeps unmatched ones", () => {
    const formatted = formatter.format(
      statements,
      { revenue: "Revenue" },
      false,
    );

    expect(formatted.index).toEqual([
      ["AAPL", "Revenue"],
      ["AAPL", "netIncome"],
      ["MSFT", "netIncome"],
      ["MSFT", "Revenue"],
    ]);
    expect(formatted.values).toEqual([[1], [2], [3], [4]]);
  });

  it("keeps only formatted line items, in format order, when restricted", () => {
    const formatted = formatter.format(
      statements,
      { netIncome: "Net Income", revenue: "Revenue" },
      true,
    );

    expect(formatted).toEqual({
      kind: "combined",
      index: [
        ["AAPL", "Net Income"],
        ["AAPL", "Revenue"],
        ["MSFT", "Net Income"],
        ["MSFT", "Revenue"],
      ],
      columns: [2022],
      values: [[2], [1], [3], [4]],
    });
  });

  it("formats each copy of a repeated ticker as its own block", () => {
    const repeated: CombinedTable = {
      kind: "combined",
      index: [
        ["AAPL", "revenue"],
        ["AAPL", "netIncome"],
        ["AAPL", "revenue"],
        ["AAPL", "netIncome"],
      ],
      columns: [2022],
      values: [[1], [2], [1], [2]],
    };

    expect(
      formatter.format(repeated, { revenue: "Revenue" }, false).index,
    ).toEqual([
      ["AAPL", "Revenue"],
      ["AAPL", "netIncome"],
      ["AAPL", "Revenue"],
      ["AAPL", "netIncome"],
    ]);

    expect(
      formatter.format(repeated, { netIncome: "Net", revenue: "Sales" }, true),
    ).toEqual({
      kind: "combined",
      index: [
        ["AAPL", "Net"],
        ["AAPL", "Sales"],
        ["AAPL", "Net"],
        ["AAPL", "Sales"],
      ],
      columns: [2022],
      values: [[2], [1], [2], [1]],
    });
  });
});

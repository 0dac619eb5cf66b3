import { describe, expect, it } from "vitest";
import { flattenSegments } from "./flattenSegments";

describe("flattenSegments", () => {
  it("turns each dated segment map into one record", () => {
    const result = flattenSegments([
      { "2023-09-30": { Americas: 1, Europe: 2 } },
      { "2022-09-24": { Americas: 3 } },
    ]);

    expect(result._unsafeUnwrap()).toEqual([
      { Americas: 1, Europe: 2, date: "2023-09-30" },
      { Americas: 3, date: "2022-09-24" },
    ]);
  });

  it("reports a segment entry that is not an object", () => {
    const result = flattenSegments([{ "2023-09-30": 12 }]);

    expect(result._unsafeUnwrapErr()).toEqual({
      code: "invalid_value",
      field: "2023-09-30",
      recordIndex: 0,
      message: "Segment entry '2023-09-30' of record 0 is not an object.",
    });
  });
});

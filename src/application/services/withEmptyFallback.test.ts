import { err, ok } from "neverthrow";
import pino from "pino";
import { describe, expect, it } from "vitest";
import type { AppError } from "../../core/entities/appError";
import { withEmptyFallback } from "./withEmptyFallback";

const captureLogger = () => {
  const lines: Array<Record<string, unknown>> = [];
  const log = pino(
    { level: "warn" },
    {
      write: (line: string) => {
        lines.push(JSON.parse(line));
      },
    },
  );
  return { log, lines };
};

const missingDate: AppError = {
  kind: "data_quality",
  code: "missing_field",
  message: "Cannot normalize income-statement for AAPL: Record 0 has no 'date' field.",
  retryable: false,
  symbol: "AAPL",
  resource: "income-statement",
};

describe("withEmptyFallback", () => {
  it("degrades a missing field to the empty value and logs the computation", async () => {
    const { log, lines } = captureLogger();
    const grossMargin = withEmptyFallback(
      "grossMargin",
      async (_symbol: string) => err<number[], AppError>(missingDate),
      () => [],
      log,
    );

    const result = await grossMargin("AAPL");

    expect(result._unsafeUnwrap()).toEqual([]);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      computation: "grossMargin",
      symbol: "AAPL",
      resource: "income-statement",
      msg: "A field is missing from the retrieved statements: Cannot normalize income-statement for AAPL: Record 0 has no 'date' field. It is required for grossMargin to run.",
    });
  });

  it("degrades an invalid value", async () => {
    const { log, lines } = captureLogger();
    const wrapped = withEmptyFallback(
      "currentRatio",
      () =>
        err<number, AppError>({
          ...missingDate,
          code: "invalid_value",
          message: "Bad date.",
        }),
      () => 0,
      log,
    );

    expect((await wrapped())._unsafeUnwrap()).toBe(0);
    expect(lines[0]?.msg).toBe(
      "currentRatio could not run: Bad date. Usually this is due to incomplete financial statements.",
    );
  });

  it("passes other failures and successes through", async () => {
    const { log, lines } = captureLogger();
    const transportFailure: AppError = {
      kind: "retrieval",
      code: "transport_error",
      message: "Failed fetching quote for AAPL: socket reset",
      retryable: true,
    };

    const failing = withEmptyFallback(
      "quoteSpread",
      () => err<number, AppError>(transportFailure),
      () => 0,
      log,
    );
    const succeeding = withEmptyFallback(
      "quoteSpread",
      () => ok<number, AppError>(1.5),
      () => 0,
      log,
    );

    expect((await failing())._unsafeUnwrapErr()).toBe(transportFailure);
    expect((await succeeding())._unsafeUnwrap()).toBe(1.5);
    expect(lines).toHaveLength(0);
  });
});

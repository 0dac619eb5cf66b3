import { ok, type Result } from "neverthrow";
import type { Logger } from "pino";
import type { AppError } from "../../core/entities/appError";
import { logger as defaultLogger } from "../../shared/logger/logger";

/**
 * Wraps a computation built on retrieved tables so that a missing field or an
 * invalid value degrades to `emptyValue()` instead of failing the caller.
 * Other failures pass through unchanged.
 */
export const withEmptyFallback =
  <Args extends unknown[], T>(
    name: string,
    computation: (
      ...args: Args
    ) => Result<T, AppError> | Promise<Result<T, AppError>>,
    emptyValue: () => T,
    log: Logger = defaultLogger,
  ) =>
  async (...args: Args): Promise<Result<T, AppError>> => {
    const result = await computation(...args);
    if (result.isOk() || result.error.kind !== "data_quality") {
      return result;
    }

    const { error } = result;
    if (error.code === "missing_field") {
      log.warn(
        { computation: name, symbol: error.symbol, resource: error.resource },
        `A field is missing from the retrieved statements: ${error.message} It is required for ${name} to run.`,
      );
    } else {
      log.warn(
        { computation: name, symbol: error.symbol, resource: error.resource },
        `${name} could not run: ${error.message} Usually this is due to incomplete financial statements.`,
      );
    }

    return ok(emptyValue());
  };

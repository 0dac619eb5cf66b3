import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import { validationError, type AppError } from "../../core/entities/appError";
import {
  statementKinds,
  type StatementKind,
} from "../../core/entities/resource";

const tickerSchema = z.string().refine((value) => value.trim().length > 0, {
  message: "Ticker must be a non-empty string.",
});

const tickersSchema = z.union([
  tickerSchema,
  z.array(tickerSchema).min(1, "At least one ticker is required."),
]);

const apiKeySchema = z.string().trim().min(1);

const statementKindSchema = z.enum(statementKinds);

const describeType = (value: unknown): string =>
  Array.isArray(value) ? "array" : value === null ? "null" : typeof value;

/**
 * Accepts one ticker or a list of tickers and returns them as an ordered list.
 * Repeated tickers are kept.
 */
export const parseTickers = (input: unknown): Result<string[], AppError> => {
  const parsed = tickersSchema.safeParse(input);
  if (!parsed.success) {
    return err(
      validationError(
        "invalid_tickers",
        `Tickers must be a string or a list of strings, received ${describeType(input)}.`,
        parsed.error,
      ),
    );
  }

  return ok(typeof parsed.data === "string" ? [parsed.data] : parsed.data);
};

export const requireApiKey = (apiKey: unknown): Result<string, AppError> => {
  const parsed = apiKeySchema.safeParse(apiKey);
  if (!parsed.success) {
    return err(
      validationError(
        "config_invalid",
        "An API key from Financial Modeling Prep is required.",
        parsed.error,
      ),
    );
  }

  return ok(parsed.data);
};

export const parseStatementKind = (
  statement: unknown,
): Result<StatementKind, AppError> => {
  const parsed = statementKindSchema.safeParse(statement);
  if (!parsed.success) {
    return err(
      validationError(
        "invalid_option",
        `Statement must be one of ${statementKinds.join(", ")}, received '${String(statement)}'.`,
        parsed.error,
      ),
    );
  }

  return ok(parsed.data);
};

export const parsePositiveInt = (
  name: string,
  value: unknown,
): Result<number, AppError> => {
  const parsed = z.number().int().positive().safeParse(value);
  if (!parsed.success) {
    return err(
      validationError(
        "invalid_option",
        `${name} must be a positive integer, received '${String(value)}'.`,
        parsed.error,
      ),
    );
  }

  return ok(parsed.data);
};

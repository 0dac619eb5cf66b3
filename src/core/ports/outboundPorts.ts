import type { Result } from "neverthrow";
import type { AppError } from "../entities/appError";
import type { ResourceKind } from "../entities/resource";
import type {
  CombinedTable,
  FieldRenameTable,
} from "../entities/table";

export type RecordFetchRequest = {
  resource: ResourceKind;
  symbol: string;
  apiKey: string;
  query?: Record<string, string>;
};

/**
 * Fetches one ticker's raw payload for one resource. Parsed JSON, not yet validated.
 */
export interface RecordFetcherPort {
  fetchRecords(request: RecordFetchRequest): Promise<Result<unknown, AppError>>;
}

/**
 * Relabels the line items of a combined statement table.
 */
export interface StatementFormatterPort {
  format(
    table: CombinedTable,
    labels: FieldRenameTable,
    restrictToFormat: boolean,
  ): CombinedTable;
}

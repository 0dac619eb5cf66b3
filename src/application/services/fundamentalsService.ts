import { err, ok, type Result } from "neverthrow";
import type { Logger } from "pino";
import type { AppError } from "../../core/entities/appError";
import type { StatementKind } from "../../core/entities/resource";
import type {
  CanonicalTable,
  CombinedTable,
  FieldRenameTable,
  RawRecord,
  ResourceTable,
} from "../../core/entities/table";
import type {
  RecordFetcherPort,
  StatementFormatterPort,
} from "../../core/ports/outboundPorts";
import { logger as defaultLogger } from "../../shared/logger/logger";
import {
  enterpriseValueDefinition,
  profileDefinition,
  quoteDefinition,
  ratingDefinition,
  revenueSegmentDefinition,
  statementDefinition,
  statementLabels,
  transcriptDefinition,
  type ResourceDefinition,
} from "../resources/resourceDefinitions";
import { collapseTable } from "../tables/collapseTable";
import { combineTables, sortPeriodColumns } from "../tables/combineTables";
import { flattenSegments } from "../tables/flattenSegments";
import {
  normalizeRecords,
  type NormalizationIssue,
} from "../tables/normalizeRecords";
import { LabelStatementFormatter } from "../tables/statementFormatter";
import {
  parsePositiveInt,
  parseStatementKind,
  parseTickers,
  requireApiKey,
} from "../validation/requestValidation";

export type TickerInput = string | string[];

export type ApiKeyRequest = {
  apiKey: string;
};

export type StatementRequest = ApiKeyRequest & {
  statement: StatementKind;
  quarter?: boolean;
  limit?: number;
  /**
   * Line item relabelling applied after combination; defaults to the bundled labels of the statement.
   */
  statementFormat?: FieldRenameTable;
  restrictToFormat?: boolean;
};

export type PeriodicRequest = ApiKeyRequest & {
  quarter?: boolean;
  limit?: number;
};

export type RatingRequest = ApiKeyRequest & {
  limit?: number;
};

export type TranscriptRequest = ApiKeyRequest & {
  year?: number;
};

export type SegmentRequest = ApiKeyRequest & {
  quarter?: boolean;
};

type Retrieved = {
  identifiers: string[];
  combined: CombinedTable;
};

const defaultLimit = 100;
const defaultTranscriptYear = 2023;

const isRecordList = (payload: unknown): payload is RawRecord[] =>
  Array.isArray(payload) &&
  payload.every(
    (item) => typeof item === "object" && item !== null && !Array.isArray(item),
  );

/**
 * Retrieval entry points: fetch every ticker in request order, normalize,
 * combine, and collapse single-ticker requests to a plain table.
 *
 * Requests are all-or-nothing; the first ticker that fails aborts the batch.
 */
export class FundamentalsService {
  constructor(
    private readonly fetcher: RecordFetcherPort,
    private readonly statementFormatter: StatementFormatterPort = new LabelStatementFormatter(),
    private readonly logger: Logger = defaultLogger,
  ) {}

  /**
   * Balance, income or cash-flow statements with line items as rows and periods as ascending columns.
   */
  async getFinancialStatements(
    tickers: TickerInput,
    request: StatementRequest,
  ): Promise<Result<ResourceTable, AppError>> {
    const statement = parseStatementKind(request.statement);
    if (statement.isErr()) {
      return err(statement.error);
    }

    const limit = parsePositiveInt("limit", request.limit ?? defaultLimit);
    if (limit.isErr()) {
      return err(limit.error);
    }

    const quarter = request.quarter ?? false;
    const retrieved = await this.retrieve(
      tickers,
      request.apiKey,
      statementDefinition(statement.value, quarter),
      { period: quarter ? "quarter" : "annual", limit: String(limit.value) },
    );

    return retrieved.map(({ identifiers, combined }) => {
      const formatted = this.statementFormatter.format(
        combined,
        request.statementFormat ?? statementLabels[statement.value],
        request.restrictToFormat ?? false,
      );
      return collapseTable(sortPeriodColumns(formatted), identifiers);
    });
  }

  async getProfile(
    tickers: TickerInput,
    request: ApiKeyRequest,
  ): Promise<Result<ResourceTable, AppError>> {
    return this.retrieveCollapsed(tickers, request.apiKey, profileDefinition);
  }

  async getQuote(
    tickers: TickerInput,
    request: ApiKeyRequest,
  ): Promise<Result<ResourceTable, AppError>> {
    return this.retrieveCollapsed(tickers, request.apiKey, quoteDefinition);
  }

  async getEnterpriseValues(
    tickers: TickerInput,
    request: PeriodicRequest,
  ): Promise<Result<ResourceTable, AppError>> {
    const limit = parsePositiveInt("limit", request.limit ?? defaultLimit);
    if (limit.isErr()) {
      return err(limit.error);
    }

    const quarter = request.quarter ?? false;
    return this.retrieveCollapsed(
      tickers,
      request.apiKey,
      enterpriseValueDefinition(quarter),
      { period: quarter ? "quarter" : "annual", limit: String(limit.value) },
    );
  }

  async getRatings(
    tickers: TickerInput,
    request: RatingRequest,
  ): Promise<Result<ResourceTable, AppError>> {
    const limit = parsePositiveInt("limit", request.limit ?? defaultLimit);
    if (limit.isErr()) {
      return err(limit.error);
    }

    return this.retrieveCollapsed(tickers, request.apiKey, ratingDefinition, {
      limit: String(limit.value),
    });
  }

  async getEarningsCallTranscripts(
    tickers: TickerInput,
    request: TranscriptRequest,
  ): Promise<Result<ResourceTable, AppError>> {
    const year = parsePositiveInt(
      "year",
      request.year ?? defaultTranscriptYear,
    );
    if (year.isErr()) {
      return err(year.error);
    }

    return this.retrieveCollapsed(
      tickers,
      request.apiKey,
      transcriptDefinition,
      { year: String(year.value) },
    );
  }

  /**
   * Revenue per geographic segment, one row per reporting period. Quarterly unless `quarter` is false.
   */
  async getRevenueByGeography(
    tickers: TickerInput,
    request: SegmentRequest,
  ): Promise<Result<ResourceTable, AppError>> {
    return this.retrieveSegments(tickers, request, "geography");
  }

  /**
   * Revenue per product segment, one row per reporting period. Quarterly unless `quarter` is false.
   */
  async getRevenueByProduct(
    tickers: TickerInput,
    request: SegmentRequest,
  ): Promise<Result<ResourceTable, AppError>> {
    return this.retrieveSegments(tickers, request, "product");
  }

  private async retrieveSegments(
    tickers: TickerInput,
    request: SegmentRequest,
    segmentation: "geography" | "product",
  ): Promise<Result<ResourceTable, AppError>> {
    const quarter = request.quarter ?? true;
    const query: Record<string, string> = { structure: "flat" };
    if (quarter) {
      query.period = "quarter";
    }

    return this.retrieveCollapsed(
      tickers,
      request.apiKey,
      revenueSegmentDefinition(segmentation, quarter),
      query,
    );
  }

  private async retrieveCollapsed(
    tickers: TickerInput,
    apiKey: string,
    definition: ResourceDefinition,
    query?: Record<string, string>,
  ): Promise<Result<ResourceTable, AppError>> {
    const retrieved = await this.retrieve(tickers, apiKey, definition, query);
    return retrieved.map(({ identifiers, combined }) =>
      collapseTable(combined, identifiers),
    );
  }

  /**
   * Validates input before any network call, then fetches and normalizes one ticker at a time.
   */
  private async retrieve(
    tickers: TickerInput,
    apiKey: string,
    definition: ResourceDefinition,
    query?: Record<string, string>,
  ): Promise<Result<Retrieved, AppError>> {
    const identifiers = parseTickers(tickers);
    if (identifiers.isErr()) {
      return err(identifiers.error);
    }

    const key = requireApiKey(apiKey);
    if (key.isErr()) {
      return err(key.error);
    }

    const entries: Array<[string, CanonicalTable]> = [];

    for (const symbol of identifiers.value) {
      this.logger.debug(
        { symbol, resource: definition.resource },
        "Fetching records",
      );

      const payload = await this.fetcher.fetchRecords({
        resource: definition.resource,
        symbol,
        apiKey: key.value,
        query,
      });
      if (payload.isErr()) {
        this.logger.warn(
          { symbol, resource: definition.resource, code: payload.error.code },
          "Record fetch failed",
        );
        return err(payload.error);
      }

      const table = this.toCanonicalTable(symbol, definition, payload.value);
      if (table.isErr()) {
        this.logger.warn(
          { symbol, resource: definition.resource, code: table.error.code },
          "Record normalization failed",
        );
        return err(table.error);
      }

      entries.push([symbol, table.value]);
    }

    return ok({ identifiers: identifiers.value, combined: combineTables(entries) });
  }

  private toCanonicalTable(
    symbol: string,
    definition: ResourceDefinition,
    payload: unknown,
  ): Result<CanonicalTable, AppError> {
    if (!isRecordList(payload)) {
      return err({
        kind: "retrieval",
        code: "malformed_response",
        message: `Response for ${definition.resource} of ${symbol} was not a list of records.`,
        retryable: false,
        symbol,
        resource: definition.resource,
      });
    }

    const toDataQualityError = (issue: NormalizationIssue): AppError => ({
      kind: "data_quality",
      code: issue.code,
      message: `Cannot normalize ${definition.resource} for ${symbol}: ${issue.message}`,
      retryable: false,
      symbol,
      resource: definition.resource,
      cause: issue,
    });

    const records: Result<RawRecord[], NormalizationIssue> =
      definition.payload === "segments" ? flattenSegments(payload) : ok(payload);

    return records
      .andThen((rows) =>
        normalizeRecords(rows, {
          orientation: definition.orientation,
          periodMode: definition.periodMode,
          renameTable: definition.renameTable,
          sortByDate: definition.sortByDate,
        }),
      )
      .mapErr(toDataQualityError);
  }
}

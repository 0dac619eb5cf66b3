import type { ResourceKind, StatementKind } from "../../core/entities/resource";
import type {
  FieldRenameTable,
  Orientation,
  PeriodMode,
} from "../../core/entities/table";
import balanceStatementLabels from "./labels/balanceStatement.json";
import cashflowStatementLabels from "./labels/cashflowStatement.json";
import enterpriseValueLabels from "./labels/enterpriseValues.json";
import incomeStatementLabels from "./labels/incomeStatement.json";
import profileLabels from "./labels/profile.json";
import quoteLabels from "./labels/quote.json";
import ratingLabels from "./labels/ratings.json";
import transcriptLabels from "./labels/transcripts.json";

/**
 * Static description of how one resource is fetched and reshaped.
 */
export type ResourceDefinition = {
  resource: ResourceKind;
  payload: "records" | "segments";
  orientation: Orientation;
  periodMode: PeriodMode | null;
  sortByDate: boolean;
  renameTable: FieldRenameTable;
};

const noRenames: FieldRenameTable = {};

export const statementResources: Record<StatementKind, ResourceKind> = {
  balance: "balance-sheet-statement",
  income: "income-statement",
  cashflow: "cash-flow-statement",
};

export const statementLabels: Record<StatementKind, FieldRenameTable> = {
  balance: balanceStatementLabels,
  income: incomeStatementLabels,
  cashflow: cashflowStatementLabels,
};

const periodModeFor = (quarter: boolean): PeriodMode =>
  quarter ? "quarter" : "annual";

/**
 * Statement line items are renamed afterwards by the statement formatter.
 */
export const statementDefinition = (
  statement: StatementKind,
  quarter: boolean,
): ResourceDefinition => ({
  resource: statementResources[statement],
  payload: "records",
  orientation: "fields_as_rows",
  periodMode: periodModeFor(quarter),
  sortByDate: false,
  renameTable: noRenames,
});

export const profileDefinition: ResourceDefinition = {
  resource: "profile",
  payload: "records",
  orientation: "periods_as_rows",
  periodMode: null,
  sortByDate: false,
  renameTable: profileLabels,
};

export const quoteDefinition: ResourceDefinition = {
  resource: "quote",
  payload: "records",
  orientation: "periods_as_rows",
  periodMode: null,
  sortByDate: false,
  renameTable: quoteLabels,
};

export const enterpriseValueDefinition = (
  quarter: boolean,
): ResourceDefinition => ({
  resource: "enterprise-values",
  payload: "records",
  orientation: "periods_as_rows",
  periodMode: periodModeFor(quarter),
  sortByDate: true,
  renameTable: enterpriseValueLabels,
});

export const ratingDefinition: ResourceDefinition = {
  resource: "historical-rating",
  payload: "records",
  orientation: "periods_as_rows",
  periodMode: "date",
  sortByDate: true,
  renameTable: ratingLabels,
};

export const transcriptDefinition: ResourceDefinition = {
  resource: "earning-call-transcript",
  payload: "records",
  orientation: "periods_as_rows",
  periodMode: "date",
  sortByDate: true,
  renameTable: transcriptLabels,
};

export const revenueSegmentDefinition = (
  segmentation: "geography" | "product",
  quarter: boolean,
): ResourceDefinition => ({
  resource:
    segmentation === "geography"
      ? "revenue-geographic-segmentation"
      : "revenue-product-segmentation",
  payload: "segments",
  orientation: "periods_as_rows",
  periodMode: periodModeFor(quarter),
  sortByDate: true,
  renameTable: noRenames,
});

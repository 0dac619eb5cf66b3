export type CellValue = string | number | boolean | null;

/**
 * Calendar year for annual data, `YYYY-MM` for quarterly data, `YYYY-MM-DD` for daily series.
 */
export type Period = number | string;

export type AxisLabel = string | number;

export type PeriodMode = "annual" | "quarter" | "date";

export type Orientation = "periods_as_rows" | "fields_as_rows";

export type RawRecord = Record<string, unknown>;

/**
 * One entity's normalized table. `values[row][column]`, `null` marks an absent value.
 */
export type CanonicalTable = {
  kind: "canonical";
  index: AxisLabel[];
  columns: AxisLabel[];
  values: CellValue[][];
};

export type EntityRowKey = readonly [entity: string, label: AxisLabel];

/**
 * Canonical tables stacked under an outer entity level, in request order.
 */
export type CombinedTable = {
  kind: "combined";
  index: EntityRowKey[];
  columns: AxisLabel[];
  values: CellValue[][];
};

export type ResourceTable = CanonicalTable | CombinedTable;

/**
 * Provider field name to display name. Names missing from the table pass through.
 */
export type FieldRenameTable = Readonly<Record<string, string>>;

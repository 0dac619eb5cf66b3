import { err, ok, type Result } from "neverthrow";
import type {
  AxisLabel,
  CanonicalTable,
  CellValue,
  FieldRenameTable,
  Orientation,
  Period,
  PeriodMode,
  RawRecord,
} from "../../core/entities/table";
import { renameLabels, transposeTable } from "./tableOps";

export type NormalizeOptions = {
  orientation: Orientation;
  /**
   * `null` for resources without a date axis; rows are then keyed by record position.
   */
  periodMode: PeriodMode | null;
  renameTable: FieldRenameTable;
  sortByDate: boolean;
  identifierField?: string;
  dateField?: string;
};

export type NormalizationIssue = {
  code: "missing_field" | "invalid_value";
  field: string;
  recordIndex: number;
  message: string;
};

const datePattern = /^(\d{4})-(\d{2})(?:-(\d{2}))?/;

const isCalendarDate = (
  year: string,
  month: string,
  day: string | undefined,
): boolean => {
  const monthNumber = Number.parseInt(month, 10);
  if (monthNumber < 1 || monthNumber > 12) {
    return false;
  }

  if (day === undefined) {
    return true;
  }

  // Day 0 of the following month is the last day of this one.
  const daysInMonth = new Date(
    Date.UTC(Number.parseInt(year, 10), monthNumber, 0),
  ).getUTCDate();
  const dayNumber = Number.parseInt(day, 10);
  return dayNumber >= 1 && dayNumber <= daysInMonth;
};

/**
 * Truncates a provider date string to the period granularity of the resource.
 */
export const toPeriod = (raw: string, mode: PeriodMode): Period | null => {
  const match = datePattern.exec(raw.trim());
  if (!match) {
    return null;
  }

  const [, year = "", month = "", day] = match;
  if (!isCalendarDate(year, month, day)) {
    return null;
  }

  if (mode === "annual") {
    return Number.parseInt(year, 10);
  }

  if (mode === "quarter") {
    return `${year}-${month}`;
  }

  return day ? `${year}-${month}-${day}` : null;
};

export const toCellValue = (value: unknown): CellValue => {
  if (value === undefined || value === null) {
    return null;
  }

  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value === "string" || typeof value === "boolean") {
    return value;
  }

  return JSON.stringify(value);
};

const readDates = (
  records: RawRecord[],
  dateField: string,
): Result<string[], NormalizationIssue> => {
  const dates: string[] = [];

  for (const [recordIndex, record] of records.entries()) {
    const raw = record[dateField];
    if (raw === undefined || raw === null) {
      return err({
        code: "missing_field",
        field: dateField,
        recordIndex,
        message: `Record ${recordIndex} has no '${dateField}' field.`,
      });
    }

    if (typeof raw !== "string") {
      return err({
        code: "invalid_value",
        field: dateField,
        recordIndex,
        message: `Record ${recordIndex} has a non-string '${dateField}' value.`,
      });
    }

    dates.push(raw);
  }

  return ok(dates);
};

/**
 * Reshapes one entity's raw records into a canonical table.
 *
 * Records sharing a period collapse into one row: the last record's values
 * win and the row keeps the position of the first occurrence.
 */
export const normalizeRecords = (
  records: RawRecord[],
  options: NormalizeOptions,
): Result<CanonicalTable, NormalizationIssue> => {
  const identifierField = options.identifierField ?? "symbol";
  const dateField = options.dateField ?? "date";
  const { periodMode } = options;

  let rows = records.map((record) => {
    const { [identifierField]: _identifier, ...rest } = record;
    return rest;
  });

  let rowLabels: AxisLabel[];
  if (periodMode === null) {
    rowLabels = rows.map((_, position) => position);
  } else {
    const dates = readDates(rows, dateField);
    if (dates.isErr()) {
      return err(dates.error);
    }

    let ordered = rows.map((row, position) => ({
      row,
      date: dates.value[position] ?? "",
      recordIndex: position,
    }));
    if (options.sortByDate) {
      // Array.prototype.sort is stable, equal dates keep provider order.
      ordered = [...ordered].sort((left, right) =>
        left.date < right.date ? -1 : left.date > right.date ? 1 : 0,
      );
    }

    rowLabels = [];
    for (const entry of ordered) {
      const period = toPeriod(entry.date, periodMode);
      if (period === null) {
        return err({
          code: "invalid_value",
          field: dateField,
          recordIndex: entry.recordIndex,
          message: `Record ${entry.recordIndex} has an unparseable '${dateField}' value '${entry.date}'.`,
        });
      }
      rowLabels.push(period);
    }

    rows = ordered.map((entry) => {
      const { [dateField]: _date, ...rest } = entry.row;
      return rest;
    });
  }

  const columns: string[] = [];
  const seenColumns = new Set<string>();
  for (const row of rows) {
    for (const field of Object.keys(row)) {
      if (!seenColumns.has(field)) {
        seenColumns.add(field);
        columns.push(field);
      }
    }
  }

  const byLabel = new Map<AxisLabel, RawRecord>();
  rows.forEach((row, position) => {
    const label = rowLabels[position];
    if (label !== undefined) {
      byLabel.set(label, row);
    }
  });

  const table: CanonicalTable = {
    kind: "canonical",
    index: [...byLabel.keys()],
    columns,
    values: [...byLabel.values()].map((row) =>
      columns.map((field) => toCellValue(row[field])),
    ),
  };

  if (options.orientation === "fields_as_rows") {
    const transposed = transposeTable(table);
    return ok({
      ...transposed,
      index: renameLabels(transposed.index, options.renameTable),
    });
  }

  return ok({
    ...table,
    columns: renameLabels(table.columns, options.renameTable),
  });
};

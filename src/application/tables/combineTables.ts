import type {
  AxisLabel,
  CanonicalTable,
  CellValue,
  CombinedTable,
  EntityRowKey,
} from "../../core/entities/table";
import { comparePeriods, isEmptyRow } from "./tableOps";

/**
 * Stacks per-entity tables under an outer entity level.
 *
 * Entities keep the order of `entries`, including repeats. Columns are the
 * union of all tables in first-seen order and cells a table lacks are `null`.
 * Rows with no value in any column are dropped.
 */
export const combineTables = (
  entries: ReadonlyArray<readonly [entity: string, table: CanonicalTable]>,
): CombinedTable => {
  const columns: AxisLabel[] = [];
  const seenColumns = new Set<AxisLabel>();
  for (const [, table] of entries) {
    for (const column of table.columns) {
      if (!seenColumns.has(column)) {
        seenColumns.add(column);
        columns.push(column);
      }
    }
  }

  const index: EntityRowKey[] = [];
  const values: CellValue[][] = [];

  for (const [entity, table] of entries) {
    const positions = columns.map((column) => table.columns.indexOf(column));

    table.index.forEach((label, rowPosition) => {
      const source = table.values[rowPosition] ?? [];
      const row = positions.map((position) =>
        position < 0 ? null : (source[position] ?? null),
      );

      if (!isEmptyRow(row)) {
        index.push([entity, label]);
        values.push(row);
      }
    });
  }

  return { kind: "combined", index, columns, values };
};

/**
 * Orders period columns ascending; row order and entity grouping are untouched.
 */
export const sortPeriodColumns = (table: CombinedTable): CombinedTable => {
  const order = table.columns
    .map((column, position) => ({ column, position }))
    .sort((left, right) => comparePeriods(left.column, right.column));

  return {
    ...table,
    columns: order.map(({ column }) => column),
    values: table.values.map((row) =>
      order.map(({ position }) => row[position] ?? null),
    ),
  };
};

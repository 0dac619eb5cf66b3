import type {
  AxisLabel,
  CanonicalTable,
  CellValue,
  FieldRenameTable,
} from "../../core/entities/table";

/**
 * Replaces labels found in the rename table. A rename whose target is already
 * on the axis is skipped so labels stay unique.
 */
export const renameLabels = <L extends AxisLabel>(
  labels: L[],
  renameTable: FieldRenameTable,
): Array<L | string> => {
  const taken = new Set<AxisLabel>(labels);

  return labels.map((label) => {
    if (typeof label !== "string" || !Object.hasOwn(renameTable, label)) {
      return label;
    }

    const target = renameTable[label];
    if (target === undefined || target === label || taken.has(target)) {
      return label;
    }

    taken.delete(label);
    taken.add(target);
    return target;
  });
};

export const transposeTable = (table: CanonicalTable): CanonicalTable => ({
  kind: "canonical",
  index: [...table.columns],
  columns: [...table.index],
  values: table.columns.map((_, columnPosition) =>
    table.index.map(
      (_, rowPosition) => table.values[rowPosition]?.[columnPosition] ?? null,
    ),
  ),
});

export const isEmptyRow = (row: CellValue[]): boolean =>
  row.every((value) => value === null);

/**
 * Orders years numerically and `YYYY-MM` / `YYYY-MM-DD` periods lexically.
 */
export const comparePeriods = (left: AxisLabel, right: AxisLabel): number => {
  if (typeof left === "number" && typeof right === "number") {
    return left - right;
  }

  const a = String(left);
  const b = String(right);
  return a < b ? -1 : a > b ? 1 : 0;
};

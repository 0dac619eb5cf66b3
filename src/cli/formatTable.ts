import type {
  AxisLabel,
  CellValue,
  ResourceTable,
} from "../core/entities/table";

const maxCellWidth = 40;

const formatCell = (value: CellValue): string => {
  if (value === null) {
    return "-";
  }

  const text = String(value).replace(/\s+/g, " ");
  return text.length > maxCellWidth
    ? `${text.slice(0, maxCellWidth - 3)}...`
    : text;
};

const rowLabel = (table: ResourceTable, position: number): string[] => {
  if (table.kind === "combined") {
    const key = table.index[position];
    return key ? [key[0], String(key[1])] : ["", ""];
  }

  return [String(table.index[position] ?? "")];
};

/**
 * Renders a table as aligned plain text: a header line, then one line per row.
 */
export const formatTable = (table: ResourceTable): string => {
  if (table.index.length === 0) {
    return "(no data)";
  }

  const labelHeaders = table.kind === "combined" ? ["ticker", ""] : [""];
  const header = [
    ...labelHeaders,
    ...table.columns.map((column: AxisLabel) => String(column)),
  ];
  const body = table.values.map((row, position) => [
    ...rowLabel(table, position),
    ...row.map(formatCell),
  ]);

  const widths = header.map((cell, column) =>
    Math.max(cell.length, ...body.map((line) => (line[column] ?? "").length)),
  );

  return [header, ...body]
    .map((line) =>
      line
        .map((cell, column) => cell.padEnd(widths[column] ?? 0))
        .join("  ")
        .trimEnd(),
    )
    .join("\n");
};

import type {
  CombinedTable,
  ResourceTable,
} from "../../core/entities/table";

/**
 * Returns the entity slice without the outer level when exactly one
 * identifier was requested, otherwise the combined table as is.
 */
export const collapseTable = (
  combined: CombinedTable,
  identifiers: readonly string[],
): ResourceTable => {
  const [only, ...rest] = identifiers;
  if (only === undefined || rest.length > 0) {
    return combined;
  }

  const positions = combined.index
    .map(([entity], position) => (entity === only ? position : -1))
    .filter((position) => position >= 0);

  return {
    kind: "canonical",
    index: positions.map((position) => combined.index[position]?.[1] ?? ""),
    columns: [...combined.columns],
    values: positions.map((position) => [...(combined.values[position] ?? [])]),
  };
};

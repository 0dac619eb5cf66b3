import type { StatementFormatterPort } from "../../core/ports/outboundPorts";
import type {
  CombinedTable,
  EntityRowKey,
  FieldRenameTable,
} from "../../core/entities/table";
import { renameLabels } from "./tableOps";

type EntityBlock = {
  entity: string;
  positions: number[];
};

// A ticker requested twice yields two blocks, one per copy.
const toEntityBlocks = (table: CombinedTable): EntityBlock[] => {
  const blocks: EntityBlock[] = [];
  table.index.forEach(([entity], position) => {
    const current = blocks.at(-1);
    if (current && current.entity === entity) {
      current.positions.push(position);
    } else {
      blocks.push({ entity, positions: [position] });
    }
  });
  return blocks;
};

/**
 * Relabels statement line items per entity block. With `restrictToFormat`,
 * only line items named in the format survive, in the format's order.
 */
export class LabelStatementFormatter implements StatementFormatterPort {
  format(
    table: CombinedTable,
    labels: FieldRenameTable,
    restrictToFormat: boolean,
  ): CombinedTable {
    const formatOrder = Object.keys(labels);
    const index: EntityRowKey[] = [];
    const values: CombinedTable["values"] = [];

    for (const { entity, positions } of toEntityBlocks(table)) {
      let kept = positions;
      if (restrictToFormat) {
        kept = formatOrder.flatMap((item) =>
          positions.filter((position) => table.index[position]?.[1] === item),
        );
      }

      const renamed = renameLabels(
        kept.map((position) => table.index[position]?.[1] ?? ""),
        labels,
      );

      kept.forEach((position, offset) => {
        index.push([entity, renamed[offset] ?? ""]);
        values.push([...(table.values[position] ?? [])]);
      });
    }

    return { kind: "combined", index, columns: [...table.columns], values };
  }
}

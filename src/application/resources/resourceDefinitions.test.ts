import { describe, expect, it } from "vitest";
import { renameLabels } from "../tables/tableOps";
import {
  enterpriseValueDefinition,
  profileDefinition,
  quoteDefinition,
  ratingDefinition,
  statementDefinition,
  statementLabels,
  transcriptDefinition,
} from "./resourceDefinitions";

const renameTables = {
  profile: profileDefinition.renameTable,
  quote: quoteDefinition.renameTable,
  enterprise: enterpriseValueDefinition(false).renameTable,
  rating: ratingDefinition.renameTable,
  transcript: transcriptDefinition.renameTable,
  ...statementLabels,
};

describe("rename tables", () => {
  it.each(Object.entries(renameTables))(
    "%s maps every field to a distinct display name",
    (_name, table) => {
      const targets = Object.values(table);
      expect(new Set(targets).size).toBe(targets.length);
    },
  );

  it.each(Object.entries(renameTables))(
    "%s is idempotent over its own fields",
    (_name, table) => {
      const once = renameLabels(Object.keys(table), table);
      expect(renameLabels(once, table)).toEqual(once);
    },
  );

  it("names enterprise value fields as displayed", () => {
    expect(enterpriseValueDefinition(true).renameTable).toMatchObject({
      minusCashAndCashEquivalents: "Cash and Cash Equivalents",
      addTotalDebt: "Total Debt",
    });
  });
});

describe("statementDefinition", () => {
  it("transposes statements and leaves relabelling to the formatter", () => {
    expect(statementDefinition("cashflow", true)).toEqual({
      resource: "cash-flow-statement",
      payload: "records",
      orientation: "fields_as_rows",
      periodMode: "quarter",
      sortByDate: false,
      renameTable: {},
    });
  });
});

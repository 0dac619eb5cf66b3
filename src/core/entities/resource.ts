export const statementKinds = ["balance", "income", "cashflow"] as const;

export type StatementKind = (typeof statementKinds)[number];

export type ResourceKind =
  | "balance-sheet-statement"
  | "income-statement"
  | "cash-flow-statement"
  | "profile"
  | "quote"
  | "enterprise-values"
  | "historical-rating"
  | "earning-call-transcript"
  | "revenue-geographic-segmentation"
  | "revenue-product-segmentation";

import { err, ok, type Result } from "neverthrow";
import type { RawRecord } from "../../core/entities/table";
import type { NormalizationIssue } from "./normalizeRecords";

const isPlainObject = (value: unknown): value is RawRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Turns flat segmentation payloads, `[{ "2023-09-30": { Americas: 1 } }]`,
 * into one `{ date, ...segments }` record per reporting date.
 */
export const flattenSegments = (
  payload: RawRecord[],
  dateField = "date",
): Result<RawRecord[], NormalizationIssue> => {
  const records: RawRecord[] = [];

  for (const [recordIndex, entry] of payload.entries()) {
    for (const [date, segments] of Object.entries(entry)) {
      if (!isPlainObject(segments)) {
        return err({
          code: "invalid_value",
          field: date,
          recordIndex,
          message: `Segment entry '${date}' of record ${recordIndex} is not an object.`,
        });
      }

      records.push({ ...segments, [dateField]: date });
    }
  }

  return ok(records);
};

/**
 * CDX API response parsing
 */

import { z } from "zod";
import { IndexQueryError } from "../errors.js";
import type { SnapshotLocator } from "../types.js";

const cdxRowsSchema = z.array(z.array(z.string()));

/**
 * Turn a CDX `output=json` payload into snapshot locators
 * The first row is the header naming each column
 */
export function parseCdxRows(data: unknown): SnapshotLocator[] {
  const parsed = cdxRowsSchema.safeParse(data);
  if (!parsed.success) {
    throw new IndexQueryError("Malformed CDX response: expected an array of string rows");
  }

  const [header, ...rows] = parsed.data;
  if (!header || rows.length === 0) return [];

  const timestampIdx = header.indexOf("timestamp");
  const originalIdx = header.indexOf("original");
  if (timestampIdx === -1) throw new IndexQueryError("CDX response has no timestamp column");
  if (originalIdx === -1) throw new IndexQueryError("CDX response has no original column");

  return rows.map((row, i) => {
    const timestamp = row[timestampIdx];
    const originalUrl = row[originalIdx];
    if (timestamp === undefined || originalUrl === undefined) {
      throw new IndexQueryError(`CDX row ${i + 1} is missing fields`);
    }
    return { timestamp, originalUrl };
  });
}

import * as fs from "fs";
import * as path from "path";
import type { ProductRecord } from "../types";

export const CSV_HEADERS = [
  "URL",
  "Product Name",
  "ASIN",
  "Original Price",
  "Discounted Price",
  "Product Rating",
];

function escapeCsv(value: string | null): string {
  const str = value ?? "";
  if (
    str.includes('"') ||
    str.includes(",") ||
    str.includes("\n") ||
    str.includes("\r")
  ) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

/**
 * Render records as CSV text, header first, one row per record.
 * A missing catalog ID is an empty cell.
 */
export function toProductsCsv(records: readonly ProductRecord[]): string {
  const lines = [CSV_HEADERS.map(escapeCsv).join(",")];
  for (const r of records) {
    const cells = [
      r.sourceUrl,
      r.productName,
      r.catalogId,
      r.originalPrice,
      r.discountedPrice,
      r.rating,
    ];
    lines.push(cells.map(escapeCsv).join(","));
  }
  return lines.join("\n") + "\n";
}

/**
 * Write records to the given CSV file, creating its directory if needed.
 * @returns The path written
 */
export function exportProductsCsv(
  records: readonly ProductRecord[],
  filePath: string
): string {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, toProductsCsv(records), "utf-8");
  return filePath;
}

import * as fs from "fs";
import * as path from "path";
import * as XLSX from "xlsx";
import { InputFileError } from "./errors";

export const DEFAULT_URL_COLUMN = "URL";

/**
 * Read URLs from a CSV or XLSX file, in row order.
 * Blank cells are skipped; everything else is kept as-is, duplicates included.
 * @param filePath  Absolute or relative path to the file.
 * @param columnName  Header name of the URL column (case-insensitive).
 * @throws InputFileError when the file is missing, unsupported, empty or lacks the column
 */
export function readUrlsFromFile(
  filePath: string,
  columnName: string = DEFAULT_URL_COLUMN
): string[] {
  if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
    throw new InputFileError(filePath, `File "${filePath}" does not exist.`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".csv") {
    return readCsv(filePath, columnName);
  } else if (ext === ".xlsx" || ext === ".xls") {
    return readXlsx(filePath, columnName);
  } else {
    throw new InputFileError(
      filePath,
      `Unsupported file type "${ext}". Only .csv and .xlsx/.xls are supported.`
    );
  }
}

// ── Internals ────────────────────────────────────────────────────────────────

function findUrlColumn(filePath: string, headers: string[], wanted: string): number {
  const idx = headers.findIndex(
    (h) => h.trim().toLowerCase() === wanted.trim().toLowerCase()
  );
  if (idx === -1) {
    throw new InputFileError(
      filePath,
      `Column "${wanted}" not found.\n` +
        `   Available headers: ${headers.map((h) => `"${h}"`).join(", ")}\n` +
        `   Re-run with --column=<name> to specify the correct column.`
    );
  }
  return idx;
}

/** Minimal CSV row parser: handles quoted fields and "" escaped quotes. */
export function parseCsvRow(line: string): string[] {
  const fields: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inQuotes) {
      if (ch === '"') {
        if (line[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += ch;
      }
    } else {
      if (ch === '"') {
        inQuotes = true;
      } else if (ch === ",") {
        fields.push(current);
        current = "";
      } else {
        current += ch;
      }
    }
  }
  fields.push(current);
  return fields;
}

function readCsv(filePath: string, columnName: string): string[] {
  const raw = fs.readFileSync(filePath, "utf-8");
  // Strip BOM if present
  const content = raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;

  const lines = content.split(/\r?\n/).filter((l) => l.trim() !== "");
  if (lines.length === 0) {
    throw new InputFileError(filePath, `File "${filePath}" is empty.`);
  }

  const headers = parseCsvRow(lines[0]);
  const colIdx = findUrlColumn(filePath, headers, columnName);

  const urls: string[] = [];
  for (let i = 1; i < lines.length; i++) {
    const fields = parseCsvRow(lines[i]);
    const cell = (fields[colIdx] ?? "").trim();
    if (cell) urls.push(cell);
  }
  return urls;
}

function readXlsx(filePath: string, columnName: string): string[] {
  const wb = XLSX.readFile(filePath);
  const sheetName = wb.SheetNames[0];
  const ws = sheetName !== undefined ? wb.Sheets[sheetName] : undefined;
  if (!ws) {
    throw new InputFileError(filePath, `File "${filePath}" has no sheets.`);
  }

  // header:1 → array of arrays; first row is headers
  const rows = XLSX.utils.sheet_to_json<unknown[]>(ws, { header: 1 });
  if (rows.length === 0) {
    throw new InputFileError(filePath, `File "${filePath}" is empty or has no sheet data.`);
  }

  const headers = rows[0].map((h) => String(h ?? ""));
  const colIdx = findUrlColumn(filePath, headers, columnName);

  const urls: string[] = [];
  for (let i = 1; i < rows.length; i++) {
    const cell = String(rows[i][colIdx] ?? "").trim();
    if (cell) urls.push(cell);
  }
  return urls;
}

import { readFile, writeFile } from "node:fs/promises";

import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";

import { canonicalizeRow, rowToFields, type VocabularyRow } from "@shared/vocabulary";

export type TableWidth = 3 | 5;

export const FULL_HEADER = ["Term", "Reading", "Meaning", "Example", "JLPT"] as const;

/** Five columns once any row carries an example or a level. */
export function tableWidth(rows: readonly VocabularyRow[]): TableWidth {
  return rows.some((row) => row.example || row.jlpt) ? 5 : 3;
}

export function headerFor(width: TableWidth): string[] {
  return FULL_HEADER.slice(0, width);
}

export interface GridOptions {
  width?: TableWidth;
}

export function rowsToGrid(rows: readonly VocabularyRow[], options: GridOptions = {}): string[][] {
  const width = options.width ?? tableWidth(rows);
  return [headerFor(width), ...rows.map((row) => rowToFields(row).slice(0, width))];
}

function isHeaderRow(cells: readonly string[]): boolean {
  return (cells[0] ?? "").trim().toLowerCase() === "term";
}

/**
 * Reads a cell grid back into rows. A leading header is skipped, short rows are
 * padded and rows whose cells are all blank are dropped.
 */
export function gridToRows(grid: ReadonlyArray<ReadonlyArray<string>>): VocabularyRow[] {
  const body = grid.length && isHeaderRow(grid[0]) ? grid.slice(1) : grid;
  const rows: VocabularyRow[] = [];
  for (const cells of body) {
    const padded = Array.from({ length: FULL_HEADER.length }, (_, index) => cells[index] ?? "");
    if (padded.every((cell) => !cell.trim())) continue;
    rows.push(canonicalizeRow(padded));
  }
  return rows;
}

function toGrid(records: unknown): string[][] {
  if (!Array.isArray(records)) {
    return [];
  }
  return records.map((record: unknown) =>
    Array.isArray(record) ? record.map((cell: unknown) => (typeof cell === "string" ? cell : "")) : [],
  );
}

export function parseTableCsv(content: string): VocabularyRow[] {
  const records: unknown = parse(content, {
    bom: true,
    relax_column_count: true,
    skip_empty_lines: true,
  });
  return gridToRows(toGrid(records));
}

export function formatTableCsv(rows: readonly VocabularyRow[], options: GridOptions = {}): string {
  return stringify(rowsToGrid(rows, options), { bom: true });
}

export async function readTableCsv(filePath: string): Promise<VocabularyRow[]> {
  const content = await readFile(filePath, "utf8");
  return parseTableCsv(content);
}

/** A missing file reads as an empty table. */
export async function readTableCsvIfExists(filePath: string): Promise<VocabularyRow[]> {
  try {
    return await readTableCsv(filePath);
  } catch (error) {
    if (isMissingFile(error)) {
      return [];
    }
    throw error;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export async function writeTableCsv(
  filePath: string,
  rows: readonly VocabularyRow[],
  options: GridOptions = {},
): Promise<void> {
  await writeFile(filePath, formatTableCsv(rows, options), "utf8");
}

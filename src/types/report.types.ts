export type Severity = 'warning' | 'error';

/**
 * Row locator for a validation message:
 * null = whole file, HEADER_ROW = header row, N >= 1 = data row N.
 */
export type RowLocator = number | null;

export const HEADER_ROW = 0;

export interface ValidationMessage {
  dataset: string;
  row: RowLocator;
  columns: string[];
  message: string;
  severity: Severity;
}

export type CellValue = string | number | boolean | null;

export type DataRow = Record<string, CellValue>;

/**
 * One sheet of a workbook, rows keyed by column name
 */
export interface Dataset {
  name: string;
  columns: string[];
  rows: DataRow[];
}

export interface DatasetReport {
  dataset: string;
  messages: ValidationMessage[];
}

export interface ValidationReport {
  datasets: DatasetReport[];
  errorCount: number;
  warningCount: number;
}

/**
 * A proposal the submitted file may describe, keyed by its upper-case id
 */
export interface ProgramEntry {
  proposalId: string;
}

export type ProgramMap = Map<string, ProgramEntry>;

export interface ParseResult {
  datasets: Dataset[];
  report: ValidationReport;
}

/**
 * The spreadsheet parsing/validation engine
 */
export interface FileParser {
  check(bytes: Buffer, programs: ProgramMap): Promise<ParseResult>;
}

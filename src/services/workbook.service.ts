import * as XLSX from 'xlsx';
import sheetRules from '../config/sheet-rules.json';
import {
  CellValue,
  DataRow,
  Dataset,
  FileParser,
  HEADER_ROW,
  ParseResult,
  ProgramMap,
  Severity,
  ValidationMessage,
  ValidationReport,
} from '../types/report.types';
import { logger } from '../utils/logger';

interface SheetRule {
  required: string[];
  numeric: string[];
  codeColumn: string | null;
}

interface SheetRules {
  requiredSheets: string[];
  sheets: Record<string, SheetRule>;
}

const DEFAULT_RULES: SheetRules = sheetRules;

// Messages that concern the workbook as a whole
export const PROGRAM_DATASET = 'program';

function toCellValue(value: unknown): CellValue {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return null;
}

function isBlank(value: CellValue): boolean {
  return value === null || (typeof value === 'string' && value.trim() === '');
}

function isNumeric(value: CellValue): boolean {
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  if (typeof value === 'string' && value.trim() !== '') {
    return Number.isFinite(Number(value.trim()));
  }
  return false;
}

/**
 * Collects messages per dataset in insertion order and keeps the counts
 */
class ReportBuilder {
  private readonly sections = new Map<string, ValidationMessage[]>();
  private errorCount = 0;
  private warningCount = 0;

  constructor(datasetNames: string[]) {
    for (const name of datasetNames) {
      this.sections.set(name, []);
    }
  }

  add(
    severity: Severity,
    dataset: string,
    row: number | null,
    columns: string[],
    message: string
  ): void {
    const list = this.sections.get(dataset) ?? [];
    list.push({ dataset, row, columns, message, severity });
    this.sections.set(dataset, list);

    if (severity === 'error') {
      this.errorCount += 1;
    } else {
      this.warningCount += 1;
    }
  }

  build(): ValidationReport {
    return {
      datasets: [...this.sections].map(([dataset, messages]) => ({ dataset, messages })),
      errorCount: this.errorCount,
      warningCount: this.warningCount,
    };
  }
}

/**
 * Read one worksheet into a dataset. Blank lines are kept so that data
 * row N is always spreadsheet line N + 1.
 */
export function readDataset(name: string, sheet: XLSX.WorkSheet): Dataset {
  const grid = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    blankrows: true,
    raw: true,
  });

  const [headerRow = [], ...body] = grid;
  const columns = headerRow.map((cell) => String(toCellValue(cell) ?? '').trim());

  const rows = body.map((cells) => {
    // Header cells such as 'constructor' must not resolve through a prototype
    const row: DataRow = Object.create(null);
    columns.forEach((column, index) => {
      if (column && !Object.hasOwn(row, column)) {
        row[column] = toCellValue(cells[index]);
      }
    });
    return row;
  });

  return { name, columns, rows };
}

/**
 * Default parsing collaborator: structural checks on queue workbooks
 * (required sheets and columns, duplicate columns and codes, numeric
 * fields, proposal id)
 */
export class WorkbookService implements FileParser {
  private readonly rules: SheetRules;

  constructor(rules: SheetRules = DEFAULT_RULES) {
    this.rules = rules;
  }

  async check(bytes: Buffer, programs: ProgramMap): Promise<ParseResult> {
    const builder = new ReportBuilder([PROGRAM_DATASET, ...this.rules.requiredSheets]);
    const datasets: Dataset[] = [];

    let workbook: XLSX.WorkBook;
    try {
      workbook = XLSX.read(bytes, { type: 'buffer' });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn('Unreadable workbook', { error: reason });
      builder.add('error', PROGRAM_DATASET, null, [], `Unable to read workbook: ${reason}`);
      return { datasets, report: builder.build() };
    }

    for (const name of this.rules.requiredSheets) {
      const sheet = workbook.Sheets[name];
      if (!sheet) {
        builder.add('error', PROGRAM_DATASET, null, [], `Required sheet ${name} not found in file`);
        continue;
      }

      const dataset = readDataset(name, sheet);
      datasets.push(dataset);
      this.checkDataset(dataset, this.rules.sheets[name], programs, builder);
    }

    const report = builder.build();
    logger.debug('Workbook checked', {
      errorCount: report.errorCount,
      warningCount: report.warningCount,
    });

    return { datasets, report };
  }

  private checkDataset(
    dataset: Dataset,
    rule: SheetRule | undefined,
    programs: ProgramMap,
    builder: ReportBuilder
  ): void {
    const { name, columns, rows } = dataset;

    const seen = new Map<string, number>();
    for (const column of columns.filter(Boolean)) {
      seen.set(column, (seen.get(column) ?? 0) + 1);
    }
    for (const [column, count] of seen) {
      if (count > 1) {
        builder.add(
          'warning',
          name,
          HEADER_ROW,
          [column],
          `Warning: ${count - 1} duplicate ${column} column(s) found in sheet ${name}`
        );
      }
    }

    if (!rule) {
      return;
    }

    const missing = rule.required.filter((c) => !seen.has(c));
    for (const column of missing) {
      builder.add(
        'error',
        name,
        HEADER_ROW,
        [column],
        `Required column ${column} not found in sheet ${name}`
      );
    }

    const codeColumn = rule.codeColumn && seen.has(rule.codeColumn) ? rule.codeColumn : null;
    const numeric = rule.numeric.filter((c) => seen.has(c));
    const codes = new Map<string, number>();

    rows.forEach((row, index) => {
      const line = index + 1;

      if (Object.values(row).every(isBlank)) {
        return;
      }

      if (codeColumn) {
        const code = row[codeColumn];
        if (typeof code === 'string' && code.trim().startsWith('#')) {
          // Comment row
          return;
        }

        if (isBlank(code)) {
          builder.add(
            'error',
            name,
            line,
            [codeColumn],
            `Error evaluating line ${line}, column ${codeColumn} of sheet ${name}: ` +
              'Blank value found where a code was expected'
          );
        } else {
          const key = String(code).trim();
          const first = codes.get(key);
          if (first === undefined) {
            codes.set(key, line);
          } else {
            builder.add(
              'warning',
              name,
              line,
              [codeColumn],
              `Warning: ${codeColumn} value '${key}' on line ${line} of sheet ${name} ` +
                `duplicates line ${first}`
            );
          }
        }
      }

      for (const column of numeric) {
        const value = row[column];
        if (!isNumeric(value)) {
          const detail = isBlank(value) ? 'Blank value ' : `Non-numeric value, '${String(value)}', `;
          builder.add(
            'error',
            name,
            line,
            [column],
            `Error evaluating line ${line}, column ${column} of sheet ${name}: ` +
              `${detail}found where a numeric value was expected`
          );
        }
      }

      if (name === 'proposal' && seen.has('Prop ID')) {
        this.checkPropId(row['Prop ID'], line, programs, builder);
      }
    });
  }

  private checkPropId(
    value: CellValue,
    line: number,
    programs: ProgramMap,
    builder: ReportBuilder
  ): void {
    const propId = isBlank(value) ? '' : String(value).trim().toUpperCase();
    if (programs.has(propId)) {
      return;
    }

    const expected = [...programs.keys()].join(', ');
    builder.add(
      'error',
      'proposal',
      line,
      ['Prop ID'],
      `Error evaluating line ${line}, column Prop ID of sheet proposal: ` +
        `'${propId}' does not match proposal ${expected}`
    );
  }
}

import {
  CellValue,
  Dataset,
  HEADER_ROW,
  Severity,
  ValidationMessage,
  ValidationReport,
} from '../types/report.types';
import { escapeHtml } from '../utils/html.utils';

const BLANK_CELL = '&nbsp;';

function isBlank(value: CellValue | undefined): boolean {
  return (
    value === null ||
    value === undefined ||
    (typeof value === 'number' && Number.isNaN(value)) ||
    (typeof value === 'string' && value.trim() === '')
  );
}

function renderCell(value: CellValue | undefined): string {
  return isBlank(value) ? BLANK_CELL : escapeHtml(String(value));
}

function headerCells(columns: string[]): string {
  return columns.map((c) => `<th>${escapeHtml(c)}</th>`).join('');
}

/**
 * Renders validation reports as severity-tagged HTML. Output depends only
 * on its inputs, so the same report always renders to the same bytes.
 */
export class ReportService {
  format(report: ValidationReport, severity: Severity, datasets: Dataset[] = []): string {
    const byName = new Map(datasets.map((d) => [d.name, d]));
    const parts: string[] = [];

    for (const section of report.datasets) {
      const messages = section.messages.filter((m) => m.severity === severity);
      if (messages.length === 0) {
        continue;
      }

      parts.push(`<h4>Sheet ${escapeHtml(section.dataset)}</h4>`);
      for (const message of messages) {
        parts.push(this.formatMessage(message, byName.get(message.dataset)));
      }
    }

    return parts.join('\n');
  }

  summarize(report: ValidationReport): string {
    return `Error count is ${report.errorCount}, warning count is ${report.warningCount}`;
  }

  private formatMessage(message: ValidationMessage, dataset: Dataset | undefined): string {
    const text = `<p class="${message.severity}">${escapeHtml(message.message)}</p>`;

    if (message.row === null) {
      return text;
    }

    if (message.row === HEADER_ROW) {
      return `${text}\n<table class="excerpt"><tr>${headerCells(message.columns)}</tr></table>`;
    }

    // Data rows are 1-based
    const row = dataset?.rows[message.row - 1];
    if (!row) {
      return text;
    }

    const cells = message.columns
      .map((c) => `<td class="${message.severity}">${renderCell(row[c])}</td>`)
      .join('');

    return (
      `${text}\n<table class="excerpt">` +
      `<tr><th>Row</th>${headerCells(message.columns)}</tr>` +
      `<tr><td>${message.row}</td>${cells}</tr></table>`
    );
  }
}

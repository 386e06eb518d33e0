/**
 * Rendering of result rows as HTML, CSV or JSON, with an optional chart.
 */

import type { FormatOptions, FormattedResult, OutputFormat, Row } from '../types/models.js';
import { FormattingError } from '../types/errors.js';
import { errorMessage } from '../types/utils.js';
import type { Logger } from '../utils/logger.js';
import { renderChart } from './chart.js';

export const EMPTY_RESULT_TEXT = 'No data to format';

const CONTENT_TYPES: Record<OutputFormat, string> = {
  html: 'text/html',
  csv: 'text/csv',
  json: 'application/json',
};

/**
 * Case-insensitive; anything unrecognised renders as HTML.
 */
export function resolveFormat(format: string | undefined): OutputFormat {
  const normalized = format?.toLowerCase();
  return normalized === 'csv' || normalized === 'json' ? normalized : 'html';
}

/**
 * Union of row keys in first-seen order.
 */
export function columnsOf(rows: Row[]): string[] {
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      seen.add(key);
    }
  }
  return [...seen];
}

export function cellText(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function csvField(value: unknown): string {
  const text = cellText(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(rows: Row[], columns: string[]): string {
  const lines = [columns.map(csvField).join(',')];
  for (const row of rows) {
    lines.push(columns.map((col) => csvField(row[col])).join(','));
  }
  return `${lines.join('\n')}\n`;
}

export function toHtml(rows: Row[], columns: string[], options: FormatOptions = {}): string {
  const lines = ['<div class="lucidata-result">'];
  if (options.title) {
    lines.push(`<h3>${escapeHtml(options.title)}</h3>`);
  }
  if (options.description) {
    lines.push(`<p>${escapeHtml(options.description)}</p>`);
  }

  lines.push('<table class="table table-striped table-hover">');
  lines.push('<thead>');
  lines.push(`<tr>${columns.map((col) => `<th>${escapeHtml(col)}</th>`).join('')}</tr>`);
  lines.push('</thead>');
  lines.push('<tbody>');
  for (const row of rows) {
    lines.push(`<tr>${columns.map((col) => `<td>${escapeHtml(cellText(row[col]))}</td>`).join('')}</tr>`);
  }
  lines.push('</tbody>');
  lines.push('</table>');
  lines.push('</div>');

  return lines.join('\n');
}

export class ResultFormatter {
  constructor(private readonly logger: Logger) {}

  /**
   * @throws FormattingError when the rows cannot be rendered
   */
  format(rows: Row[], options: FormatOptions = {}): FormattedResult {
    if (rows.length === 0) {
      return { formattedData: EMPTY_RESULT_TEXT, contentType: 'text/plain' };
    }

    const format = resolveFormat(options.format);
    const columns = columnsOf(rows);

    let formattedData: string;
    try {
      switch (format) {
        case 'csv':
          formattedData = toCsv(rows, columns);
          break;
        case 'json':
          formattedData = JSON.stringify(rows);
          break;
        case 'html':
          formattedData = toHtml(rows, columns, options);
          break;
      }
    } catch (error) {
      this.logger.error(`Error formatting results: ${errorMessage(error)}`);
      throw new FormattingError(`Error formatting results: ${errorMessage(error)}`, { cause: error });
    }

    let visualization: string | undefined;
    if (options.visualizationType) {
      visualization = renderChart(rows, columns, options.visualizationType, options.title);
      if (!visualization) {
        this.logger.warn(`No numeric data to draw a ${options.visualizationType} chart`);
      }
    }

    this.logger.debug(`Formatted ${rows.length} rows as ${format}`);

    return { formattedData, contentType: CONTENT_TYPES[format], visualization };
  }
}

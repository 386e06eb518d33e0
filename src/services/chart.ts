/**
 * Chart rendering for formatted results.
 *
 * Charts are drawn as SVG and returned as base64 `data:` URIs so they can be
 * embedded directly in an `<img>` tag.
 */

import type { Row } from '../types/models.js';

const WIDTH = 800;
const HEIGHT = 480;
const MARGIN = { top: 48, right: 24, bottom: 72, left: 64 };
const PALETTE = ['#1f77b4', '#ff7f0e', '#2ca02c', '#d62728', '#9467bd', '#8c564b', '#e377c2', '#7f7f7f'];

const NUMERIC_TEXT = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

export interface ChartSeries {
  name: string;
  values: number[];
}

export type ChartPlan =
  | { kind: 'bar'; labels: string[]; series: ChartSeries }
  | { kind: 'line'; labels: string[]; series: ChartSeries[] }
  | { kind: 'pie'; labels: string[]; series: ChartSeries };

/**
 * Numeric value of a cell. PostgreSQL `numeric` columns arrive as strings,
 * so numeric-looking strings count.
 */
export function numericValue(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && NUMERIC_TEXT.test(value.trim())) {
    return Number(value.trim());
  }
  return undefined;
}

function columnValues(rows: Row[], col: string): number[] | undefined {
  const values: number[] = [];
  for (const row of rows) {
    const value = numericValue(row[col]);
    if (value === undefined) {
      return undefined;
    }
    values.push(value);
  }
  return values;
}

function labelText(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

function indexLabels(rows: Row[]): string[] {
  return rows.map((_row, index) => String(index));
}

function numericColumns(rows: Row[], columns: string[]): ChartSeries[] {
  const series: ChartSeries[] = [];
  for (const col of columns) {
    const values = columnValues(rows, col);
    if (values) {
      series.push({ name: col, values });
    }
  }
  return series;
}

/**
 * Decide what to draw for a requested chart type.
 *
 * - bar: first column as labels, second as values; a single column is drawn
 *   against the row index
 * - line: every numeric column against the row index
 * - pie: first column as labels, second as values
 * - anything else: bar chart of the first numeric column
 *
 * Returns undefined when the data has nothing numeric to draw.
 */
export function planChart(rows: Row[], columns: string[], type: string): ChartPlan | undefined {
  const kind = type.toLowerCase();

  if (kind === 'bar' && columns.length >= 2) {
    const values = columnValues(rows, columns[1]);
    return values
      ? { kind: 'bar', labels: rows.map((row) => labelText(row[columns[0]])), series: { name: columns[1], values } }
      : undefined;
  }

  if (kind === 'line') {
    const series = numericColumns(rows, columns);
    return series.length > 0 ? { kind: 'line', labels: indexLabels(rows), series } : undefined;
  }

  if (kind === 'pie' && columns.length >= 2) {
    const values = columnValues(rows, columns[1]);
    if (!values || values.some((value) => value < 0) || values.every((value) => value === 0)) {
      return undefined;
    }
    return { kind: 'pie', labels: rows.map((row) => labelText(row[columns[0]])), series: { name: columns[1], values } };
  }

  const [first] = numericColumns(rows, columns);
  return first ? { kind: 'bar', labels: indexLabels(rows), series: first } : undefined;
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function round(value: number): string {
  return (Math.round(value * 100) / 100).toString();
}

interface Scale {
  min: number;
  max: number;
  y(value: number): number;
}

function valueScale(values: number[]): Scale {
  let min = Math.min(0, ...values);
  let max = Math.max(0, ...values);
  if (min === max) {
    max = min + 1;
  }
  const plotHeight = HEIGHT - MARGIN.top - MARGIN.bottom;
  return {
    min,
    max,
    y: (value) => MARGIN.top + ((max - value) / (max - min)) * plotHeight,
  };
}

function axes(scale: Scale): string[] {
  const parts: string[] = [];
  const left = MARGIN.left;
  const right = WIDTH - MARGIN.right;

  for (let tick = 0; tick <= 4; tick++) {
    const value = scale.min + ((scale.max - scale.min) * tick) / 4;
    const y = round(scale.y(value));
    parts.push(`<line x1="${left}" y1="${y}" x2="${right}" y2="${y}" stroke="#e0e0e0"/>`);
    parts.push(`<text x="${left - 8}" y="${y}" text-anchor="end" dominant-baseline="middle" font-size="11">${round(value)}</text>`);
  }
  parts.push(`<line x1="${left}" y1="${MARGIN.top}" x2="${left}" y2="${HEIGHT - MARGIN.bottom}" stroke="#333"/>`);
  parts.push(`<line x1="${left}" y1="${round(scale.y(0))}" x2="${right}" y2="${round(scale.y(0))}" stroke="#333"/>`);
  return parts;
}

function xLabel(label: string, x: number): string {
  const y = HEIGHT - MARGIN.bottom + 14;
  return `<text x="${round(x)}" y="${y}" text-anchor="end" transform="rotate(-45 ${round(x)} ${y})" font-size="11">${escapeXml(label)}</text>`;
}

function drawBar(plan: { labels: string[]; series: ChartSeries }): string[] {
  const { values } = plan.series;
  const scale = valueScale(values);
  const plotWidth = WIDTH - MARGIN.left - MARGIN.right;
  const slot = plotWidth / Math.max(values.length, 1);
  const parts = axes(scale);

  values.forEach((value, index) => {
    const x = MARGIN.left + index * slot + slot * 0.1;
    const top = Math.min(scale.y(value), scale.y(0));
    const height = Math.abs(scale.y(value) - scale.y(0));
    parts.push(`<rect x="${round(x)}" y="${round(top)}" width="${round(slot * 0.8)}" height="${round(height)}" fill="${PALETTE[0]}"/>`);
    parts.push(xLabel(plan.labels[index] ?? '', x + slot * 0.4));
  });

  parts.push(legend([plan.series.name]));
  return parts;
}

function drawLine(plan: { labels: string[]; series: ChartSeries[] }): string[] {
  const scale = valueScale(plan.series.flatMap((series) => series.values));
  const plotWidth = WIDTH - MARGIN.left - MARGIN.right;
  const count = plan.labels.length;
  const x = (index: number) => MARGIN.left + (count > 1 ? (index * plotWidth) / (count - 1) : plotWidth / 2);
  const parts = axes(scale);

  plan.series.forEach((series, seriesIndex) => {
    const points = series.values.map((value, index) => `${round(x(index))},${round(scale.y(value))}`).join(' ');
    parts.push(`<polyline points="${points}" fill="none" stroke="${PALETTE[seriesIndex % PALETTE.length]}" stroke-width="2"/>`);
  });
  plan.labels.forEach((label, index) => parts.push(xLabel(label, x(index))));

  parts.push(legend(plan.series.map((series) => series.name)));
  return parts;
}

function drawPie(plan: { labels: string[]; series: ChartSeries }): string[] {
  const { values } = plan.series;
  const total = values.reduce((sum, value) => sum + value, 0);
  const cx = WIDTH / 2;
  const cy = (HEIGHT + MARGIN.top - MARGIN.bottom) / 2 + 12;
  const radius = Math.min(WIDTH, HEIGHT) / 2 - 72;
  const parts: string[] = [];

  let angle = -Math.PI / 2;
  values.forEach((value, index) => {
    const color = PALETTE[index % PALETTE.length];
    const sweep = (value / total) * Math.PI * 2;

    if (sweep >= Math.PI * 2 - 1e-9) {
      parts.push(`<circle cx="${cx}" cy="${round(cy)}" r="${radius}" fill="${color}"/>`);
    } else if (sweep > 0) {
      const x1 = cx + radius * Math.cos(angle);
      const y1 = cy + radius * Math.sin(angle);
      const x2 = cx + radius * Math.cos(angle + sweep);
      const y2 = cy + radius * Math.sin(angle + sweep);
      const largeArc = sweep > Math.PI ? 1 : 0;
      parts.push(
        `<path d="M ${cx} ${round(cy)} L ${round(x1)} ${round(y1)} A ${radius} ${radius} 0 ${largeArc} 1 ${round(x2)} ${round(y2)} Z" fill="${color}"/>`
      );
    }
    angle += sweep;
  });

  parts.push(legend(plan.labels));
  return parts;
}

function legend(names: string[]): string {
  const items = names.map((name, index) => {
    const y = MARGIN.top + index * 18;
    const color = PALETTE[index % PALETTE.length];
    return `<rect x="${WIDTH - 150}" y="${y}" width="10" height="10" fill="${color}"/><text x="${WIDTH - 134}" y="${y + 9}" font-size="11">${escapeXml(name)}</text>`;
  });
  return `<g class="legend">${items.join('')}</g>`;
}

/**
 * Render a planned chart as an SVG document.
 */
export function renderSvg(plan: ChartPlan, title?: string): string {
  let body: string[];
  switch (plan.kind) {
    case 'bar':
      body = drawBar(plan);
      break;
    case 'line':
      body = drawLine(plan);
      break;
    case 'pie':
      body = drawPie(plan);
      break;
  }

  const heading = title
    ? `<text x="${WIDTH / 2}" y="28" text-anchor="middle" font-size="16" font-weight="bold">${escapeXml(title)}</text>`
    : '';

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${HEIGHT}" viewBox="0 0 ${WIDTH} ${HEIGHT}" font-family="sans-serif">`,
    `<rect width="${WIDTH}" height="${HEIGHT}" fill="#ffffff"/>`,
    heading,
    ...body,
    '</svg>',
  ].join('\n');
}

/**
 * Plan and render a chart, returning a `data:` URI, or undefined when there is
 * nothing numeric to draw.
 */
export function renderChart(rows: Row[], columns: string[], type: string, title?: string): string | undefined {
  const plan = planChart(rows, columns, type);
  if (!plan) {
    return undefined;
  }
  const svg = renderSvg(plan, title);
  return `data:image/svg+xml;base64,${Buffer.from(svg, 'utf8').toString('base64')}`;
}

import fs from 'fs/promises';
import type { ChartRenderer, FrequencyRecord } from '../scan/controller';
import type { Logger } from '../observability/types';

export interface ChartOptions {
  title: string;
  subtitle?: string;
  width?: number;
  height?: number;
}

const MARGIN = { top: 70, right: 30, bottom: 60, left: 70 };
const GRID_LINES = 5;

export function chartPathFor(csvPath: string): string {
  return /\.csv$/i.test(csvPath) ? csvPath.replace(/\.csv$/i, '.svg') : `${csvPath}.svg`;
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function fmt(value: number): string {
  return String(Math.round(value * 100) / 100);
}

/** Records that carry an average; zero-sample records have nothing to plot. */
export function plottable(records: readonly FrequencyRecord[]): FrequencyRecord[] {
  return records.filter((r) => r.samples > 0 && Number.isFinite(r.average));
}

/**
 * Average noise floor against frequency as a standalone SVG line chart.
 * Returns null when no record has samples.
 */
export function renderNoiseChart(records: readonly FrequencyRecord[], options: ChartOptions): string | null {
  const points = plottable(records);
  if (points.length === 0) return null;

  const width = options.width ?? 1000;
  const height = options.height ?? 600;
  const plotW = width - MARGIN.left - MARGIN.right;
  const plotH = height - MARGIN.top - MARGIN.bottom;

  const freqs = points.map((p) => p.frequencyMhz);
  const avgs = points.map((p) => p.average);
  let xMin = Math.min(...freqs);
  let xMax = Math.max(...freqs);
  let yMin = Math.floor(Math.min(...avgs)) - 1;
  let yMax = Math.ceil(Math.max(...avgs)) + 1;
  if (xMax === xMin) {
    xMin -= 0.5;
    xMax += 0.5;
  }
  if (yMax === yMin) {
    yMin -= 1;
    yMax += 1;
  }

  const x = (f: number) => MARGIN.left + ((f - xMin) / (xMax - xMin)) * plotW;
  const y = (v: number) => MARGIN.top + (1 - (v - yMin) / (yMax - yMin)) * plotH;

  const grid: string[] = [];
  for (let i = 0; i <= GRID_LINES; i++) {
    const fx = xMin + ((xMax - xMin) * i) / GRID_LINES;
    const vy = yMin + ((yMax - yMin) * i) / GRID_LINES;
    grid.push(
      `<line class="grid" x1="${fmt(x(fx))}" y1="${MARGIN.top}" x2="${fmt(x(fx))}" y2="${MARGIN.top + plotH}"/>`,
      `<text class="tick" x="${fmt(x(fx))}" y="${MARGIN.top + plotH + 18}" text-anchor="middle">${fmt(fx)}</text>`,
      `<line class="grid" x1="${MARGIN.left}" y1="${fmt(y(vy))}" x2="${MARGIN.left + plotW}" y2="${fmt(y(vy))}"/>`,
      `<text class="tick" x="${MARGIN.left - 8}" y="${fmt(y(vy))}" text-anchor="end" dominant-baseline="middle">${fmt(vy)}</text>`,
    );
  }

  const line = points.map((p) => `${fmt(x(p.frequencyMhz))},${fmt(y(p.average))}`).join(' ');

  const subtitle = options.subtitle
    ? [`<text class="label" x="${width / 2}" y="50" text-anchor="middle">${escapeXml(options.subtitle)}</text>`]
    : [];

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    '<style>.grid{stroke:#ddd;stroke-width:1}.tick{font:12px sans-serif;fill:#444}.label{font:14px sans-serif}.title{font:16px sans-serif;font-weight:bold}</style>',
    `<rect width="${width}" height="${height}" fill="#fff"/>`,
    `<text class="title" x="${width / 2}" y="28" text-anchor="middle">${escapeXml(options.title)}</text>`,
    ...subtitle,
    ...grid,
    `<rect x="${MARGIN.left}" y="${MARGIN.top}" width="${plotW}" height="${plotH}" fill="none" stroke="#333"/>`,
    `<polyline fill="none" stroke="#1f77b4" stroke-width="2" points="${line}"/>`,
    `<text class="label" x="${MARGIN.left + plotW / 2}" y="${height - 15}" text-anchor="middle">Frequency (MHz)</text>`,
    `<text class="label" x="18" y="${MARGIN.top + plotH / 2}" text-anchor="middle" transform="rotate(-90 18 ${MARGIN.top + plotH / 2})">Noise Floor (avg)</text>`,
    '</svg>',
  ].join('\n') + '\n';
}

export class SvgChartRenderer implements ChartRenderer {
  constructor(
    private readonly path: string,
    private readonly options: ChartOptions,
    private readonly logger?: Logger,
  ) {}

  async render(records: readonly FrequencyRecord[]): Promise<void> {
    const svg = renderNoiseChart(records, this.options);
    if (svg === null) {
      this.logger?.warn('No data to plot, chart skipped', { path: this.path });
      return;
    }
    await fs.writeFile(this.path, svg, 'utf8');
    this.logger?.info(`Chart saved to ${this.path}`);
  }
}

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { SvgChartRenderer, chartPathFor, escapeXml, plottable, renderNoiseChart } from './chart';
import type { FrequencyRecord } from '../scan/controller';

function record(frequencyMhz: number, average: number, samples = 3): FrequencyRecord {
  return { frequencyMhz, samples, average, min: average - 1, max: average + 1, stdev: 1 };
}

const empty: FrequencyRecord = { frequencyMhz: 915.5, samples: 0, average: NaN, min: NaN, max: NaN, stdev: NaN };

describe('chart', () => {
  it('derives the chart path from the CSV path', () => {
    expect(chartPathFor('out/scan.csv')).toBe('out/scan.svg');
    expect(chartPathFor('scan.CSV')).toBe('scan.svg');
    expect(chartPathFor('scan')).toBe('scan.svg');
  });

  it('escapes markup in titles', () => {
    expect(escapeXml('BW <250> & "SF"')).toBe('BW &lt;250&gt; &amp; &quot;SF&quot;');
  });

  it('leaves zero-sample records out of the plot', () => {
    expect(plottable([record(915, -110), empty]).map((r) => r.frequencyMhz)).toEqual([915]);
  });

  it('draws the averages as a polyline scaled to the plot area', () => {
    const svg = renderNoiseChart([record(915, -110), empty, record(916, -100)], {
      title: 'Noise Floor vs Frequency - BW: 250 SF: 10 CR: 5',
      subtitle: 'Freq: 915-916 MHz Steps: 1',
    });

    expect(svg).not.toBeNull();
    const lines = (svg ?? '').split('\n');
    expect(lines[0]).toBe('<svg xmlns="http://www.w3.org/2000/svg" width="1000" height="600" viewBox="0 0 1000 600">');
    expect(lines).toContain('<text class="title" x="500" y="28" text-anchor="middle">Noise Floor vs Frequency - BW: 250 SF: 10 CR: 5</text>');
    expect(lines).toContain('<text class="label" x="500" y="50" text-anchor="middle">Freq: 915-916 MHz Steps: 1</text>');
    expect(lines).toContain('<polyline fill="none" stroke="#1f77b4" stroke-width="2" points="70,500.83 970,109.17"/>');
    expect(lines[lines.length - 2]).toBe('</svg>');
    expect(lines[lines.length - 1]).toBe('');
  });

  it('omits the subtitle when none is given', () => {
    const svg = renderNoiseChart([record(915, -110)], { title: 't' }) ?? '';
    expect(svg).not.toContain('y="50"');
  });

  it('returns null when nothing can be plotted', () => {
    expect(renderNoiseChart([], { title: 't' })).toBeNull();
    expect(renderNoiseChart([empty], { title: 't' })).toBeNull();
  });

  describe('SvgChartRenderer', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'noisefloor-chart-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('writes the chart next to the CSV', async () => {
      const file = path.join(dir, 'scan.svg');
      await new SvgChartRenderer(file, { title: 'Noise' }).render([record(915, -110), record(915.125, -108)]);

      const svg = await fs.readFile(file, 'utf8');
      expect(svg.startsWith('<svg ')).toBe(true);
      expect(svg.endsWith('</svg>\n')).toBe(true);
    });

    it('writes nothing without data', async () => {
      const file = path.join(dir, 'scan.svg');
      await new SvgChartRenderer(file, { title: 'Noise' }).render([empty]);

      await expect(fs.access(file)).rejects.toThrow();
    });
  });
});

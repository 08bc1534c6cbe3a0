import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { VegaChartRenderer } from './chart.renderer';
import { buildPriceChartSpec } from './price-chart';

describe('VegaChartRenderer', () => {
  const renderer = new VegaChartRenderer();
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'chart-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes an svg with one symbol per recorded price', async () => {
    const file = join(dir, 'charts', 'air-max.svg');
    const spec = buildPriceChartSpec('air max', [
      {
        keyword: 'air max',
        title: 'Nike Air Max 90',
        price: 89.99,
        capturedAt: new Date('2026-03-01T12:00:00.000Z'),
      },
      {
        keyword: 'air max',
        title: 'Nike Air Max 97',
        price: 1049,
        capturedAt: new Date('2026-03-02T12:00:00.000Z'),
      },
    ]);

    await renderer.render(spec, file);

    expect(existsSync(file)).toBe(true);
    const svg = readFileSync(file, 'utf8');
    expect(svg.startsWith('<svg')).toBe(true);
    expect(svg).toContain('Price History: air max');

    const symbols = /<g class="mark-symbol role-mark"[^>]*>([\s\S]*?)<\/g>/.exec(svg);
    expect(symbols).not.toBeNull();
    expect(symbols?.[1].match(/<path/g)).toHaveLength(2);
  }, 30_000);
});

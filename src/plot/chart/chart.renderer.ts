import { Injectable } from '@nestjs/common';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Spec } from 'vega';

export abstract class ChartRenderer {
  abstract render(spec: Spec, file: string): Promise<void>;
}

/**
 * Renders the spec headlessly and writes it as an SVG file.
 */
@Injectable()
export class VegaChartRenderer extends ChartRenderer {
  async render(spec: Spec, file: string): Promise<void> {
    const vega = await import('vega');
    const view = new vega.View(vega.parse(spec), { renderer: 'none' });
    try {
      const svg = await view.toSVG();
      await mkdir(dirname(file), { recursive: true });
      await writeFile(file, svg, 'utf8');
    } finally {
      view.finalize();
    }
  }
}

import type { Spec } from 'vega';
import { HistoryRecord } from '../../tracker/interfaces/listing.interface';

export const PRICE_DATA = 'prices';

/**
 * Vega scatter plot of price against capture time, one colour per keyword.
 */
export function buildPriceChartSpec(keyword: string, records: readonly HistoryRecord[]): Spec {
  return {
    $schema: 'https://vega.github.io/schema/vega/v5.json',
    width: 800,
    height: 400,
    padding: 10,
    background: 'white',
    title: { text: `Price History: ${keyword}` },
    data: [
      {
        name: PRICE_DATA,
        values: records.map((record) => ({
          capturedAt: record.capturedAt.getTime(),
          price: record.price,
          keyword: record.keyword,
          title: record.title,
        })),
      },
    ],
    scales: [
      {
        name: 'x',
        type: 'time',
        domain: { data: PRICE_DATA, field: 'capturedAt' },
        range: 'width',
        nice: true,
      },
      {
        name: 'y',
        type: 'linear',
        domain: { data: PRICE_DATA, field: 'price' },
        range: 'height',
        nice: true,
        zero: false,
      },
      {
        name: 'color',
        type: 'ordinal',
        domain: { data: PRICE_DATA, field: 'keyword' },
        range: 'category',
      },
    ],
    axes: [
      { orient: 'bottom', scale: 'x', title: 'Captured at', grid: true, labelAngle: -45, labelAlign: 'right' },
      { orient: 'left', scale: 'y', title: 'Price (USD)', grid: true },
    ],
    legends: [{ fill: 'color', title: 'Keyword' }],
    marks: [
      {
        type: 'symbol',
        from: { data: PRICE_DATA },
        encode: {
          enter: {
            x: { scale: 'x', field: 'capturedAt' },
            y: { scale: 'y', field: 'price' },
            fill: { scale: 'color', field: 'keyword' },
            size: { value: 60 },
            tooltip: { signal: "datum.title + ': ' + format(datum.price, '$,.2f')" },
          },
        },
      },
    ],
  };
}

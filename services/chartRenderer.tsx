import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { ReactElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import type { HousingAnalysis } from '../types';
import {
  ItemQuantityChart,
  ItemTransactionsChart,
  PaymentMethodChart,
  TotalSpentHistogram,
} from '../components/Charts';
import { histogram } from '../utils/statistics';
import { logger } from '../utils/logger';

export interface ChartDocument {
  file: string;
  title: string;
  element: ReactElement;
}

export const buildCharts = (analysis: HousingAnalysis, totals: number[]): ChartDocument[] => [
  {
    file: 'item-quantity.html',
    title: 'Total Quantity Sold per Item',
    element: <ItemQuantityChart results={analysis.itemQuantities} />,
  },
  {
    file: 'item-transactions.html',
    title: 'Number of Transactions per Item',
    element: <ItemTransactionsChart results={analysis.itemCounts} />,
  },
  {
    file: 'payment-methods.html',
    title: 'Payment Method Distribution',
    element: <PaymentMethodChart results={analysis.paymentCounts} />,
  },
  {
    file: 'total-spent-histogram.html',
    title: 'Distribution of Total Spent',
    element: <TotalSpentHistogram bins={histogram(totals)} />,
  },
];

const ChartPage = ({ chart }: { chart: ChartDocument }) => (
  <html lang="en">
    <head>
      <meta charSet="utf-8" />
      <title>{chart.title}</title>
    </head>
    <body>{chart.element}</body>
  </html>
);

export const renderChartHtml = (chart: ChartDocument): string =>
  `<!DOCTYPE html>${renderToStaticMarkup(<ChartPage chart={chart} />)}\n`;

export class ChartRenderer {
  constructor(private readonly outputDir: string) {}

  async renderAll(analysis: HousingAnalysis, totals: number[]): Promise<string[]> {
    await mkdir(this.outputDir, { recursive: true });

    const written: string[] = [];
    for (const chart of buildCharts(analysis, totals)) {
      const file = path.join(this.outputDir, chart.file);
      await writeFile(file, renderChartHtml(chart), 'utf8');
      written.push(file);
    }
    logger.info('Rendered charts', { path: this.outputDir, charts: written.length });
    return written;
  }
}

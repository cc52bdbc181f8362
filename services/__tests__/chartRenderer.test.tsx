import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { renderToStaticMarkup } from 'react-dom/server';
import { ChartRenderer, buildCharts, renderChartHtml } from '../chartRenderer';
import { ItemTransactionsChart, PaymentMethodChart } from '../../components/Charts';
import { analyzeHousing } from '../housingAnalysis';
import { cleanHousing } from '../../utils/cleaning';
import { presentNumbers } from '../../utils/cells';
import { setLogSink } from '../../utils/logger';
import { SCENARIO_ROWS, housing } from '../../utils/__tests__/helpers';

const cleaned = cleanHousing(housing(SCENARIO_ROWS)).dataset;
const analysis = analyzeHousing(cleaned);
const totals = presentNumbers(cleaned, 'TotalSpent');

describe('chart components', () => {
  it('renders a captioned SVG bar chart', () => {
    const markup = renderToStaticMarkup(<ItemTransactionsChart results={analysis.itemCounts} />);

    expect(markup.startsWith('<figure class="chart-card"><figcaption>Number of Transactions per Item</figcaption>')).toBe(
      true,
    );
    expect(markup).toContain('<svg');
  });

  it('renders the payment pie chart', () => {
    const markup = renderToStaticMarkup(<PaymentMethodChart results={analysis.paymentCounts} />);

    expect(markup).toContain('<figcaption>Payment Method Distribution</figcaption>');
    expect(markup).toContain('<svg');
  });
});

describe('buildCharts', () => {
  it('produces the four standard charts', () => {
    expect(buildCharts(analysis, totals).map((c) => c.file)).toEqual([
      'item-quantity.html',
      'item-transactions.html',
      'payment-methods.html',
      'total-spent-histogram.html',
    ]);
  });

  it('wraps each chart in a standalone page', () => {
    const [, , , histogramChart] = buildCharts(analysis, totals);
    const html = renderChartHtml(histogramChart);

    expect(
      html.startsWith(
        '<!DOCTYPE html><html lang="en"><head><meta charSet="utf-8"/><title>Distribution of Total Spent</title></head><body><figure class="chart-card">',
      ),
    ).toBe(true);
    expect(html.endsWith('</body></html>\n')).toBe(true);
  });

  it('escapes markup in the page title', () => {
    const [first] = buildCharts(analysis, totals);
    const html = renderChartHtml({ ...first, title: 'Sales <by> Item & Month' });

    expect(html).toContain('<title>Sales &lt;by&gt; Item &amp; Month</title>');
  });
});

describe('ChartRenderer', () => {
  let dir: string;
  let restoreSink: (line: string) => void;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'housing-charts-'));
    restoreSink = setLogSink(() => {});
  });

  afterEach(async () => {
    setLogSink(restoreSink);
    await rm(dir, { recursive: true, force: true });
  });

  it('writes one file per chart', async () => {
    const outDir = path.join(dir, 'charts');
    const written = await new ChartRenderer(outDir).renderAll(analysis, totals);

    expect(written).toEqual([
      path.join(outDir, 'item-quantity.html'),
      path.join(outDir, 'item-transactions.html'),
      path.join(outDir, 'payment-methods.html'),
      path.join(outDir, 'total-spent-histogram.html'),
    ]);
    expect((await readdir(outDir)).sort()).toEqual([
      'item-quantity.html',
      'item-transactions.html',
      'payment-methods.html',
      'total-spent-histogram.html',
    ]);
    expect(await readFile(written[0], 'utf8')).toContain('<figcaption>Total Quantity Sold per Item</figcaption>');
  });
});

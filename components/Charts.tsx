import type { ReactNode } from 'react';
import { Bar, BarChart, CartesianGrid, Cell, Pie, PieChart, Legend, XAxis, YAxis } from 'recharts';
import type { AggregateResult } from '../types';
import type { HistogramBin } from '../utils/statistics';

export const CHART_WIDTH = 720;
export const CHART_HEIGHT = 400;

const PALETTE = ['#4f46e5', '#0ea5e9', '#10b981', '#f59e0b', '#ef4444', '#8b5cf6', '#ec4899', '#64748b'];

// --- Sub-components ---

interface CardProps {
  children?: ReactNode;
  title: string;
}

const Card = ({ children, title }: CardProps) => (
  <figure className="chart-card">
    <figcaption>{title}</figcaption>
    {children}
  </figure>
);

interface BarSeriesProps {
  title: string;
  data: Array<{ label: string; value: number }>;
  xLabel: string;
  yLabel: string;
}

export const BarSeriesChart = ({ title, data, xLabel, yLabel }: BarSeriesProps) => (
  <Card title={title}>
    <BarChart width={CHART_WIDTH} height={CHART_HEIGHT} data={data} margin={{ top: 16, right: 24, bottom: 32, left: 24 }}>
      <CartesianGrid strokeDasharray="3 3" vertical={false} />
      <XAxis dataKey="label" label={{ value: xLabel, position: 'insideBottom', offset: -16 }} />
      <YAxis label={{ value: yLabel, angle: -90, position: 'insideLeft' }} />
      <Bar dataKey="value" fill={PALETTE[0]} radius={[4, 4, 0, 0]} isAnimationActive={false} />
    </BarChart>
  </Card>
);

export const ItemQuantityChart = ({ results }: { results: AggregateResult[] }) => (
  <BarSeriesChart
    title="Total Quantity Sold per Item"
    data={results.map((r) => ({ label: r.groupKey, value: r.sum ?? 0 }))}
    xLabel="Item"
    yLabel="Total Quantity"
  />
);

export const ItemTransactionsChart = ({ results }: { results: AggregateResult[] }) => (
  <BarSeriesChart
    title="Number of Transactions per Item"
    data={results.map((r) => ({ label: r.groupKey, value: r.count }))}
    xLabel="Item"
    yLabel="Transactions"
  />
);

export const PaymentMethodChart = ({ results }: { results: AggregateResult[] }) => (
  <Card title="Payment Method Distribution">
    <PieChart width={CHART_WIDTH} height={CHART_HEIGHT}>
      <Pie
        data={results.map((r) => ({ name: r.groupKey, value: r.count }))}
        dataKey="value"
        nameKey="name"
        cx="50%"
        cy="50%"
        outerRadius={140}
        label
        isAnimationActive={false}
      >
        {results.map((r, idx) => (
          <Cell key={r.groupKey} fill={PALETTE[idx % PALETTE.length]} />
        ))}
      </Pie>
      <Legend />
    </PieChart>
  </Card>
);

const formatEdge = (value: number): string => (Number.isInteger(value) ? String(value) : value.toFixed(2));

export const TotalSpentHistogram = ({ bins }: { bins: HistogramBin[] }) => (
  <BarSeriesChart
    title="Distribution of Total Spent"
    data={bins.map((b) => ({ label: `${formatEdge(b.start)}–${formatEdge(b.end)}`, value: b.count }))}
    xLabel="Total Spent"
    yLabel="Frequency"
  />
);

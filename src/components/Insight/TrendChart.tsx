'use client';

import {
  CartesianGrid,
  Legend,
  Line,
  LineChart,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from 'recharts';
import { formatMonth, formatNumber } from '../../../lib/utils/formatters';
import type { TrendChartModel, TrendPoint } from '@/lib/charts/trend-chart';

export function TrendChart({ model }: { model: TrendChartModel }) {
  if (model.data.length === 0) {
    return <p className="text-sm text-gray-500">No crime in the selected period</p>;
  }

  return (
    <figure>
      <figcaption className="mb-2 text-lg font-semibold text-ink">{model.title}</figcaption>
      <ResponsiveContainer width="100%" height={300}>
        <LineChart data={model.data} margin={{ top: 5, right: 10, bottom: 5, left: 0 }}>
          <CartesianGrid strokeDasharray="3 3" stroke="#e5e7eb" />
          <XAxis
            dataKey="month"
            interval={0}
            tickFormatter={(month: string) => formatMonth(month)}
            tick={{ fontSize: 11 }}
          />
          <YAxis
            domain={model.yDomain}
            ticks={model.yTicks}
            allowDecimals={false}
            tick={{ fontSize: 11 }}
            label={{ value: 'Crime Count', angle: -90, position: 'insideLeft', fontSize: 12 }}
          />
          <Tooltip
            labelFormatter={(month: string) => formatMonth(month, true)}
            formatter={(value) => (typeof value === 'number' ? formatNumber(value) : String(value))}
          />
          <Legend verticalAlign="bottom" />
          {model.groups.map((group) => (
            <Line
              key={group}
              name={group}
              type="linear"
              dataKey={(point: TrendPoint) => point.values[group]}
              stroke={model.colors[group]}
              strokeWidth={2}
              dot={{ r: 4, fill: model.colors[group] }}
              connectNulls
              isAnimationActive={false}
            />
          ))}
        </LineChart>
      </ResponsiveContainer>
    </figure>
  );
}

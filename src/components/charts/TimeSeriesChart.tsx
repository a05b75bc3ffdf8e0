import React from 'react';
import {
  CartesianGrid,
  Legend,
  ResponsiveContainer,
  Scatter,
  ScatterChart,
  Tooltip,
  XAxis,
  YAxis,
} from 'recharts';
import { formatDate } from '../../lib/format';
import type { ScatterChartSpec } from '../../types';

export const TimeSeriesChart: React.FC<{ spec: ScatterChartSpec }> = ({ spec }) => (
  <div className="h-96">
    <ResponsiveContainer width="100%" height="100%">
      <ScatterChart margin={{ left: 6, right: 16, top: 4, bottom: 40 }}>
        {spec.showGrid && <CartesianGrid strokeDasharray="4 4" strokeOpacity={0.7} />}
        <XAxis
          dataKey="x"
          type="number"
          name={spec.xLabel}
          scale="time"
          domain={['dataMin', 'dataMax']}
          tickFormatter={formatDate}
          angle={-45}
          textAnchor="end"
          label={{ value: spec.xLabel, position: 'insideBottom', offset: -32 }}
        />
        <YAxis
          dataKey="y"
          type="number"
          name={spec.yLabel}
          label={{ value: spec.yLabel, angle: -90, position: 'insideLeft' }}
        />
        <Tooltip
          cursor={{ strokeDasharray: '3 3' }}
          formatter={(value, name) => {
            if (typeof value !== 'number') return value;
            return name === spec.xLabel ? formatDate(value) : value.toFixed(2);
          }}
        />
        {spec.showLegend && <Legend verticalAlign="top" />}
        {spec.series.map((series) => (
          <Scatter
            key={series.label}
            name={series.label}
            data={series.points}
            fill={series.color}
            fillOpacity={series.opacity}
            shape={series.marker}
            isAnimationActive={false}
          />
        ))}
      </ScatterChart>
    </ResponsiveContainer>
  </div>
);

import React from 'react';
import { Line, LineChart, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts';
import type { LineChartSpec } from '../../types';

export const CreationTrendChart: React.FC<{ spec: LineChartSpec }> = ({ spec }) => (
  <div className="h-80">
    <ResponsiveContainer width="100%" height="100%">
      <LineChart data={spec.data} margin={{ left: 6, right: 16, top: 4, bottom: 24 }}>
        <XAxis
          dataKey="year"
          type="number"
          domain={['dataMin', 'dataMax']}
          allowDecimals={false}
          label={{ value: spec.xLabel, position: 'insideBottom', offset: -16 }}
        />
        <YAxis
          allowDecimals={false}
          label={{ value: spec.yLabel, angle: -90, position: 'insideLeft' }}
        />
        <Tooltip />
        {spec.series.map((series) => (
          <Line
            key={series.dataKey}
            type="linear"
            dataKey={series.dataKey}
            name={series.label}
            stroke={series.color}
            strokeWidth={2}
            dot={{ r: 4, fill: series.color }}
            isAnimationActive={false}
          />
        ))}
      </LineChart>
    </ResponsiveContainer>
  </div>
);

import React from 'react';
import { Bar, BarChart, Legend, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts';
import type { BarChartSpec } from '../../types';

export const LanguageTrendsChart: React.FC<{ spec: BarChartSpec }> = ({ spec }) => (
  <div className="h-80">
    <ResponsiveContainer width="100%" height="100%">
      <BarChart data={spec.data} margin={{ left: 6, right: 6, top: 4, bottom: 24 }}>
        <XAxis dataKey="language" angle={-45} textAnchor="end" interval={0} height={56} />
        <YAxis
          label={{ value: spec.yLabel, angle: -90, position: 'insideLeft' }}
          allowDecimals={false}
        />
        <Tooltip />
        {spec.showLegend && <Legend verticalAlign="top" />}
        {spec.series.map((series) => (
          <Bar
            key={series.dataKey}
            dataKey={series.dataKey}
            name={series.label}
            fill={series.color}
            radius={[3, 3, 0, 0]}
          />
        ))}
      </BarChart>
    </ResponsiveContainer>
  </div>
);

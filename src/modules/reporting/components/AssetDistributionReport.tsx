import { Cell, Pie, PieChart } from 'recharts';
import type { DistributionSlice } from '../asset-distribution';
import { formatAmount, formatShare } from '../format';

// Chart colors, cycled when there are more groups than entries
const COLORS = [
  'hsl(174, 72%, 40%)',
  'hsl(142, 76%, 36%)',
  'hsl(270, 60%, 55%)',
  'hsl(38, 92%, 45%)',
  'hsl(0, 84%, 50%)',
  'hsl(215, 16%, 47%)',
  'hsl(200, 60%, 50%)',
  'hsl(340, 70%, 50%)',
];

export interface AssetDistributionReportProps {
  title: string;
  currency: string;
  total: number;
  slices: DistributionSlice[];
  computedAt: string;
}

export function AssetDistributionReport({ title, currency, total, slices, computedAt }: AssetDistributionReportProps) {
  const chartData = slices
    .filter((s) => s.value > 0)
    .map((s, index) => ({
      name: s.plotType,
      value: s.value,
      color: COLORS[index % COLORS.length],
    }));

  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <title>{title}</title>
      </head>
      <body style={{ fontFamily: 'sans-serif', margin: 24 }}>
        <h1>{title}</h1>
        <p>{`Generated ${computedAt}`}</p>

        {chartData.length === 0 ? (
          <p>No assets to display</p>
        ) : (
          <PieChart id="asset-distribution" width={560} height={420}>
            <Pie
              data={chartData}
              dataKey="value"
              nameKey="name"
              cx="50%"
              cy="50%"
              outerRadius={180}
              startAngle={140}
              endAngle={500}
              isAnimationActive={false}
            >
              {chartData.map((entry) => (
                <Cell key={entry.name} fill={entry.color} />
              ))}
            </Pie>
          </PieChart>
        )}

        <table>
          <thead>
            <tr>
              <th>Plot type</th>
              <th>Value ({currency})</th>
              <th>Share</th>
            </tr>
          </thead>
          <tbody>
            {slices.map((s) => (
              <tr key={s.plotType}>
                <td>{s.plotType}</td>
                <td>{formatAmount(s.value)}</td>
                <td>{formatShare(s.share)}</td>
              </tr>
            ))}
          </tbody>
        </table>

        <p>{`Total portfolio value: ${formatAmount(total)} ${currency}`}</p>
      </body>
    </html>
  );
}

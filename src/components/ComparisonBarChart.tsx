import { useMemo } from 'react';
import { Chart } from 'react-chartjs-2';
import {
  BarController,
  BarElement,
  CategoryScale,
  Chart as ChartJS,
  LinearScale,
  LineController,
  LineElement,
  PointElement,
  Tooltip,
} from 'chart.js';
import type { ChartData, ChartOptions, TooltipItem } from 'chart.js';
import { formatAxisValue, formatPct } from '../utils/formatters';
import { useChartColors } from './chartColors';

ChartJS.register(BarController, BarElement, CategoryScale, LinearScale, LineController, LineElement, PointElement, Tooltip);

export interface BarEntry {
  bank: string;
  /** Undefined bars are left empty and listed under the chart. */
  value: number | undefined;
}

type Props = {
  entries: BarEntry[];
  average: number | undefined;
  averageLabel: string;
  selectedBank: string;
  yLabel?: string;
};

const ComparisonBarChart = ({ entries, average, averageLabel, selectedBank, yLabel = 'Ratio' }: Props) => {
  const colors = useChartColors();
  const labels = useMemo(() => entries.map((e) => e.bank), [entries]);
  const missing = useMemo(() => entries.filter((e) => e.value === undefined).map((e) => e.bank), [entries]);

  const chartData = useMemo<ChartData<'bar' | 'line', (number | null)[], string>>(
    () => ({
      labels,
      datasets: [
        {
          type: 'bar' as const,
          label: yLabel,
          data: entries.map((e) => e.value ?? null),
          backgroundColor: entries.map((e) => (e.bank === selectedBank ? colors.highlight : colors.accentFill)),
          borderColor: entries.map((e) => (e.bank === selectedBank ? colors.highlight : colors.accent)),
          borderWidth: 1,
        },
        {
          type: 'line' as const,
          label: averageLabel,
          data: entries.map(() => average ?? null),
          borderColor: colors.dim,
          borderDash: [4, 4],
          borderWidth: 2,
          pointRadius: 0,
        },
      ],
    }),
    [average, averageLabel, colors, entries, labels, selectedBank, yLabel]
  );

  const options = useMemo<ChartOptions<'bar' | 'line'>>(
    () => ({
      responsive: true,
      maintainAspectRatio: false,
      animation: false,
      plugins: {
        legend: { display: false },
        tooltip: {
          callbacks: {
            label: (context: TooltipItem<'bar' | 'line'>) =>
              `${context.dataset.label ?? ''}: ${formatPct(context.parsed.y)}`,
          },
        },
      },
      scales: {
        x: {
          grid: { display: false },
          border: { color: colors.borderStrong },
          ticks: { color: colors.dim },
        },
        y: {
          title: { display: true, text: yLabel, color: colors.dim, font: { size: 10 } },
          grid: { color: colors.border },
          border: { color: colors.borderStrong },
          ticks: {
            color: colors.dim,
            maxTicksLimit: 6,
            callback: (value) => formatAxisValue(Number(value)),
          },
        },
      },
    }),
    [colors, yLabel]
  );

  if (!entries.length) {
    return (
      <div className="series-chart empty">
        <div className="muted">No banks in the peer set.</div>
      </div>
    );
  }

  return (
    <div className="series-chart">
      <div className="series-canvas">
        <Chart type="bar" data={chartData} options={options} />
      </div>
      {missing.length > 0 && <div className="muted">No value for: {missing.join(', ')}</div>}
    </div>
  );
};

export default ComparisonBarChart;

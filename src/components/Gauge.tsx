import { useMemo } from 'react';
import { Doughnut } from 'react-chartjs-2';
import { ArcElement, Chart as ChartJS, DoughnutController } from 'chart.js';
import type { Plugin } from 'chart.js';
import type { Benchmark, BenchmarkStatus } from '../domain/benchmarks';
import { formatPct } from '../utils/formatters';
import { useChartColors } from './chartColors';

ChartJS.register(ArcElement, DoughnutController);

export interface GaugeItem {
  id: string;
  title: string;
  value: number | undefined;
  benchmark: Benchmark;
  status: BenchmarkStatus;
}

// The dial runs to 20% above the larger of value and benchmark.
export const gaugeMax = (value: number | undefined, benchmark: number): number =>
  Math.max(value ?? 0, benchmark, 1e-9) * 1.2;

/** Share of the dial, from the left end, at which the benchmark sits. */
export const benchmarkFraction = (benchmark: number, max: number): number =>
  max > 0 ? Math.min(Math.max(benchmark / max, 0), 1) : 0;

// Canvas angle of a point on the dial, which runs clockwise from 9 o'clock to 3 o'clock.
export const dialAngle = (fraction: number): number => Math.PI * (1 + fraction);

const benchmarkMarker = (fraction: number, color: string): Plugin<'doughnut'> => ({
  id: 'benchmarkMarker',
  afterDatasetsDraw(chart) {
    const arc = chart.getDatasetMeta(0).data[0];
    if (!(arc instanceof ArcElement)) return;
    const { x, y, innerRadius, outerRadius } = arc.getProps(['x', 'y', 'innerRadius', 'outerRadius'], true);
    const angle = dialAngle(fraction);
    const { ctx } = chart;
    ctx.save();
    ctx.strokeStyle = color;
    ctx.lineWidth = 3;
    ctx.beginPath();
    ctx.moveTo(x + Math.cos(angle) * (innerRadius - 4), y + Math.sin(angle) * (innerRadius - 4));
    ctx.lineTo(x + Math.cos(angle) * (outerRadius + 4), y + Math.sin(angle) * (outerRadius + 4));
    ctx.stroke();
    ctx.restore();
  },
});

const Gauge = ({ title, value, benchmark, status }: GaugeItem) => {
  const colors = useChartColors();
  const max = gaugeMax(value, benchmark.value);
  const filled = Math.min(Math.max(value ?? 0, 0), max);
  const fraction = benchmarkFraction(benchmark.value, max);
  const plugins = useMemo(() => [benchmarkMarker(fraction, colors.marker)], [colors.marker, fraction]);

  const data = useMemo(
    () => ({
      labels: [title, ''],
      datasets: [
        {
          data: [filled, max - filled],
          backgroundColor: [status === 'breach' ? colors.warn : colors.good, colors.border],
          borderWidth: 0,
        },
      ],
    }),
    [colors, filled, max, status, title]
  );

  const options = useMemo(
    () => ({
      rotation: -90,
      circumference: 180,
      cutout: '70%',
      animation: false as const,
      plugins: { legend: { display: false }, tooltip: { enabled: false } },
    }),
    []
  );

  const comparator = benchmark.direction === 'min' ? 'min' : 'max';

  return (
    <div className={`gauge ${status}`}>
      <div className="metric-label">{title}</div>
      <div className="gauge-canvas">{value === undefined ? <div className="muted">Not reported</div> : <Doughnut data={data} options={options} plugins={plugins} />}</div>
      <div className="metric-value">{formatPct(value)}</div>
      <div className="metric-helper">
        Benchmark ({comparator}) {formatPct(benchmark.value)}
      </div>
    </div>
  );
};

export const GaugeGrid = ({ title, items }: { title: string; items: GaugeItem[] }) => (
  <div className="card stack">
    <h3>{title}</h3>
    <div className="grid-gauges">
      {items.map((item) => (
        <Gauge key={item.id} {...item} />
      ))}
    </div>
  </div>
);

export default Gauge;

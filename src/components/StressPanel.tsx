import { STRESS_METRIC_IDS, STRESS_METRICS } from '../config/stressMetrics';
import type { StressMetricId } from '../domain/enums';
import type { StressMetricSummary } from '../domain/stress';
import { averageValue } from '../engine/averages';
import { formatAverage } from '../utils/formatters';
import ComparisonBarChart, { type BarEntry } from './ComparisonBarChart';

interface Props {
  summary: StressMetricSummary;
  selectedBank: string;
  onSelectMetric: (metric: StressMetricId) => void;
}

const isStressMetricId = (value: string): value is StressMetricId => STRESS_METRIC_IDS.some((id) => id === value);

const StressPanel = ({ summary, selectedBank, onSelectMetric }: Props) => {
  const definition = STRESS_METRICS[summary.metric];
  const entries: BarEntry[] = Array.from(summary.values, ([bank, figure]) => ({
    bank,
    value: figure.status === 'ok' ? figure.value : undefined,
  }));

  return (
    <div className="card stack">
      <h3>CCAR Metrics vs Market Avg</h3>
      <div className="form-row" style={{ alignItems: 'flex-end' }}>
        <div className="field">
          <label htmlFor="ccar-metric">Select CCAR metric</label>
          <select
            id="ccar-metric"
            value={summary.metric}
            onChange={(e) => {
              if (isStressMetricId(e.target.value)) onSelectMetric(e.target.value);
            }}
          >
            {STRESS_METRIC_IDS.map((id) => (
              <option key={id} value={id}>
                {STRESS_METRICS[id].label}
              </option>
            ))}
          </select>
        </div>
        <div className="metric-card">
          <div className="metric-label">Market Average</div>
          <div className="metric-value">{formatAverage(summary.average)}</div>
        </div>
      </div>
      <ComparisonBarChart
        entries={entries}
        average={averageValue(summary.average)}
        averageLabel="Market Avg"
        selectedBank={selectedBank}
        yLabel={definition.label}
      />
    </div>
  );
};

export default StressPanel;

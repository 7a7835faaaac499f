import { RATIO_CATALOG, RATIO_IDS } from '../config/ratioCatalog';
import type { RatioId } from '../domain/enums';
import type { PeerComparison, RatioComputation } from '../domain/ratios';
import { averageValue } from '../engine/averages';
import { formatAverage, formatPct, formatSignedPoints } from '../utils/formatters';
import ComparisonBarChart, { type BarEntry } from './ComparisonBarChart';

interface Props {
  computation: RatioComputation;
  comparison: PeerComparison;
  selectedBank: string;
  onSelectRatio: (ratio: RatioId) => void;
}

const isRatioId = (value: string): value is RatioId => RATIO_IDS.some((id) => id === value);

const RatioPanel = ({ computation, comparison, selectedBank, onSelectRatio }: Props) => {
  const definition = RATIO_CATALOG[computation.ratio];
  const entries: BarEntry[] = Array.from(computation.values, ([bank, outcome]) => ({
    bank,
    value: outcome.status === 'ok' ? outcome.value : undefined,
  }));
  const bankValue = comparison.bankValue.status === 'ok' ? comparison.bankValue.value : undefined;
  const peerValue = averageValue(comparison.peerAverage);
  const gap = bankValue !== undefined && peerValue !== undefined ? bankValue - peerValue : undefined;

  return (
    <div className="card stack">
      <h3>Key Metrics – Ratio Analysis vs Market Avg</h3>
      <div className="form-row" style={{ alignItems: 'flex-end' }}>
        <div className="field">
          <label htmlFor="ratio">Select ratio</label>
          <select
            id="ratio"
            value={computation.ratio}
            onChange={(e) => {
              if (isRatioId(e.target.value)) onSelectRatio(e.target.value);
            }}
          >
            {RATIO_IDS.map((id) => (
              <option key={id} value={id}>
                {RATIO_CATALOG[id].label}
              </option>
            ))}
          </select>
        </div>
        <div className="metric-card">
          <div className="metric-label">Market Average</div>
          <div className="metric-value">{formatAverage(computation.average)}</div>
        </div>
        <div className="metric-card">
          <div className="metric-label">{selectedBank} vs peer average</div>
          <div className="metric-value">
            {formatPct(bankValue)} / {formatAverage(comparison.peerAverage)}
          </div>
          <div className="metric-helper">Gap {formatSignedPoints(gap)}</div>
        </div>
      </div>
      <p className="muted">{definition.description}</p>
      <ComparisonBarChart
        entries={entries}
        average={averageValue(computation.average)}
        averageLabel="Market Avg"
        selectedBank={selectedBank}
        yLabel={definition.shortLabel}
      />
    </div>
  );
};

export default RatioPanel;

import type { SummaryFieldConfig } from '../domain/config';
import type { FinancialRecord } from '../domain/dataset';
import type { RatioOutcome } from '../domain/ratios';
import { readFigure } from '../engine/cells';
import { formatNumber, formatPct } from '../utils/formatters';

interface Props {
  record: FinancialRecord;
  fields: SummaryFieldConfig[];
  capitalAdequacy: RatioOutcome;
}

const formatField = (record: FinancialRecord, field: SummaryFieldConfig): string => {
  const read = readFigure(record, field.column);
  if (read.status !== 'ok') return 'N/A';
  switch (field.format) {
    case 'percent-points':
      return `${formatNumber(read.value)}%`;
    case 'years':
      return `${formatNumber(read.value, 3)} yr`;
    case 'number':
      return formatNumber(read.value);
  }
};

const SummaryPanel = ({ record, fields, capitalAdequacy }: Props) => (
  <div className="card stack">
    <h3>Summary for {record.bank}</h3>
    <div className="grid-metrics">
      {fields.map((f) => (
        <Metric key={f.column} label={f.label} value={formatField(record, f)} />
      ))}
      <Metric
        label="Capital Adequacy Ratio"
        value={capitalAdequacy.status === 'ok' ? formatPct(capitalAdequacy.value) : 'N/A'}
        helper="Tier 1 plus Tier 2 capital over risk-weighted assets."
      />
    </div>
  </div>
);

const Metric = ({ label, value, helper }: { label: string; value: string; helper?: string }) => (
  <div className="metric-card">
    <div className="metric-label">{label}</div>
    <div className="metric-value">{value}</div>
    {helper && <div className="metric-helper">{helper}</div>}
  </div>
);

export default SummaryPanel;

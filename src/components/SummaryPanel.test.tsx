// @vitest-environment jsdom
import { describe, expect, it } from 'vitest';
import { render, screen } from '@testing-library/react';
import { baseConfig } from '../config/baseConfig';
import type { FinancialRecord } from '../domain/dataset';
import { FinancialField } from '../domain/enums';
import SummaryPanel from './SummaryPanel';

const record: FinancialRecord = {
  bank: 'Alder Bank',
  row: 2,
  cells: { 'Coupon Rate (%)': 5.25, 'Flat Price': 'n/a', 'Modified Duration': 4.1234 },
};

describe('SummaryPanel', () => {
  it('renders the bank heading', () => {
    render(
      <SummaryPanel record={record} fields={baseConfig.summaryFields} capitalAdequacy={{ status: 'ok', value: 0.125 }} />
    );
    expect(screen.getByText('Summary for Alder Bank')).toBeInTheDocument();
  });

  it('formats present fields and shows N/A for the rest', () => {
    render(
      <SummaryPanel record={record} fields={baseConfig.summaryFields} capitalAdequacy={{ status: 'ok', value: 0.125 }} />
    );
    expect(screen.getByText('Coupon Rate').nextElementSibling).toHaveTextContent('5.25%');
    expect(screen.getByText('Last Market Price (Flat)').nextElementSibling).toHaveTextContent('N/A');
    expect(screen.getByText('Yield to Maturity').nextElementSibling).toHaveTextContent('N/A');
    expect(screen.getByText('Modified Duration').nextElementSibling).toHaveTextContent('4.123 yr');
    expect(screen.getByText('Capital Adequacy Ratio').nextElementSibling).toHaveTextContent('12.50%');
  });

  it('does not invent a capital adequacy ratio', () => {
    render(
      <SummaryPanel
        record={record}
        fields={[]}
        capitalAdequacy={{ status: 'error', issue: 'zero-denominator', field: FinancialField.RiskWeightedAssets }}
      />
    );
    expect(screen.getByText('Capital Adequacy Ratio').nextElementSibling).toHaveTextContent('N/A');
  });
});

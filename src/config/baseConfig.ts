import { AnalyticsConfig } from '../domain/config';
import { FinancialField } from '../domain/enums';
import { defaultBenchmarks } from './benchmarks';

export const baseConfig: AnalyticsConfig = {
  dataFile: '/data/line-items.csv',
  defaultPeerCount: 3,
  benchmarks: defaultBenchmarks,
  keyFinancials: [
    FinancialField.Pat,
    FinancialField.Depreciation,
    FinancialField.TotalLiabilities,
    FinancialField.CashAndEquivalents,
    FinancialField.TotalAssets,
    FinancialField.CurrentAssets,
    FinancialField.CurrentLiabilities,
    FinancialField.AccountsReceivables,
    FinancialField.MarketableSecurities,
    FinancialField.CoreDeposits,
    FinancialField.TotalDeposits,
    FinancialField.Loans,
    FinancialField.NonPerformingAssets,
    FinancialField.Tier1Capital,
    FinancialField.Tier2Capital,
    FinancialField.RiskWeightedAssets,
  ],
  summaryFields: [
    { column: 'Coupon Rate (%)', label: 'Coupon Rate', format: 'percent-points' },
    { column: 'Flat Price', label: 'Last Market Price (Flat)', format: 'number' },
    { column: 'Yield to Maturity (YTC%)', label: 'Yield to Maturity', format: 'percent-points' },
    { column: 'Modified Duration', label: 'Modified Duration', format: 'years' },
  ],
};

import { FinancialField, RatioId } from '../domain/enums';
import { RatioDefinition } from '../domain/ratios';

export const RATIO_CATALOG: Record<RatioId, RatioDefinition> = {
  [RatioId.CoreDeposits]: {
    id: RatioId.CoreDeposits,
    label: 'Core deposits to total deposits',
    shortLabel: 'Core Deposits/Total Deposits',
    numerator: [FinancialField.CoreDeposits],
    denominator: FinancialField.TotalDeposits,
    description: 'Share of deposits from stable, relationship-based customers.',
  },
  [RatioId.Npa]: {
    id: RatioId.Npa,
    label: 'NPAs to total loans',
    shortLabel: 'NPAs/Total Loans',
    numerator: [FinancialField.NonPerformingAssets],
    denominator: FinancialField.Loans,
    description: 'Non-performing assets as a share of the loan book.',
  },
  // Cash over total assets. The current-liabilities variant is not offered.
  [RatioId.Liquidity]: {
    id: RatioId.Liquidity,
    label: 'Liquidity ratio',
    shortLabel: 'Liquidity Ratio',
    numerator: [FinancialField.CashAndEquivalents],
    denominator: FinancialField.TotalAssets,
    description: 'Cash and cash equivalents over total assets.',
  },
  [RatioId.CapitalAdequacy]: {
    id: RatioId.CapitalAdequacy,
    label: 'Capital adequacy ratio',
    shortLabel: 'CAR',
    numerator: [FinancialField.Tier1Capital, FinancialField.Tier2Capital],
    denominator: FinancialField.RiskWeightedAssets,
    description: 'Tier 1 plus Tier 2 capital over risk-weighted assets.',
  },
  [RatioId.Solvency]: {
    id: RatioId.Solvency,
    label: 'Solvency ratio',
    shortLabel: 'Solvency Ratio',
    numerator: [FinancialField.TotalLiabilities],
    denominator: FinancialField.TotalAssets,
    description: 'Liabilities excluding equity over total assets.',
  },
  [RatioId.LoanDeposit]: {
    id: RatioId.LoanDeposit,
    label: 'Loans to deposit ratio',
    shortLabel: 'Loans/Deposits',
    numerator: [FinancialField.Loans],
    denominator: FinancialField.TotalDeposits,
    description: 'Loans funded per unit of deposits.',
  },
};

export const RATIO_IDS = Object.values(RatioId);

/** Columns a workbook must carry for every ratio to be computable. */
export const RATIO_FIELDS: FinancialField[] = Array.from(
  new Set(Object.values(RATIO_CATALOG).flatMap((def) => [...def.numerator, def.denominator]))
);

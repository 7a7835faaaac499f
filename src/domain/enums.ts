export enum FinancialField {
  Pat = 'PAT',
  Depreciation = 'Depreciation',
  TotalLiabilities = 'Total Liabilities (excluding equity)',
  CashAndEquivalents = 'Cash & cash equivalents',
  TotalAssets = 'Total Assets',
  CurrentAssets = 'Current Assets',
  CurrentLiabilities = 'Current Liabilities',
  AccountsReceivables = 'Accounts Receivables',
  MarketableSecurities = 'Marketable Securities',
  CoreDeposits = 'Core Deposits',
  TotalDeposits = 'Total Deposits',
  Loans = 'Loans',
  NonPerformingAssets = 'Non performing assets',
  Tier1Capital = 'Tier-1 Capital',
  Tier2Capital = 'Tier-2 capital',
  RiskWeightedAssets = 'Risk weighted assets',
}

export enum RatioId {
  CoreDeposits = 'core-deposits-ratio',
  Npa = 'npa-ratio',
  Liquidity = 'liquidity-ratio',
  CapitalAdequacy = 'capital-adequacy-ratio',
  Solvency = 'solvency-ratio',
  LoanDeposit = 'loan-deposit-ratio',
}

export enum StressMetricId {
  Cet1 = 'cet1-ratio',
  Tier1 = 'tier1-ratio',
  TotalCapital = 'total-capital-ratio',
  Leverage = 'leverage-ratio',
  SupplementaryTier1 = 'supplementary-tier1-ratio',
}

export enum KeyColumn {
  Bank = 'Bank',
  Company = 'Company',
}

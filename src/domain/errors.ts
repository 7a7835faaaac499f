export class AnalyticsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AnalyticsError';
  }
}

export class DataLoadError extends AnalyticsError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(`Could not load ${source}: ${message}`, options);
    this.name = 'DataLoadError';
    this.source = source;
  }
}

export class BankNotFoundError extends AnalyticsError {
  readonly bank: string;

  constructor(bank: string) {
    super(`Bank "${bank}" is not in the loaded dataset`);
    this.name = 'BankNotFoundError';
    this.bank = bank;
  }
}

export class InvalidPeerCountError extends AnalyticsError {
  readonly peerCount: number;
  readonly bankCount: number;

  constructor(peerCount: number, bankCount: number) {
    super(`Peer count must be a whole number from 1 to ${bankCount - 1} (got ${peerCount})`);
    this.name = 'InvalidPeerCountError';
    this.peerCount = peerCount;
    this.bankCount = bankCount;
  }
}

export class InvalidSelectionError extends AnalyticsError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid selection: ${issues.join('; ')}`);
    this.name = 'InvalidSelectionError';
    this.issues = issues;
  }
}

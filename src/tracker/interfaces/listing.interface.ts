export interface ProductQuery {
  readonly keyword: string;
  readonly resultLimit: number; // integer >= 1
}

/**
 * One title/price pair scraped from a search results page.
 */
export interface Listing {
  readonly title: string;
  readonly price: number;
  readonly url?: string;
}

export interface HistoryRecord extends Listing {
  readonly keyword: string;
  readonly capturedAt: Date;
}

export interface KeywordResult {
  keyword: string;
  recorded: number;
  error?: string; // set when the keyword failed and was skipped
}

export interface RunSummary {
  capturedAt: Date;
  results: KeywordResult[];
  totalRecorded: number;
}

export interface TrackOptions {
  inputFile: string;
  outputFile: string;
  resultLimit?: number;
  maxProducts?: number;
  delay: DelayPolicy;
}

export type DelayPolicy =
  | { kind: 'fixed'; ms: number }
  | { kind: 'random'; minMs: number; maxMs: number };

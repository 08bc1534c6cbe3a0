/**
 * The search page could not be retrieved: transport error, timeout or a
 * non-2xx status. Skips the keyword, never the run.
 */
export class FetchError extends Error {
  constructor(
    message: string,
    readonly url: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

export class PriceParseError extends Error {
  constructor(readonly text: string) {
    super(`Cannot parse price from '${text}'`);
    this.name = 'PriceParseError';
  }
}

export class InputFileError extends Error {
  constructor(
    message: string,
    readonly path: string,
  ) {
    super(message);
    this.name = 'InputFileError';
  }
}

export class NoDataError extends Error {
  constructor(readonly keyword: string) {
    super(`No recorded listings match '${keyword}'`);
    this.name = 'NoDataError';
  }
}

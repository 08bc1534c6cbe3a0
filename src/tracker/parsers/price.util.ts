import { PriceParseError } from '../errors/tracker.errors';

// first whole number in the text, with an optional minus before the currency
// symbol; thousands groups must have exactly three digits
const PRICE_PATTERN =
  /(-)?\s*[$€£]?\s*(?<![\d,.])(\d{1,3}(?:,\d{3})+(?:\.\d+)?|\d+(?:\.\d+)?)(?![\d,.])/;

/**
 * Parse a displayed price into a number.
 * Assumes US formatting: comma groups thousands, dot separates decimals.
 * A range such as "$10.00 to $20.00" yields its lower bound. A leading
 * minus is kept, so "-$5.00" yields -5.
 *
 * @throws PriceParseError when the text holds no well-formed number
 */
export function normalizePrice(priceText: string): number {
  const match = PRICE_PATTERN.exec(priceText);
  if (!match) {
    throw new PriceParseError(priceText);
  }

  const [, minus, digits] = match;
  const price = Number.parseFloat(digits.replace(/,/g, ''));
  if (!Number.isFinite(price)) {
    throw new PriceParseError(priceText);
  }
  return minus ? -price : price;
}

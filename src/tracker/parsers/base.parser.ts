import { Logger } from '@nestjs/common';
import { Listing } from '../interfaces/listing.interface';
import { PriceParseError } from '../errors/tracker.errors';
import { normalizePrice } from './price.util';

/**
 * A listing node as found on the page, before its price is normalized.
 */
export interface ListingCandidate {
  title: string;
  priceText: string;
  url?: string;
}

/**
 * Turns a search results page into listings. Subclasses own every selector
 * for their marketplace's layout, so a layout change stays inside one class.
 */
export abstract class BaseParser {
  protected readonly logger = new Logger(this.constructor.name);

  abstract readonly marketplace: string;

  /**
   * Listing nodes in page order.
   */
  protected abstract extractCandidates(html: string): ListingCandidate[];

  /**
   * At most `limit` listings, in page order. Candidates with an empty title
   * or an unparseable or negative price are skipped.
   */
  parse(html: string, limit: number): Listing[] {
    if (limit <= 0) return [];

    const listings: Listing[] = [];
    for (const candidate of this.extractCandidates(html)) {
      if (listings.length >= limit) break;

      const title = candidate.title.trim();
      if (!title) {
        this.logger.debug('Skipping listing without a title');
        continue;
      }

      try {
        const price = normalizePrice(candidate.priceText);
        if (price < 0) {
          this.logger.debug(`Skipping '${title}': negative price ${price}`);
          continue;
        }
        listings.push(candidate.url ? { title, price, url: candidate.url } : { title, price });
      } catch (error) {
        if (!(error instanceof PriceParseError)) throw error;
        this.logger.debug(`Skipping '${title}': ${error.message}`);
      }
    }
    return listings;
  }

  /**
   * Collapse whitespace left over from nested inline markup.
   */
  protected cleanText(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
  }
}

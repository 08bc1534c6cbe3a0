import { Injectable } from '@nestjs/common';
import * as cheerio from 'cheerio';
import { BaseParser, ListingCandidate } from './base.parser';

const SCREEN_READER_SUFFIX = /\s*Opens in a new window or tab\s*$/i;

@Injectable()
export class EbaySearchParser extends BaseParser {
  readonly marketplace = 'eBay';

  protected extractCandidates(html: string): ListingCandidate[] {
    const $ = cheerio.load(html);
    const candidates: ListingCandidate[] = [];

    $('li.s-card').each((_, element) => {
      const $card = $(element);

      // auctions show a bid count instead of a buy-it-now price
      const attributes = $card.find('.su-card-container__attributes').text().toLowerCase();
      if (attributes.includes('bid')) return;

      const priceText = $card
        .find('span.s-card__price')
        .toArray()
        .map((span) => this.cleanText($(span).text()))
        .find((text) => text.includes('$') && !text.toLowerCase().includes('bid'));
      if (!priceText) return;

      const title = this.cleanText($card.find('div.s-card__title').first().text()).replace(
        SCREEN_READER_SUFFIX,
        '',
      );
      const url = $card.find('a.image-treatment').first().attr('href');

      candidates.push(url ? { title, priceText, url } : { title, priceText });
    });

    this.logger.debug(`${candidates.length} priced cards on the page`);
    return candidates;
  }
}

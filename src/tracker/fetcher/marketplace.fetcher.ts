import { Inject, Injectable, Logger } from '@nestjs/common';
import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { getErrorMessage } from '../../common/errors';
import { TRACKER_CONFIG, TrackerConfig } from '../../config/tracker.config';
import { FetchError } from '../errors/tracker.errors';

@Injectable()
export class MarketplaceFetcher {
  private readonly logger = new Logger(MarketplaceFetcher.name);
  private readonly http: AxiosInstance;

  constructor(@Inject(TRACKER_CONFIG) private readonly config: TrackerConfig) {
    this.http = axios.create({
      timeout: config.http.timeoutMs,
      headers: config.http.headers,
      responseType: 'text',
      // any status resolves; fetchSearchPage rejects non-2xx itself
      validateStatus: () => true,
    });
  }

  buildSearchUrl(keyword: string): string {
    const { searchUrl, queryParam, extraParams } = this.config.marketplace;
    const url = new URL(searchUrl);
    url.searchParams.set(queryParam, keyword);
    for (const [name, value] of Object.entries(extraParams)) {
      url.searchParams.set(name, value);
    }
    return url.toString();
  }

  /**
   * Single GET of the search results page for a keyword. No retries.
   */
  async fetchSearchPage(keyword: string): Promise<string> {
    const url = this.buildSearchUrl(keyword);
    this.logger.debug(`GET ${url}`);

    const start = Date.now();
    let response: AxiosResponse<string>;
    try {
      response = await this.http.get<string>(url);
    } catch (error) {
      throw new FetchError(`Request to ${url} failed: ${getErrorMessage(error)}`, url);
    }

    this.logger.debug(`${response.status} from ${url} in ${Date.now() - start}ms`);
    if (response.status < 200 || response.status >= 300) {
      throw new FetchError(`Request to ${url} returned HTTP ${response.status}`, url, response.status);
    }
    return response.data;
  }
}

import axios from 'axios';
import { type Feature, featurePageSchema, type FeatureLink } from '../types/Observation';
import { FatalTransportError } from '../utils/errors';
import { createLogger, type Logger } from '../utils/logger';

/**
 * Client for OGC API - Features item collections
 * (e.g. https://api.weather.gc.ca/collections/swob-realtime/items)
 *
 * Follows `next` links until the collection is exhausted. The result is either the
 * complete window or nothing: an HTTP error on any page discards the pages already read.
 */

export interface FetchOptions {
  limit: number;
  timeoutMs: number;
}

export type QueryParams = Record<string, string>;

function findNextLink(links: FeatureLink[] | null | undefined): string | null {
  for (const link of links ?? []) {
    if (link.rel === 'next' && link.href) {
      return link.href;
    }
  }
  return null;
}

export class FeatureApiClient {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger({ component: 'FeatureApiClient' });
  }

  /**
   * Fetch every page of a filtered query.
   * @returns all features in page order, or [] if any page failed with an HTTP error
   * @throws FatalTransportError when a request fails without an HTTP response
   */
  async fetchAllFeatures(url: string, params: QueryParams, options: FetchOptions): Promise<Feature[]> {
    const items: Feature[] = [];
    const firstParams: QueryParams = { ...params, limit: String(options.limit) };
    let nextUrl: string | null = url;
    let pageCount = 0;

    while (nextUrl) {
      const isFirstPage = pageCount === 0;
      this.logger.debug({ url: nextUrl, params: isFirstPage ? firstParams : undefined }, 'GET page');

      let body: unknown;
      try {
        // Continuation links already carry the full query
        const response = await axios.get<unknown>(nextUrl, {
          params: isFirstPage ? firstParams : undefined,
          timeout: options.timeoutMs,
        });
        body = response.data;
      } catch (error) {
        if (axios.isAxiosError(error) && error.response) {
          this.logger.error({
            url: nextUrl,
            status: error.response.status,
            error: error.message,
            pagesDiscarded: pageCount,
          }, 'HTTP error while paging, discarding this fetch');
          return [];
        }
        this.logger.error({ url: nextUrl, error }, 'Transport error while fetching');
        throw new FatalTransportError(nextUrl, error);
      }

      const page = featurePageSchema.safeParse(body);
      if (!page.success) {
        this.logger.error({
          url: nextUrl,
          issues: page.error.issues.slice(0, 3).map((issue) => issue.message),
          pagesDiscarded: pageCount,
        }, 'Malformed feature collection page, discarding this fetch');
        return [];
      }

      for (const feature of page.data.features ?? []) {
        items.push(feature);
      }
      pageCount += 1;
      nextUrl = findNextLink(page.data.links);
    }

    this.logger.info({ count: items.length, pages: pageCount }, 'Fetched features from API');
    return items;
  }
}

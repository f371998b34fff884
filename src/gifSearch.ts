import axios, { type AxiosInstance } from 'axios';
import type { Logger } from './logger';

const GIPHY_SEARCH_URL = 'https://api.giphy.com/v1/gifs/search';

export interface GifSearch {
  search(query: string): Promise<string | null>;
}

type GiphySearchResponse = {
  data: Array<{ id: string; images?: { original?: { url?: string } } }>;
};

export type GiphySearchOptions = {
  apiKey: string;
  logger: Logger;
  http?: AxiosInstance;
  timeoutMs?: number;
  random?: () => number;
};

/** Relays a random hit from GIPHY search. Failures come back as null. */
export class GiphySearch implements GifSearch {
  private readonly http: AxiosInstance;
  private readonly random: () => number;

  constructor(private readonly options: GiphySearchOptions) {
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs ?? 10_000 });
    this.random = options.random ?? Math.random;
  }

  async search(query: string): Promise<string | null> {
    try {
      const response = await this.http.get<GiphySearchResponse>(GIPHY_SEARCH_URL, {
        params: { api_key: this.options.apiKey, q: query, limit: 25, rating: 'pg-13' },
      });
      const urls = (response.data?.data ?? [])
        .map((gif) => gif.images?.original?.url)
        .filter((url): url is string => typeof url === 'string' && url.length > 0);
      if (urls.length === 0) return null;
      return urls[Math.floor(this.random() * urls.length)] ?? null;
    } catch (err) {
      // axios errors carry the request config, api key included
      this.options.logger.warn({ err: axios.isAxiosError(err) ? err.message : err, query }, 'Giphy search failed');
      return null;
    }
  }
}

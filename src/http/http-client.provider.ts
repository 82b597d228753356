import { Provider } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import { SCRAPER_CONFIG, ScraperConfig } from '../config/scraper.config';
import { ResponseBodyError } from '../errors/scraper.errors';

export const HTTP_CLIENT = 'HTTP_CLIENT';

/**
 * Every request carries the configured User-Agent and nothing else of ours.
 * Bodies are kept as text so sitemap XML is never run through JSON parsing.
 */
export function createHttpClient(config: ScraperConfig): AxiosInstance {
  return axios.create({
    timeout: config.requestTimeoutMs,
    responseType: 'text',
    headers: {
      'User-Agent': config.userAgent,
    },
  });
}

export async function fetchText(
  httpClient: AxiosInstance,
  url: string,
): Promise<string> {
  const { data } = await httpClient.get<unknown>(url);
  if (typeof data !== 'string') {
    throw new ResponseBodyError(`Expected a text body from ${url}`);
  }
  return data;
}

export const httpClientProvider: Provider = {
  provide: HTTP_CLIENT,
  useFactory: (config: ScraperConfig) => createHttpClient(config),
  inject: [SCRAPER_CONFIG],
};

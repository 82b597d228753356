import { Inject, Injectable, Logger } from '@nestjs/common';
import { AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import { fetchText, HTTP_CLIENT } from '../http/http-client.provider';

@Injectable()
export class ProfileService {
  private readonly logger = new Logger(ProfileService.name);

  constructor(@Inject(HTTP_CLIENT) private readonly httpClient: AxiosInstance) {}

  async fetchProfile(url: string): Promise<cheerio.CheerioAPI> {
    this.logger.debug(`Fetching profile page: ${url}`);
    const html = await fetchText(this.httpClient, url);
    return cheerio.load(html);
  }
}

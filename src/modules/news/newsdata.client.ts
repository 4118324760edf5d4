import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { EnvConfig } from '../../config/env.validation';
import { errorMessage } from '../../utils/errors';

const NEWSDATA_URL = 'https://newsdata.io/api/1/news';

export interface NewsDataArticle {
  title?: string | null;
  link?: string | null;
  content?: string | null;
  description?: string | null;
  pubDate?: string | null;
  keywords?: string[] | null;
  language?: string | null;
}

interface NewsDataResponse {
  status?: string;
  totalResults?: number;
  message?: string;
  results?: NewsDataArticle[] | { message?: string };
}

export interface FetchNewsOptions {
  category?: string;
  language?: string;
  limit: number;
}

/**
 * NewsData.io latest-news endpoint.
 */
@Injectable()
export class NewsDataClient {
  private readonly logger = new Logger(NewsDataClient.name);

  constructor(private readonly configService: ConfigService<EnvConfig, true>) {}

  async fetchNews({ category, language, limit }: FetchNewsOptions): Promise<NewsDataArticle[]> {
    const apiKey = this.configService.get('NEWSDATA_API_KEY', { infer: true });
    if (!apiKey) {
      this.logger.warn('NEWSDATA_API_KEY not set');
      return [];
    }

    const params: Record<string, string> = { apikey: apiKey };
    if (category) params.category = category;
    if (language) params.language = language;

    try {
      let response = await this.request(params);

      // Free plans reject some category/language combinations.
      if (response.status === 422) {
        this.logger.warn('NewsData API returned 422 - trying without category/language parameters');
        response = await this.request({ apikey: apiKey });
      }

      const data = response.data;
      if (response.status >= 400) {
        this.logger.error(
          `NewsData HTTP error: status_code=${response.status}, error=${data?.message ?? 'Unknown error'}`,
        );
        return [];
      }

      if (data?.status !== 'success') {
        this.logger.warn(
          `NewsData API returned status: ${data?.status}, message: ${data?.message ?? 'Unknown error'}`,
        );
        return [];
      }

      const results = Array.isArray(data.results) ? data.results : [];
      if (!results.length) {
        this.logger.warn('NewsData API returned empty results');
        return [];
      }

      let filtered = results;
      if (language) {
        filtered = results.filter((item) => item.language === language);
        if (!filtered.length) {
          this.logger.log(`No news in language ${language}, returning all results`);
          filtered = results;
        }
      }

      this.logger.log(
        `NewsData API returned ${filtered.length} news articles (filtered from ${results.length} total)`,
      );
      return filtered.slice(0, limit);
    } catch (error) {
      this.logger.error(`Failed to fetch news from NewsData: ${errorMessage(error)}`);
      return [];
    }
  }

  private request(params: Record<string, string>) {
    return axios.get<NewsDataResponse>(NEWSDATA_URL, {
      params,
      timeout: this.configService.get('PROVIDER_TIMEOUT_MS', { infer: true }),
      // 4xx bodies carry the provider's error message.
      validateStatus: (status) => status < 500,
    });
  }
}

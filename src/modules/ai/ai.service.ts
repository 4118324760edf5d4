import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import { z } from 'zod';
import { EnvConfig } from '../../config/env.validation';
import { errorMessage } from '../../utils/errors';

export interface CommentaryPrediction {
  horizon: string;
  predictedPrice: number;
  confidence: number;
}

type ChatMessage = { role: 'system' | 'user'; content: string };

const FALLBACK_MODELS = ['gemini-2.0-flash', 'gemini-1.5-flash'];

const sentimentReplySchema = z.object({
  score: z.coerce.number(),
});

/**
 * Chat-completions client for an OpenAI-compatible endpoint (Gemini by
 * default). Every call returns null when the client is not configured or
 * all models fail.
 */
@Injectable()
export class AiService {
  private readonly logger = new Logger(AiService.name);
  private readonly client: OpenAI | null;

  constructor(private readonly configService: ConfigService<EnvConfig, true>) {
    const apiKey = this.configService.get('AI_API_KEY', { infer: true });

    if (apiKey) {
      this.client = new OpenAI({
        apiKey,
        baseURL: this.configService.get('AI_BASE_URL', { infer: true }),
        timeout: this.configService.get('PROVIDER_TIMEOUT_MS', { infer: true }),
      });
    } else {
      this.client = null;
      this.logger.warn('AI API key not configured');
    }
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  /**
   * Market mood of the headlines for one asset, 0 (bearish) to 1 (bullish).
   */
  async scoreSentiment(ticker: string, headlines: string[]): Promise<number | null> {
    if (!headlines.length) return null;

    const content = await this.complete(
      [
        {
          role: 'system',
          content:
            'You rate financial news sentiment. Reply with JSON {"score": number} where 0 is very bearish, 0.5 is neutral and 1 is very bullish.',
        },
        {
          role: 'user',
          content: `Asset: ${ticker}\nHeadlines:\n${headlines.map((h) => `- ${h}`).join('\n')}`,
        },
      ],
      { json: true, maxTokens: 50 },
    );
    if (!content) return null;

    try {
      const parsed = sentimentReplySchema.safeParse(JSON.parse(content));
      if (!parsed.success || !Number.isFinite(parsed.data.score)) {
        this.logger.warn(`Unusable sentiment reply for ${ticker}: ${content.slice(0, 100)}`);
        return null;
      }
      const score = Math.min(1, Math.max(0, parsed.data.score));
      return Math.round(score * 1000) / 1000;
    } catch (error) {
      this.logger.warn(`Sentiment reply for ${ticker} is not JSON: ${errorMessage(error)}`);
      return null;
    }
  }

  /**
   * Two or three sentences summarising the generated predictions.
   */
  async predictionCommentary(
    ticker: string,
    currentPrice: number,
    predictions: CommentaryPrediction[],
  ): Promise<string | null> {
    if (!predictions.length) return null;

    const lines = predictions.map(
      (p) =>
        `${p.horizon}: ${p.predictedPrice} (confidence ${Math.round(p.confidence * 100)}%)`,
    );
    const content = await this.complete(
      [
        {
          role: 'system',
          content:
            'You write short, neutral market commentary for retail investors. No financial advice. At most three sentences.',
        },
        {
          role: 'user',
          content: `Asset ${ticker} trades at ${currentPrice}. Model forecasts:\n${lines.join('\n')}`,
        },
      ],
      { maxTokens: 200 },
    );

    return content ? content.trim() : null;
  }

  private async complete(
    messages: ChatMessage[],
    options: { json?: boolean; maxTokens: number },
  ): Promise<string | null> {
    if (!this.client) return null;

    const configuredModel = this.configService.get('AI_MODEL', { infer: true });
    const modelCandidates = Array.from(new Set([configuredModel, ...FALLBACK_MODELS]));

    for (const model of modelCandidates) {
      try {
        const response = await this.client.chat.completions.create({
          model,
          messages,
          temperature: 0.3,
          max_tokens: options.maxTokens,
          ...(options.json ? { response_format: { type: 'json_object' as const } } : {}),
        });
        if (model !== configuredModel) {
          this.logger.warn(`AI fallback used: ${model} (primary: ${configuredModel})`);
        }
        return response.choices[0]?.message?.content ?? null;
      } catch (error) {
        this.logger.warn(`AI model failed: ${model} - ${errorMessage(error)}`);
      }
    }

    this.logger.error('All AI models failed');
    return null;
  }
}

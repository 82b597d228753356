import { Inject, Injectable, Logger, Provider } from '@nestjs/common';
import Anthropic from '@anthropic-ai/sdk';
import { SCRAPER_CONFIG, ScraperConfig } from '../config/scraper.config';
import { TranslationError } from '../errors/scraper.errors';
import { Translator } from './translator';

export const ANTHROPIC_CLIENT = 'ANTHROPIC_CLIENT';

export interface TranslationReply {
  content: Array<{ type: string; text?: string }>;
}

/** The slice of the Anthropic SDK the translator talks to. */
export interface MessagesClient {
  messages: {
    create(
      params: Anthropic.MessageCreateParamsNonStreaming,
    ): Promise<TranslationReply>;
  };
}

export const anthropicClientProvider: Provider = {
  provide: ANTHROPIC_CLIENT,
  useFactory: (config: ScraperConfig): MessagesClient | null => {
    const logger = new Logger('AnthropicClient');
    if (!config.anthropicApiKey) {
      logger.warn('ANTHROPIC_API_KEY not set. Translation requests will fail.');
      return null;
    }
    return new Anthropic({ apiKey: config.anthropicApiKey });
  },
  inject: [SCRAPER_CONFIG],
};

const languageNames = new Intl.DisplayNames(['en'], { type: 'language' });

export function languageName(code: string): string {
  try {
    return languageNames.of(code) ?? code;
  } catch (error) {
    // Intl rejects malformed tags with a RangeError; anything else is a bug
    if (error instanceof RangeError) return code;
    throw error;
  }
}

@Injectable()
export class AnthropicTranslatorService implements Translator {
  private readonly logger = new Logger(AnthropicTranslatorService.name);

  constructor(
    @Inject(ANTHROPIC_CLIENT) private readonly client: MessagesClient | null,
    @Inject(SCRAPER_CONFIG) private readonly config: ScraperConfig,
  ) {}

  async translate(
    text: string,
    sourceLanguage: string,
    targetLanguage: string,
  ): Promise<string> {
    if (text.trim() === '') return '';

    if (!this.client) {
      throw new TranslationError(
        'ANTHROPIC_API_KEY is not set; cannot translate profile text',
      );
    }

    const from = languageName(sourceLanguage);
    const to = languageName(targetLanguage);
    this.logger.debug(`Translating ${text.length} characters ${from} -> ${to}`);

    const response = await this.client.messages.create({
      model: this.config.translationModel,
      max_tokens: this.config.translationMaxTokens,
      system: `You are a translator. Translate the user's text from ${from} to ${to}. Respond with ONLY the translation: no preamble, notes or quotation marks.`,
      messages: [{ role: 'user', content: text }],
    });

    const translated = response.content
      .flatMap((block) =>
        block.type === 'text' && block.text !== undefined ? [block.text] : [],
      )
      .join('')
      .trim();

    if (translated === '') {
      throw new TranslationError(
        `Translation from ${from} to ${to} returned no text`,
      );
    }
    return translated;
  }
}

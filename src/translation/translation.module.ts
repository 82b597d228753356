import { Module } from '@nestjs/common';
import {
  anthropicClientProvider,
  AnthropicTranslatorService,
} from './anthropic-translator.service';
import { TRANSLATOR } from './translator';

@Module({
  providers: [
    anthropicClientProvider,
    AnthropicTranslatorService,
    { provide: TRANSLATOR, useExisting: AnthropicTranslatorService },
  ],
  exports: [TRANSLATOR],
})
export class TranslationModule {}

export const TRANSLATOR = 'TRANSLATOR';

export interface Translator {
  /**
   * @param sourceLanguage - ISO 639-1 code of the input text, e.g. `nl`
   * @param targetLanguage - ISO 639-1 code to translate into, e.g. `en`
   */
  translate(
    text: string,
    sourceLanguage: string,
    targetLanguage: string,
  ): Promise<string>;
}

import { DEFAULT_LANGUAGE_TABLE, LanguageTable } from '../languages/LanguageTable.js';

/**
 * Fixed instruction and seeding texts for the two task types
 */
export const TRANSLATION_INSTRUCTION =
  'You are a professional translator specializing in software localization. ' +
  'Your task is to translate user interface strings while preserving their meaning, tone, and technical accuracy. ' +
  'Always respond with only the translated text, no explanations or additional content.';

export const TRANSLATION_ACK_REQUEST =
  'I will be providing strings from a software application for translation. ' +
  'Please translate each one accurately while preserving technical terms and UI conventions.';

export const TRANSLATION_ACK_FALLBACK = "Understood. I'm ready to translate your software strings.";

export const DETECTION_INSTRUCTION =
  'You are a language detection expert. When given text, respond only with the ISO 639-1 language code ' +
  '(2 letters lowercase). Never provide explanations or additional text.';

export const AUTO_DETECT = 'auto';

/**
 * Build the user turn for one translation request:
 * `Translate from English to Spanish: "Save"` or `Translate to French: "Save"`.
 * A source that is absent, empty or "auto" leaves out the "from" clause.
 */
export function buildTranslationPrompt(
  text: string,
  targetLanguage: string,
  sourceLanguage?: string,
  languages: LanguageTable = DEFAULT_LANGUAGE_TABLE
): string {
  const targetName = languages.getName(targetLanguage);

  if (!sourceLanguage || sourceLanguage === AUTO_DETECT) {
    return `Translate to ${targetName}: "${text}"`;
  }

  return `Translate from ${languages.getName(sourceLanguage)} to ${targetName}: "${text}"`;
}

export function buildDetectionPrompt(text: string): string {
  return `Detect the language: "${text}"`;
}

// Cyrillic block, U+0400..U+04FF.
const SOURCE_SCRIPT = /[\u0400-\u04FF]/;

export const SOURCE_LANGUAGE = 'ru';
export const TARGET_LANGUAGE = 'en';

export function needsTranslation(text: string): boolean {
  return SOURCE_SCRIPT.test(text);
}

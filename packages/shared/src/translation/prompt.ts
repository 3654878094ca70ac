export const DEFAULT_TRANSLATION_PROMPT =
  'Translate the following text from {source_language} to {target_language}. ' +
  'Provide ONLY the translated text, without any explanations, notes, or additional content.\n\n' +
  '{text}';

/** Separador usado para juntar vários textos numa única requisição. */
export const BATCH_DELIMITER = '\n---\n';

export const BATCH_HINT =
  'The text contains several independent entries separated by lines containing only "---". ' +
  'Translate each entry separately and keep every "---" separator line in place.';

const LANGUAGE_NAMES: Record<string, string> = {
  en: 'English',
  zh: 'Chinese',
  'zh-Hans': 'Simplified Chinese',
  'zh-Hant': 'Traditional Chinese',
  ja: 'Japanese',
  ko: 'Korean',
  pt: 'Portuguese',
  es: 'Spanish',
  fr: 'French',
  de: 'German',
  it: 'Italian',
  ru: 'Russian',
  ar: 'Arabic',
};

export function languageName(code: string | null): string {
  if (!code || code === 'auto') {
    return 'auto-detect';
  }
  return LANGUAGE_NAMES[code] ?? code;
}

/**
 * Substitui {source_language}, {target_language} e {text} no template.
 */
export function renderPrompt(
  template: string,
  vars: { sourceLanguage: string | null; targetLanguage: string; text: string }
): string {
  return template
    .split('{source_language}')
    .join(languageName(vars.sourceLanguage))
    .split('{target_language}')
    .join(languageName(vars.targetLanguage))
    .split('{text}')
    .join(vars.text);
}

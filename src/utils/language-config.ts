import tesseractLanguages from '@/data/tesseract-languages.json';

/**
 * Tesseract language packs, keyed by traineddata identifier (ISO 639-2/T codes).
 */
export const TESSERACT_LANGUAGES: Readonly<Record<string, string>> = tesseractLanguages;

// Short codes and names used by other OCR toolkits' configs (`lang: 'en'`, `lang: 'ch'`).
const LANGUAGE_ALIASES: Record<string, string> = {
  en: 'eng',
  ch: 'chi_sim',
  chinese: 'chi_sim',
  'chinese-simplified': 'chi_sim',
  'chinese-traditional': 'chi_tra',
  chinese_cht: 'chi_tra',
  fr: 'fra',
  french: 'fra',
  de: 'deu',
  german: 'deu',
  es: 'spa',
  spanish: 'spa',
  ja: 'jpn',
  japan: 'jpn',
  japanese: 'jpn',
  ko: 'kor',
  korean: 'kor',
  ru: 'rus',
  russian: 'rus',
  vi: 'vie',
  vietnamese: 'vie',
};

/**
 * Normalizes a language name, alias or code to a Tesseract code, defaulting to `eng`.
 * Multi-language strings such as `eng+deu` are normalized part by part.
 */
export function normalizeTesseractLanguage(input: string): string {
  if (input.includes('+')) {
    return input
      .split('+')
      .map((part) => normalizeTesseractLanguage(part))
      .join('+');
  }

  const normalized = input.toLowerCase().trim();

  if (TESSERACT_LANGUAGES[normalized]) {
    return normalized;
  }

  if (LANGUAGE_ALIASES[normalized]) {
    return LANGUAGE_ALIASES[normalized];
  }

  for (const [code, name] of Object.entries(TESSERACT_LANGUAGES)) {
    if (name.toLowerCase() === normalized) {
      return code;
    }
  }

  // Looks like a Tesseract code (3 letters, optional suffix): pass through.
  if (/^[a-z]{3}(_[a-z]+)*$/.test(normalized)) {
    return normalized;
  }

  return 'eng';
}

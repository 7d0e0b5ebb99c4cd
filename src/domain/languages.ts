import type { Language, LanguageCode } from "./types.js";

export const DEFAULT_LANGUAGE_CODE: LanguageCode = "en";

export const LANGUAGES: readonly Language[] = [
  { code: "en", name: "English" },
  { code: "es", name: "Spanish" },
  { code: "fr", name: "French" },
  { code: "de", name: "German" },
  { code: "it", name: "Italian" },
  { code: "pt", name: "Portuguese" },
  { code: "ru", name: "Russian" },
  { code: "zh", name: "Chinese" },
  { code: "ja", name: "Japanese" },
  { code: "hi", name: "Hindi" },
  { code: "ta", name: "Tamil" },
];

export type SynthesisEngine = "google-web" | "google-cloud" | "polly" | "stub";

export type VoiceTable = Partial<Record<LanguageCode, string>>;

// Polly has no Tamil voice; synthesis falls back to the English one.
export const SYNTHESIS_VOICES: Record<SynthesisEngine, VoiceTable> = {
  "google-web": {
    en: "en",
    es: "es",
    fr: "fr",
    de: "de",
    it: "it",
    pt: "pt",
    ru: "ru",
    zh: "zh-CN",
    ja: "ja",
    hi: "hi",
    ta: "ta",
  },
  "google-cloud": {
    en: "en-US-Standard-C",
    es: "es-US-Standard-A",
    fr: "fr-FR-Standard-A",
    de: "de-DE-Standard-A",
    it: "it-IT-Standard-A",
    pt: "pt-BR-Standard-A",
    ru: "ru-RU-Standard-A",
    zh: "cmn-CN-Standard-A",
    ja: "ja-JP-Standard-A",
    hi: "hi-IN-Standard-A",
    ta: "ta-IN-Standard-A",
  },
  polly: {
    en: "Joanna",
    es: "Lupe",
    fr: "Lea",
    de: "Vicki",
    it: "Bianca",
    pt: "Camila",
    ru: "Tatyana",
    zh: "Zhiyu",
    ja: "Mizuki",
    hi: "Aditi",
  },
  stub: {
    en: "stub-en",
    es: "stub-es",
  },
};

const byCode = new Map<string, Language>(LANGUAGES.map((language) => [language.code, language]));

export function lookupLanguage(code: string): Language | undefined {
  return byCode.get(code);
}

export function isLanguageCode(code: string): code is LanguageCode {
  return byCode.has(code);
}

export function defaultLanguage(): Language {
  return { code: DEFAULT_LANGUAGE_CODE, name: "English" };
}

/** Voice for `code` in `table`, or undefined when the engine has none for it. */
export function voiceFor(table: VoiceTable, code: string): string | undefined {
  return isLanguageCode(code) ? table[code] : undefined;
}

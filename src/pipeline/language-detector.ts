import { detect } from "tinyld";
import { lookupLanguage } from "../domain/languages.js";
import type { DetectedLanguage } from "../domain/types.js";

export const UNKNOWN_LANGUAGE: DetectedLanguage = { code: null, name: "Unknown" };

export type DetectFn = (text: string) => string;

export class LanguageDetector {
  public constructor(private readonly detectFn: DetectFn = (text) => detect(text)) {}

  public detect(text: string): DetectedLanguage {
    if (!text.trim()) return UNKNOWN_LANGUAGE;

    let code: string;
    try {
      code = this.detectFn(text).trim().toLowerCase();
    } catch {
      return UNKNOWN_LANGUAGE;
    }
    if (!code) return UNKNOWN_LANGUAGE;

    return { code, name: lookupLanguage(code)?.name ?? code };
  }
}

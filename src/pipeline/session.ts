import { defaultLanguage } from "../domain/languages.js";
import type { SessionSnapshot, TranslatorSession } from "../domain/types.js";

export function createSession(): TranslatorSession {
  return {
    targetLanguage: defaultLanguage(),
    speechSpeed: 1.0,
    phase: "idle",
  };
}

export function snapshotOf(session: TranslatorSession): SessionSnapshot {
  const playback = session.playback;
  return {
    phase: session.phase,
    inputText: session.inputText ?? null,
    detectedLanguage: session.detectedLanguage ?? null,
    translatedText: session.translatedText ?? null,
    targetLanguage: session.targetLanguage,
    speechSpeed: session.speechSpeed,
    playback: playback
      ? {
          language: playback.language,
          speed: playback.speed,
          usedFallback: playback.usedFallback,
          version: playback.version,
          bytes: playback.audio.length,
        }
      : null,
  };
}

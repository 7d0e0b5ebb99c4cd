import type { Logger } from "../server/logger.js";
import type { TranslationProvider } from "../domain/providers.js";
import type {
  ActionOutcome,
  Language,
  LanguageCode,
  Notice,
  SessionEvent,
  SessionSnapshot,
  TranslateRequest,
  TranslatorSession,
} from "../domain/types.js";
import {
  NoSpeechDetectedError,
  ServiceUnavailableError,
  UnintelligibleError,
  VoiceTranslatorError,
  errorMessage,
} from "../domain/errors.js";
import { DEFAULT_LANGUAGE_CODE, lookupLanguage } from "../domain/languages.js";
import type { AudioCapture } from "../audio/capture.js";
import {
  MAX_SPEECH_SPEED,
  MIN_SPEECH_SPEED,
  isValidSpeechSpeed,
  type SpeedAdjuster,
} from "../audio/speed-adjuster.js";
import type { SpeechTranscriber } from "./transcriber.js";
import type { LanguageDetector } from "./language-detector.js";
import type { SpeechSynthesizer } from "./synthesizer.js";
import { createSession, snapshotOf } from "./session.js";

export type OrchestratorDeps = {
  readonly logger: Logger;
  readonly capture: AudioCapture;
  readonly transcriber: SpeechTranscriber;
  readonly detector: LanguageDetector;
  readonly translator: TranslationProvider;
  readonly synthesizer: SpeechSynthesizer;
  readonly speedAdjuster: SpeedAdjuster;
  readonly onSessionEvent?: (event: SessionEvent) => Promise<void> | void;
};

type Synthesized = {
  readonly audio: Buffer;
  readonly language: LanguageCode;
  readonly usedFallback: boolean;
};

export const FALLBACK_WARNING = "Couldn't play audio in selected language. Trying English...";

/**
 * Owns the single interactive session and runs the record and translate
 * actions against it. Actions always resolve; failures come back as notices
 * and leave the last good session values in place.
 */
export class SessionOrchestrator {
  private readonly session: TranslatorSession = createSession();
  private playbackVersion = 0;

  public constructor(private readonly deps: OrchestratorDeps) {}

  public snapshot(): SessionSnapshot {
    return snapshotOf(this.session);
  }

  public playbackAudio(): Buffer | undefined {
    return this.session.playback?.audio;
  }

  public async record(): Promise<ActionOutcome> {
    this.deps.logger.info("record requested");
    void this.emitEvent("record.listening", {});

    let text: string;
    try {
      text = await this.deps.capture.withRecording((path) => this.deps.transcriber.transcribe(path));
    } catch (error) {
      return this.recordFailed(error);
    }

    this.session.inputText = text;
    this.session.phase = "recorded";
    void this.emitEvent("record.transcribed", { text });

    const detected = this.deps.detector.detect(text);
    this.session.detectedLanguage = detected;
    this.session.phase = "detected";
    void this.emitEvent("language.detected", { code: detected.code, name: detected.name });

    this.deps.logger.info("speech recorded", {
      chars: text.length,
      detectedLanguage: detected.code,
    });
    return this.outcome(true, [{ level: "success", message: "Voice recorded successfully!" }]);
  }

  public async translate(request: TranslateRequest): Promise<ActionOutcome> {
    const language = lookupLanguage(request.targetLanguage);
    if (!language) {
      return this.rejected(`Unsupported target language: ${request.targetLanguage}`);
    }
    if (!isValidSpeechSpeed(request.speed)) {
      return this.rejected(
        `Speech speed must be between ${MIN_SPEECH_SPEED} and ${MAX_SPEECH_SPEED}, got ${request.speed}`,
      );
    }
    const inputText = this.session.inputText;
    if (!inputText) {
      return this.rejected("Record your voice before translating.");
    }

    this.deps.logger.info("translate requested", {
      targetLanguage: language.code,
      speed: request.speed,
    });

    let translated: string;
    try {
      translated = await this.deps.translator.translate(inputText, language.code, "auto");
    } catch (error) {
      const message = `Translation error: ${errorMessage(error)}`;
      this.deps.logger.warn("translation failed", {
        provider: this.deps.translator.name,
        targetLanguage: language.code,
        error: errorMessage(error),
      });
      void this.emitEvent("translation.failed", { message });
      return this.outcome(false, [{ level: "error", message }]);
    }

    this.session.targetLanguage = language;
    this.session.speechSpeed = request.speed;
    this.session.translatedText = translated;
    this.session.playback = undefined;
    this.session.phase = "translated";
    void this.emitEvent("translation.completed", { text: translated, targetLanguage: language.code });

    const notices = await this.play(translated, language, request.speed);
    return this.outcome(true, notices);
  }

  private async play(text: string, language: Language, speed: number): Promise<Notice[]> {
    const notices: Notice[] = [];
    const synthesized = await this.synthesizeWithFallback(text, language.code, notices);
    if (!synthesized) return notices;

    const audio = await this.deps.speedAdjuster.adjust(synthesized.audio, speed);
    const version = ++this.playbackVersion;
    this.session.playback = {
      audio,
      language: synthesized.language,
      speed,
      usedFallback: synthesized.usedFallback,
      version,
    };
    this.session.phase = "played";
    void this.emitEvent("playback.ready", {
      version,
      language: synthesized.language,
      speed,
      usedFallback: synthesized.usedFallback,
      bytes: audio.length,
    });
    return notices;
  }

  private async synthesizeWithFallback(
    text: string,
    languageCode: LanguageCode,
    notices: Notice[],
  ): Promise<Synthesized | undefined> {
    try {
      const audio = await this.deps.synthesizer.synthesize(text, languageCode);
      return { audio, language: languageCode, usedFallback: false };
    } catch (error) {
      this.deps.logger.warn("synthesis failed, retrying in English", {
        provider: this.deps.synthesizer.providerName,
        languageCode,
        error: errorMessage(error),
      });
      notices.push({ level: "warning", message: FALLBACK_WARNING });
      void this.emitEvent("playback.fallback", { languageCode, message: FALLBACK_WARNING });
    }

    try {
      const audio = await this.deps.synthesizer.synthesize(text, DEFAULT_LANGUAGE_CODE);
      return { audio, language: DEFAULT_LANGUAGE_CODE, usedFallback: true };
    } catch (error) {
      const message = `Couldn't play audio: ${errorMessage(error)}`;
      this.deps.logger.warn("english synthesis failed", {
        provider: this.deps.synthesizer.providerName,
        error: errorMessage(error),
      });
      notices.push({ level: "warning", message });
      void this.emitEvent("playback.failed", { message });
      return undefined;
    }
  }

  private recordFailed(error: unknown): ActionOutcome {
    let message: string;
    if (error instanceof NoSpeechDetectedError) {
      message = "No speech detected. Please try again.";
    } else if (error instanceof UnintelligibleError) {
      message = "Could not understand audio. Please try again.";
    } else if (error instanceof ServiceUnavailableError) {
      message = `Speech recognition service error: ${error.message}`;
    } else {
      message = `Error: ${errorMessage(error)}`;
    }

    const expected = error instanceof VoiceTranslatorError;
    this.session.phase = expected ? "idle" : "error";
    if (expected) {
      this.deps.logger.warn("record failed", { code: error.code, error: error.message });
    } else {
      this.deps.logger.error("record failed unexpectedly", { error: errorMessage(error) });
    }
    void this.emitEvent("record.failed", {
      code: expected ? error.code : "unexpected",
      message,
    });
    return this.outcome(false, [{ level: "error", message }]);
  }

  private rejected(message: string): ActionOutcome {
    this.deps.logger.warn("action rejected", { reason: message });
    return this.outcome(false, [{ level: "error", message }]);
  }

  private outcome(ok: boolean, notices: Notice[]): ActionOutcome {
    return { ok, notices, session: this.snapshot() };
  }

  private async emitEvent(type: SessionEvent["type"], payload: Record<string, unknown>): Promise<void> {
    if (!this.deps.onSessionEvent) return;
    try {
      await this.deps.onSessionEvent({ type, atMs: Date.now(), payload });
    } catch (error) {
      this.deps.logger.warn("session event hook failed", {
        type,
        error: errorMessage(error),
      });
    }
  }
}

export type VoiceTranslatorErrorCode =
  | "no_speech_detected"
  | "unintelligible"
  | "service_unavailable"
  | "translation_failed"
  | "synthesis_failed";

export class VoiceTranslatorError extends Error {
  public constructor(
    public readonly code: VoiceTranslatorErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NoSpeechDetectedError extends VoiceTranslatorError {
  public constructor(message = "no speech detected before the listen timeout") {
    super("no_speech_detected", message);
  }
}

export class UnintelligibleError extends VoiceTranslatorError {
  public constructor(message = "could not understand audio", options?: { cause?: unknown }) {
    super("unintelligible", message, options);
  }
}

export class ServiceUnavailableError extends VoiceTranslatorError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super("service_unavailable", message, options);
  }
}

export class TranslationError extends VoiceTranslatorError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super("translation_failed", message, options);
  }
}

export class SynthesisError extends VoiceTranslatorError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super("synthesis_failed", message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

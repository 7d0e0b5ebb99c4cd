export type LanguageCode =
  | "en"
  | "es"
  | "fr"
  | "de"
  | "it"
  | "pt"
  | "ru"
  | "zh"
  | "ja"
  | "hi"
  | "ta";

export interface Language {
  readonly code: LanguageCode;
  readonly name: string;
}

export type DetectedLanguage =
  | { readonly code: string; readonly name: string }
  | { readonly code: null; readonly name: "Unknown" };

export type SessionPhase = "idle" | "recorded" | "detected" | "translated" | "played" | "error";

export interface Playback {
  readonly audio: Buffer;
  readonly language: LanguageCode;
  readonly speed: number;
  readonly usedFallback: boolean;
  readonly version: number;
}

export interface TranslatorSession {
  inputText?: string;
  detectedLanguage?: DetectedLanguage;
  translatedText?: string;
  targetLanguage: Language;
  speechSpeed: number;
  phase: SessionPhase;
  playback?: Playback;
}

export interface SessionSnapshot {
  readonly phase: SessionPhase;
  readonly inputText: string | null;
  readonly detectedLanguage: DetectedLanguage | null;
  readonly translatedText: string | null;
  readonly targetLanguage: Language;
  readonly speechSpeed: number;
  readonly playback: {
    readonly language: LanguageCode;
    readonly speed: number;
    readonly usedFallback: boolean;
    readonly version: number;
    readonly bytes: number;
  } | null;
}

export type NoticeLevel = "success" | "info" | "warning" | "error";

export interface Notice {
  readonly level: NoticeLevel;
  readonly message: string;
}

export interface ActionOutcome {
  readonly ok: boolean;
  readonly notices: Notice[];
  readonly session: SessionSnapshot;
}

export interface TranslateRequest {
  readonly targetLanguage: string;
  readonly speed: number;
}

export interface SessionEvent {
  readonly type:
    | "record.listening"
    | "record.transcribed"
    | "record.failed"
    | "language.detected"
    | "translation.completed"
    | "translation.failed"
    | "playback.fallback"
    | "playback.ready"
    | "playback.failed";
  readonly atMs: number;
  readonly payload: Record<string, unknown>;
}

import { tmpdir } from "node:os";
import type { LogLevel } from "./server/logger.js";

export type TranslationProviderKind = "google" | "google-web" | "stub";
export type TtsProviderKind = "google-web" | "google" | "polly" | "stub";

export type TranslationSettings =
  | { readonly translationProvider: "google"; readonly googleTranslateApiKey: string }
  | { readonly translationProvider: "google-web" | "stub"; readonly googleTranslateApiKey?: string };

interface BaseConfig {
  readonly port: number;
  readonly logLevel: LogLevel;
  readonly googleSpeechApiKey?: string;
  readonly sttLanguage: string;
  readonly stubSttText: string;
  readonly ttsProvider: TtsProviderKind;
  readonly googleTtsApiKey?: string;
  readonly awsRegion: string;
  readonly pollyVoiceEn: string;
  readonly pollyVoiceEs: string;
  readonly soxPath: string;
  readonly listenTimeoutMs: number;
  readonly speechThreshold: number;
  readonly ffmpegPath: string;
  readonly tmpDir: string;
}

export type AppConfig = BaseConfig & TranslationSettings;

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];
const TRANSLATION_PROVIDERS: readonly TranslationProviderKind[] = ["google", "google-web", "stub"];
const TTS_PROVIDERS: readonly TtsProviderKind[] = ["google-web", "google", "polly", "stub"];

function oneOf<T extends string>(
  name: string,
  value: string | undefined,
  allowed: readonly T[],
  fallback: T,
): T {
  if (value === undefined || value === "") return fallback;
  const match = allowed.find((candidate) => candidate === value);
  if (!match) {
    throw new Error(`Invalid ${name}: ${value}`);
  }
  return match;
}

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const port = Number(env.PORT ?? "8501");
  if (!Number.isFinite(port) || port <= 0) {
    throw new Error(`Invalid PORT: ${env.PORT}`);
  }

  const logLevel = oneOf("LOG_LEVEL", env.LOG_LEVEL, LOG_LEVELS, "info");

  const listenTimeoutMs = Number(env.LISTEN_TIMEOUT_MS ?? "5000");
  if (!Number.isFinite(listenTimeoutMs) || listenTimeoutMs < 500) {
    throw new Error(`Invalid LISTEN_TIMEOUT_MS: ${env.LISTEN_TIMEOUT_MS}`);
  }
  const speechThreshold = Number(env.SPEECH_THRESHOLD ?? "0.02");
  if (!Number.isFinite(speechThreshold) || speechThreshold <= 0 || speechThreshold >= 1) {
    throw new Error(`Invalid SPEECH_THRESHOLD: ${env.SPEECH_THRESHOLD}`);
  }

  const googleTranslateApiKey = env.GOOGLE_TRANSLATE_API_KEY || undefined;
  const translationProvider = oneOf(
    "TRANSLATION_PROVIDER",
    env.TRANSLATION_PROVIDER,
    TRANSLATION_PROVIDERS,
    googleTranslateApiKey ? "google" : "google-web",
  );
  let translation: TranslationSettings;
  if (translationProvider === "google") {
    if (!googleTranslateApiKey) {
      throw new Error("TRANSLATION_PROVIDER=google requires GOOGLE_TRANSLATE_API_KEY");
    }
    translation = { translationProvider, googleTranslateApiKey };
  } else {
    translation = { translationProvider, googleTranslateApiKey };
  }

  return {
    port,
    logLevel,
    googleSpeechApiKey: env.GOOGLE_SPEECH_API_KEY || undefined,
    sttLanguage: env.STT_LANGUAGE ?? "en-US",
    stubSttText: env.STUB_STT_TEXT ?? "",
    ...translation,
    ttsProvider: oneOf("TTS_PROVIDER", env.TTS_PROVIDER, TTS_PROVIDERS, "google-web"),
    googleTtsApiKey: env.GOOGLE_TTS_API_KEY || undefined,
    awsRegion: env.AWS_REGION ?? "us-west-2",
    pollyVoiceEn: env.POLLY_VOICE_EN ?? "Joanna",
    pollyVoiceEs: env.POLLY_VOICE_ES ?? "Lupe",
    soxPath: env.SOX_PATH ?? "sox",
    listenTimeoutMs,
    speechThreshold,
    ffmpegPath: env.FFMPEG_PATH ?? "ffmpeg",
    tmpDir: env.VOICE_TMP_DIR ?? tmpdir(),
  };
}

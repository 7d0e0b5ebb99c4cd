import type { AppConfig } from "../config.js";
import type { Logger } from "../server/logger.js";
import type {
  MicrophoneSource,
  SpeechToTextProvider,
  TranslationProvider,
  TtsProvider,
} from "../domain/providers.js";
import { SoxMicrophone } from "../audio/microphone.js";
import { GoogleSpeechProvider, StubSpeechProvider } from "./stt/google.js";
import {
  GoogleTranslationProvider,
  GoogleWebTranslationProvider,
  StubTranslationProvider,
} from "./translation/google.js";
import { GoogleTtsProvider, GoogleWebTtsProvider } from "./tts/google.js";
import { PollyStandardProvider, StubPollyProvider } from "./tts/polly.js";

export type ProviderBundle = {
  readonly microphone: MicrophoneSource;
  readonly stt: SpeechToTextProvider;
  readonly translator: TranslationProvider;
  readonly tts: TtsProvider;
};

function makeTranslator(config: AppConfig): TranslationProvider {
  switch (config.translationProvider) {
    case "google":
      return new GoogleTranslationProvider({ apiKey: config.googleTranslateApiKey });
    case "google-web":
      return new GoogleWebTranslationProvider();
    case "stub":
      return new StubTranslationProvider();
  }
}

function makeTts(config: AppConfig, logger: Logger): TtsProvider {
  switch (config.ttsProvider) {
    case "google":
      if (config.googleTtsApiKey) {
        return new GoogleTtsProvider({ apiKey: config.googleTtsApiKey });
      }
      logger.warn("TTS_PROVIDER=google without GOOGLE_TTS_API_KEY, using stub");
      return new StubPollyProvider();
    case "polly":
      return new PollyStandardProvider({
        region: config.awsRegion,
        voiceEn: config.pollyVoiceEn,
        voiceEs: config.pollyVoiceEs,
      });
    case "google-web":
      return new GoogleWebTtsProvider();
    case "stub":
      return new StubPollyProvider();
  }
}

export function makeProviders(config: AppConfig, logger: Logger): ProviderBundle {
  const microphone = new SoxMicrophone({ soxPath: config.soxPath });

  const stt = config.googleSpeechApiKey
    ? new GoogleSpeechProvider({
        apiKey: config.googleSpeechApiKey,
        languageCode: config.sttLanguage,
      })
    : new StubSpeechProvider(config.stubSttText);

  const translator = makeTranslator(config);
  const tts = makeTts(config, logger);

  logger.info("provider selection", {
    microphone: microphone.name,
    stt: stt.name,
    translation: translator.name,
    tts: tts.name,
  });

  return { microphone, stt, translator, tts };
}

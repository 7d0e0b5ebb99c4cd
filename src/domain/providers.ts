import type { VoiceTable } from "./languages.js";

export interface MicrophoneSource {
  readonly name: string;
  /** Records `durationMs` of audio from the default input device into a WAV at `path`. */
  capture(path: string, durationMs: number): Promise<void>;
}

export interface RecognitionRequest {
  readonly audio: Buffer;
  readonly sampleRateHz: number;
}

export interface SpeechToTextProvider {
  readonly name: string;
  recognize(request: RecognitionRequest): Promise<string>;
}

export interface TranslationProvider {
  readonly name: string;
  translate(text: string, targetLanguage: string, sourceHint?: string): Promise<string>;
}

export interface TtsProvider {
  readonly name: string;
  readonly voices: VoiceTable;
  synthesize(text: string, voice: string): AsyncIterable<Uint8Array>;
}

import { mkdtemp, readFile, rm } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { MicrophoneSource } from "../domain/providers.js";
import { NoSpeechDetectedError } from "../domain/errors.js";
import type { Logger } from "../server/logger.js";
import { containsSpeech, parsePcmWav, peakRmsLevel } from "./wav.js";

export type AudioCaptureOptions = {
  readonly microphone: MicrophoneSource;
  readonly logger: Logger;
  readonly tmpDir: string;
  readonly listenTimeoutMs?: number;
  readonly speechThreshold?: number;
};

export class AudioCapture {
  public constructor(private readonly opts: AudioCaptureOptions) {}

  /**
   * Records one listen window into a new temporary WAV and returns its path.
   * The caller owns the file and releases it with {@link AudioCapture.discard}.
   * A window without speech leaves nothing behind and throws
   * {@link NoSpeechDetectedError}.
   */
  public async record(): Promise<string> {
    const listenTimeoutMs = this.opts.listenTimeoutMs ?? 5000;
    const threshold = this.opts.speechThreshold ?? 0.02;
    const path = join(await mkdtemp(join(this.opts.tmpDir, "voice-translator-")), "audio.wav");

    try {
      this.opts.logger.debug("listening", { microphone: this.opts.microphone.name, listenTimeoutMs });
      await this.opts.microphone.capture(path, listenTimeoutMs);

      const wav = parsePcmWav(await readFile(path));
      if (!containsSpeech(wav, threshold)) {
        this.opts.logger.info("no speech in listen window", {
          peakLevel: Number(peakRmsLevel(wav).toFixed(4)),
          threshold,
        });
        throw new NoSpeechDetectedError();
      }
      return path;
    } catch (error) {
      await this.discard(path);
      throw error;
    }
  }

  public async discard(path: string): Promise<void> {
    await rm(dirname(path), { recursive: true, force: true });
  }

  /** Scoped {@link AudioCapture.record}: the recording is deleted once `fn` settles. */
  public async withRecording<T>(fn: (path: string) => Promise<T>): Promise<T> {
    const path = await this.record();
    try {
      return await fn(path);
    } finally {
      await this.discard(path);
    }
  }
}

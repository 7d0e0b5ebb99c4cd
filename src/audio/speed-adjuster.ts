import { errorMessage } from "../domain/errors.js";
import type { Logger } from "../server/logger.js";
import { runProcess } from "./process.js";

export const MIN_SPEECH_SPEED = 0.5;
export const MAX_SPEECH_SPEED = 2.0;

/** Pipes `input` through an audio filter tool and resolves with its output. */
export type AudioFilterRunner = (args: readonly string[], input: Buffer) => Promise<Buffer>;

export function ffmpegRunner(ffmpegPath: string): AudioFilterRunner {
  return (args, input) => runProcess(ffmpegPath, args, input);
}

export function isValidSpeechSpeed(speed: number): boolean {
  return Number.isFinite(speed) && speed >= MIN_SPEECH_SPEED && speed <= MAX_SPEECH_SPEED;
}

export function atempoArgs(speed: number): string[] {
  return [
    "-hide_banner",
    "-loglevel",
    "error",
    "-f",
    "mp3",
    "-i",
    "pipe:0",
    "-filter:a",
    `atempo=${Number(speed.toFixed(2))}`,
    "-f",
    "mp3",
    "pipe:1",
  ];
}

export class SpeedAdjuster {
  public constructor(
    private readonly run: AudioFilterRunner,
    private readonly logger: Logger,
  ) {}

  /**
   * Time-stretches MP3 audio to `speed` without shifting pitch. Best effort:
   * whenever the stretch cannot be applied the input comes back untouched.
   */
  public async adjust(audio: Buffer, speed: number): Promise<Buffer> {
    if (speed === 1) return audio;
    if (!isValidSpeechSpeed(speed) || audio.length === 0) {
      this.logger.warn("speed adjustment skipped", { speed, bytes: audio.length });
      return audio;
    }

    try {
      const stretched = await this.run(atempoArgs(speed), audio);
      if (stretched.length === 0) {
        this.logger.warn("speed adjustment produced no audio", { speed });
        return audio;
      }
      return stretched;
    } catch (error) {
      this.logger.warn("speed adjustment failed", { speed, error: errorMessage(error) });
      return audio;
    }
  }
}

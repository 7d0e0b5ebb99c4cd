import { readFile } from "node:fs/promises";
import type { SpeechToTextProvider } from "../domain/providers.js";
import { UnintelligibleError } from "../domain/errors.js";
import { parsePcmWav, type PcmWav } from "../audio/wav.js";

export class SpeechTranscriber {
  public constructor(private readonly provider: SpeechToTextProvider) {}

  /**
   * Recognises the WAV at `path`. Throws {@link UnintelligibleError} when no
   * text comes back and `ServiceUnavailableError` when the provider call fails.
   */
  public async transcribe(path: string): Promise<string> {
    const audio = await readFile(path);
    let wav: PcmWav;
    try {
      wav = parsePcmWav(audio);
    } catch (error) {
      throw new UnintelligibleError("recording is not readable PCM audio", { cause: error });
    }

    const text = (await this.provider.recognize({ audio, sampleRateHz: wav.sampleRateHz })).trim();
    if (!text) throw new UnintelligibleError();
    return text;
  }
}

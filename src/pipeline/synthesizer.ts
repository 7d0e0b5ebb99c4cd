import { createWriteStream } from "node:fs";
import { readFile } from "node:fs/promises";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { TtsProvider } from "../domain/providers.js";
import { DEFAULT_LANGUAGE_CODE, voiceFor } from "../domain/languages.js";
import { SynthesisError, errorMessage } from "../domain/errors.js";
import { withTempFile } from "../audio/temp-file.js";
import type { Logger } from "../server/logger.js";

export type SpeechSynthesizerOptions = {
  readonly provider: TtsProvider;
  readonly logger: Logger;
  readonly tmpDir: string;
};

export class SpeechSynthesizer {
  public constructor(private readonly opts: SpeechSynthesizerOptions) {}

  public get providerName(): string {
    return this.opts.provider.name;
  }

  /** Voice used for `languageCode`; the English voice when the engine has none for it. */
  public resolveVoice(languageCode: string): string | undefined {
    const voices = this.opts.provider.voices;
    return voiceFor(voices, languageCode) ?? voices[DEFAULT_LANGUAGE_CODE];
  }

  public async synthesize(text: string, languageCode: string): Promise<Buffer> {
    if (!text.trim()) throw new SynthesisError("nothing to synthesize");

    const voice = this.resolveVoice(languageCode);
    if (!voice) {
      throw new SynthesisError(`${this.opts.provider.name} has no voice for ${languageCode}`);
    }

    return withTempFile(this.opts.tmpDir, ".mp3", async (path) => {
      try {
        await pipeline(
          Readable.from(this.opts.provider.synthesize(text, voice)),
          createWriteStream(path),
        );
      } catch (error) {
        if (error instanceof SynthesisError) throw error;
        throw new SynthesisError(errorMessage(error), { cause: error });
      }

      const audio = await readFile(path);
      if (audio.length === 0) {
        throw new SynthesisError(`${this.opts.provider.name} returned no audio`);
      }
      this.opts.logger.debug("synthesized speech", {
        provider: this.opts.provider.name,
        languageCode,
        voice,
        bytes: audio.length,
      });
      return audio;
    });
  }
}

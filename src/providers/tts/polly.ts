import type { TtsProvider } from "../../domain/providers.js";
import { SYNTHESIS_VOICES, type VoiceTable } from "../../domain/languages.js";
import { SynthesisError, errorMessage } from "../../domain/errors.js";
import { PollyClient, SynthesizeSpeechCommand, type VoiceId } from "@aws-sdk/client-polly";

async function* audioChunks(audioStream: unknown): AsyncGenerator<Uint8Array> {
  if (!audioStream || typeof audioStream !== "object") return;

  if (Symbol.asyncIterator in audioStream) {
    for await (const chunk of audioStream as AsyncIterable<Uint8Array>) {
      yield chunk;
    }
    return;
  }

  if ("transformToByteArray" in audioStream && typeof audioStream.transformToByteArray === "function") {
    const bytes: unknown = await audioStream.transformToByteArray();
    if (bytes instanceof Uint8Array) yield bytes;
  }
}

export class StubPollyProvider implements TtsProvider {
  public readonly name = "aws-polly-stub";
  public readonly voices = SYNTHESIS_VOICES.stub;

  public async *synthesize(text: string): AsyncGenerator<Uint8Array> {
    if (!text.trim()) return;
    // MPEG-1 Layer III frame sync followed by padding.
    yield Buffer.from([0xff, 0xfb, 0x90, 0x44, 0x00, 0x00, 0x00, 0x00]);
  }
}

export type PollyOptions = {
  readonly region: string;
  readonly voiceEn: string;
  readonly voiceEs: string;
};

export class PollyStandardProvider implements TtsProvider {
  public readonly name = "aws-polly-standard";
  public readonly voices: VoiceTable;
  private readonly client: PollyClient;

  public constructor(opts: PollyOptions) {
    this.client = new PollyClient({ region: opts.region });
    this.voices = { ...SYNTHESIS_VOICES.polly, en: opts.voiceEn, es: opts.voiceEs };
  }

  public async *synthesize(text: string, voice: string): AsyncGenerator<Uint8Array> {
    let audioStream: unknown;
    try {
      const command = new SynthesizeSpeechCommand({
        Engine: "standard",
        OutputFormat: "mp3",
        Text: text,
        TextType: "text",
        VoiceId: voice as VoiceId,
      });
      const out = await this.client.send(command);
      audioStream = out.AudioStream;
    } catch (error) {
      throw new SynthesisError(`polly request failed: ${errorMessage(error)}`, { cause: error });
    }

    yield* audioChunks(audioStream);
  }
}

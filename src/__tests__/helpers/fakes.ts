import type { TtsProvider } from "../../domain/providers.js";
import type { VoiceTable } from "../../domain/languages.js";

export type FakeTtsBehaviour = {
  readonly chunks?: readonly Uint8Array[];
  readonly failVoices?: readonly string[];
  readonly failAfterFirstChunk?: boolean;
};

export class FakeTts implements TtsProvider {
  public readonly name = "fake-tts";
  public readonly calls: Array<{ text: string; voice: string }> = [];
  public readonly failingVoices: Set<string>;

  public constructor(
    public readonly voices: VoiceTable = { en: "voice-en", es: "voice-es" },
    private readonly behaviour: FakeTtsBehaviour = {},
  ) {
    this.failingVoices = new Set(behaviour.failVoices);
  }

  public async *synthesize(text: string, voice: string): AsyncGenerator<Uint8Array> {
    this.calls.push({ text, voice });
    if (this.failingVoices.has(voice)) {
      throw new Error(`voice ${voice} unavailable`);
    }
    const chunks = this.behaviour.chunks ?? [Buffer.from([0xff, 0xfb]), Buffer.from([0x90, 0x44])];
    for (const [i, chunk] of chunks.entries()) {
      if (i > 0 && this.behaviour.failAfterFirstChunk) {
        throw new Error("stream interrupted");
      }
      yield chunk;
    }
  }
}

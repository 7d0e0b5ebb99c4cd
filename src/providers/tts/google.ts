import type { TtsProvider } from "../../domain/providers.js";
import { SYNTHESIS_VOICES } from "../../domain/languages.js";
import { SynthesisError, errorMessage } from "../../domain/errors.js";
import { splitForSpeech } from "./segments.js";

type GoogleTtsOptions = {
  readonly apiKey: string;
  readonly endpoint?: string;
  readonly fetchImpl?: typeof fetch;
};

type GoogleTtsResponse = {
  audioContent?: string;
};

export class GoogleTtsProvider implements TtsProvider {
  public readonly name = "google-tts";
  public readonly voices = SYNTHESIS_VOICES["google-cloud"];

  public constructor(private readonly opts: GoogleTtsOptions) {}

  public async *synthesize(text: string, voice: string): AsyncGenerator<Uint8Array> {
    const languageCode = voice.split("-").slice(0, 2).join("-");
    const payload = {
      input: { text },
      voice: { languageCode, name: voice },
      audioConfig: { audioEncoding: "MP3" },
    };
    const endpoint =
      this.opts.endpoint ??
      `https://texttospeech.googleapis.com/v1/text:synthesize?key=${encodeURIComponent(this.opts.apiKey)}`;
    const fetchImpl = this.opts.fetchImpl ?? fetch;

    let response: Response;
    try {
      response = await fetchImpl(endpoint, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(payload),
      });
    } catch (error) {
      throw new SynthesisError(`speech request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) throw new SynthesisError(`speech service responded ${response.status}`);

    let body: GoogleTtsResponse;
    try {
      body = (await response.json()) as GoogleTtsResponse;
    } catch (error) {
      throw new SynthesisError("speech service returned malformed JSON", { cause: error });
    }
    if (!body.audioContent) throw new SynthesisError("speech service returned no audio");

    yield Buffer.from(body.audioContent, "base64");
  }
}

type GoogleWebTtsOptions = {
  readonly endpoint?: string;
  readonly fetchImpl?: typeof fetch;
  readonly maxSegmentLength?: number;
};

/**
 * Keyless MP3 synthesis through the translate page's speech endpoint. The
 * endpoint only takes short inputs, so the text goes out in segments and the
 * MP3 responses are streamed back to back.
 */
export class GoogleWebTtsProvider implements TtsProvider {
  public readonly name = "google-translate-tts";
  public readonly voices = SYNTHESIS_VOICES["google-web"];

  public constructor(private readonly opts: GoogleWebTtsOptions = {}) {}

  public async *synthesize(text: string, voice: string): AsyncGenerator<Uint8Array> {
    const segments = splitForSpeech(text, this.opts.maxSegmentLength ?? 100);
    const fetchImpl = this.opts.fetchImpl ?? fetch;

    for (const [idx, segment] of segments.entries()) {
      const url = new URL(this.opts.endpoint ?? "https://translate.google.com/translate_tts");
      url.searchParams.set("ie", "UTF-8");
      url.searchParams.set("q", segment);
      url.searchParams.set("tl", voice);
      url.searchParams.set("total", String(segments.length));
      url.searchParams.set("idx", String(idx));
      url.searchParams.set("textlen", String(segment.length));
      url.searchParams.set("client", "tw-ob");

      let response: Response;
      try {
        response = await fetchImpl(url, { method: "GET" });
      } catch (error) {
        throw new SynthesisError(`speech request failed: ${errorMessage(error)}`, { cause: error });
      }
      if (!response.ok) {
        throw new SynthesisError(`speech service responded ${response.status} for ${voice}`);
      }

      yield new Uint8Array(await response.arrayBuffer());
    }
  }
}

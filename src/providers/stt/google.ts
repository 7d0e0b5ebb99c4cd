import type { RecognitionRequest, SpeechToTextProvider } from "../../domain/providers.js";
import { ServiceUnavailableError, errorMessage } from "../../domain/errors.js";

type GoogleSttOptions = {
  readonly apiKey: string;
  readonly languageCode?: string;
  readonly endpoint?: string;
  readonly fetchImpl?: typeof fetch;
};

type GoogleSttResponse = {
  results?: Array<{
    alternatives?: Array<{ transcript?: string; confidence?: number }>;
  }>;
};

export class StubSpeechProvider implements SpeechToTextProvider {
  public readonly name = "google-stt-stub";
  public constructor(private readonly text: string = "") {}

  public async recognize(): Promise<string> {
    return this.text;
  }
}

export class GoogleSpeechProvider implements SpeechToTextProvider {
  public readonly name = "google-stt";

  public constructor(private readonly opts: GoogleSttOptions) {}

  /** Resolves with the top transcript, or "" when nothing was recognised. */
  public async recognize(request: RecognitionRequest): Promise<string> {
    const endpoint =
      this.opts.endpoint ??
      `https://speech.googleapis.com/v1/speech:recognize?key=${encodeURIComponent(this.opts.apiKey)}`;
    const fetchImpl = this.opts.fetchImpl ?? fetch;

    const payload = {
      config: {
        encoding: "LINEAR16",
        sampleRateHertz: request.sampleRateHz,
        languageCode: this.opts.languageCode ?? "en-US",
        enableAutomaticPunctuation: true,
      },
      audio: {
        content: request.audio.toString("base64"),
      },
    };

    let response: Response;
    try {
      response = await fetchImpl(endpoint, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(payload),
      });
    } catch (error) {
      throw new ServiceUnavailableError(`speech request failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new ServiceUnavailableError(`speech service responded ${response.status}`);
    }

    let body: GoogleSttResponse;
    try {
      body = (await response.json()) as GoogleSttResponse;
    } catch (error) {
      throw new ServiceUnavailableError("speech service returned malformed JSON", { cause: error });
    }

    return (body.results ?? [])
      .map((result) => result.alternatives?.[0]?.transcript?.trim() ?? "")
      .filter((text) => text.length > 0)
      .join(" ");
  }
}

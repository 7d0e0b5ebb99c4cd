import type { TranslationProvider } from "../../domain/providers.js";
import { TranslationError, errorMessage } from "../../domain/errors.js";

export class StubTranslationProvider implements TranslationProvider {
  public readonly name = "google-translate-stub";

  public async translate(text: string): Promise<string> {
    if (!text.trim()) throw new TranslationError("nothing to translate");
    return text;
  }
}

export type GoogleTranslateOptions = {
  readonly apiKey: string;
  readonly endpoint?: string;
  readonly fetchImpl?: typeof fetch;
};

export class GoogleTranslationProvider implements TranslationProvider {
  public readonly name = "google-translate-v2";

  public constructor(private readonly opts: GoogleTranslateOptions) {}

  public async translate(text: string, targetLanguage: string, sourceHint = "auto"): Promise<string> {
    if (!text.trim()) throw new TranslationError("nothing to translate");

    const endpoint =
      this.opts.endpoint ??
      `https://translation.googleapis.com/language/translate/v2?key=${encodeURIComponent(this.opts.apiKey)}`;
    const fetchImpl = this.opts.fetchImpl ?? fetch;

    let translated: string | undefined;
    try {
      const response = await fetchImpl(endpoint, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({
          q: text,
          // v2 auto-detects when no source is sent.
          ...(sourceHint === "auto" ? {} : { source: sourceHint }),
          target: targetLanguage,
          format: "text",
        }),
      });

      if (!response.ok) {
        throw new TranslationError(`translation service responded ${response.status}`);
      }
      const data = (await response.json()) as {
        data?: { translations?: Array<{ translatedText?: string }> };
      };
      translated = data.data?.translations?.[0]?.translatedText;
    } catch (error) {
      if (error instanceof TranslationError) throw error;
      throw new TranslationError(errorMessage(error), { cause: error });
    }
    if (!translated) throw new TranslationError("translation service returned no text");

    return translated;
  }
}

export type GoogleWebTranslateOptions = {
  readonly endpoint?: string;
  readonly fetchImpl?: typeof fetch;
};

/** Keyless translation through the public web endpoint used by the browser widget. */
export class GoogleWebTranslationProvider implements TranslationProvider {
  public readonly name = "google-translate-web";

  public constructor(private readonly opts: GoogleWebTranslateOptions = {}) {}

  public async translate(text: string, targetLanguage: string, sourceHint = "auto"): Promise<string> {
    if (!text.trim()) throw new TranslationError("nothing to translate");

    const url = new URL(this.opts.endpoint ?? "https://translate.googleapis.com/translate_a/single");
    url.searchParams.set("client", "gtx");
    url.searchParams.set("sl", sourceHint);
    url.searchParams.set("tl", targetLanguage);
    url.searchParams.set("dt", "t");
    url.searchParams.set("q", text);
    const fetchImpl = this.opts.fetchImpl ?? fetch;

    let body: unknown;
    try {
      const response = await fetchImpl(url, { method: "GET" });
      if (!response.ok) {
        throw new TranslationError(`translation service responded ${response.status}`);
      }
      body = await response.json();
    } catch (error) {
      if (error instanceof TranslationError) throw error;
      throw new TranslationError(errorMessage(error), { cause: error });
    }

    const translated = joinSegments(body);
    if (!translated) throw new TranslationError("translation service returned no text");
    return translated;
  }
}

// Body shape: [[["Hola", "Hello", ...], ["¿cómo estás?", "how are you?", ...]], ...]
function joinSegments(body: unknown): string {
  if (!Array.isArray(body) || !Array.isArray(body[0])) return "";
  const segments: unknown[] = body[0];
  return segments
    .map((segment) => (Array.isArray(segment) && typeof segment[0] === "string" ? segment[0] : ""))
    .join("")
    .trim();
}

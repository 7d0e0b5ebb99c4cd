import assert from "node:assert/strict";
import test from "node:test";
import { once } from "node:events";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { AddressInfo } from "node:net";
import WebSocket from "ws";
import { SessionOrchestrator } from "../pipeline/orchestrator.js";
import { SpeechTranscriber } from "../pipeline/transcriber.js";
import { LanguageDetector } from "../pipeline/language-detector.js";
import { SpeechSynthesizer } from "../pipeline/synthesizer.js";
import { AudioCapture } from "../audio/capture.js";
import { SpeedAdjuster } from "../audio/speed-adjuster.js";
import { StubSpeechProvider } from "../providers/stt/google.js";
import { StubTranslationProvider } from "../providers/translation/google.js";
import { StubPollyProvider } from "../providers/tts/polly.js";
import type { ActionOutcome, SessionEvent } from "../domain/types.js";
import { makeLogger } from "../server/logger.js";
import { SessionEventHub } from "../server/event-hub.js";
import { startHttpServer } from "../server/http.js";
import { FakeMicrophone, spokenWav } from "./helpers/audio.js";

type RunningApp = {
  baseUrl: string;
  wsUrl: string;
  stop: () => Promise<void>;
};

async function startSmokeApp(): Promise<RunningApp> {
  const logger = makeLogger("error");
  const root = await mkdtemp(join(tmpdir(), "smoke-test-"));
  const events = new SessionEventHub(logger);
  const orchestrator = new SessionOrchestrator({
    logger,
    capture: new AudioCapture({ microphone: new FakeMicrophone(spokenWav()), logger, tmpDir: root }),
    transcriber: new SpeechTranscriber(new StubSpeechProvider("Hello, how are you?")),
    detector: new LanguageDetector(() => "en"),
    translator: new StubTranslationProvider(),
    synthesizer: new SpeechSynthesizer({ provider: new StubPollyProvider(), logger, tmpDir: root }),
    speedAdjuster: new SpeedAdjuster(async () => Buffer.from([0x01, 0x02, 0x03]), logger),
    onSessionEvent: (event) => events.publish(event),
  });

  const server = startHttpServer(0, logger, orchestrator, { events });
  await once(server, "listening");
  const address = server.address() as AddressInfo;

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    wsUrl: `ws://127.0.0.1:${address.port}`,
    stop: async () => {
      events.close();
      await new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) reject(error);
          else resolve();
        });
      });
      await rm(root, { recursive: true, force: true });
    },
  };
}

function collectMessages(ws: WebSocket, count: number): Promise<SessionEvent[]> {
  return new Promise((resolve) => {
    const seen: SessionEvent[] = [];
    ws.on("message", (raw) => {
      seen.push(JSON.parse(raw.toString()) as SessionEvent);
      if (seen.length === count) resolve(seen);
    });
  });
}

test("smoke: health, languages and page", async () => {
  const app = await startSmokeApp();
  try {
    const health = await fetch(`${app.baseUrl}/health`);
    assert.equal(health.status, 200);
    assert.deepEqual(await health.json(), { ok: true, service: "voice-translator" });

    const languages = await fetch(`${app.baseUrl}/languages`);
    const payload = (await languages.json()) as { languages: Array<{ code: string }> };
    assert.equal(payload.languages.length, 11);
    assert.equal(payload.languages[10]?.code, "ta");

    const page = await fetch(`${app.baseUrl}/`);
    assert.equal(page.status, 200);
    assert.equal(page.headers.get("content-type"), "text/html; charset=utf-8");
    assert.ok((await page.text()).includes("<title>Voice Language Translator</title>"));

    const missing = await fetch(`${app.baseUrl}/nope`);
    assert.equal(missing.status, 404);
    assert.deepEqual(await missing.json(), { error: "not_found" });
  } finally {
    await app.stop();
  }
});

test("smoke: record, translate and fetch the playback audio", async () => {
  const app = await startSmokeApp();
  try {
    const before = await fetch(`${app.baseUrl}/session/audio`);
    assert.equal(before.status, 204);

    const record = await fetch(`${app.baseUrl}/session/record`, { method: "POST" });
    assert.equal(record.status, 200);
    const recorded = (await record.json()) as ActionOutcome;
    assert.equal(recorded.ok, true);
    assert.equal(recorded.session.inputText, "Hello, how are you?");

    const translate = await fetch(`${app.baseUrl}/session/translate`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ targetLanguage: "es", speed: 1.2 }),
    });
    assert.equal(translate.status, 200);
    const translated = (await translate.json()) as ActionOutcome;
    assert.equal(translated.session.phase, "played");
    assert.equal(translated.session.translatedText, "Hello, how are you?");
    assert.equal(translated.session.playback?.version, 1);

    const audio = await fetch(`${app.baseUrl}/session/audio`);
    assert.equal(audio.status, 200);
    assert.equal(audio.headers.get("content-type"), "audio/mpeg");
    assert.deepEqual([...new Uint8Array(await audio.arrayBuffer())], [0x01, 0x02, 0x03]);

    const session = await fetch(`${app.baseUrl}/session`);
    const snapshot = (await session.json()) as { session: { speechSpeed: number } };
    assert.equal(snapshot.session.speechSpeed, 1.2);
  } finally {
    await app.stop();
  }
});

test("smoke: translate rejects malformed bodies", async () => {
  const app = await startSmokeApp();
  try {
    const wrongShape = await fetch(`${app.baseUrl}/session/translate`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ targetLanguage: "es", speed: "fast" }),
    });
    assert.equal(wrongShape.status, 400);
    assert.deepEqual(await wrongShape.json(), { error: "invalid_payload" });

    const notJson = await fetch(`${app.baseUrl}/session/translate`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "{not json",
    });
    assert.equal(notJson.status, 400);
    assert.deepEqual(await notJson.json(), { error: "invalid_json" });
  } finally {
    await app.stop();
  }
});

test("smoke: session events stream over websocket", async () => {
  const app = await startSmokeApp();
  const ws = new WebSocket(`${app.wsUrl}/session/events`);
  try {
    await once(ws, "open");
    const messages = collectMessages(ws, 3);

    const record = await fetch(`${app.baseUrl}/session/record`, { method: "POST" });
    assert.equal(record.status, 200);

    const events = await messages;
    assert.deepEqual(
      events.map((event) => event.type),
      ["record.listening", "record.transcribed", "language.detected"],
    );
    assert.deepEqual(events[2]?.payload, { code: "en", name: "English" });
  } finally {
    ws.close();
    await app.stop();
  }
});

test("smoke: websocket upgrades on other paths are refused", async () => {
  const app = await startSmokeApp();
  const ws = new WebSocket(`${app.wsUrl}/elsewhere`);
  try {
    const [error] = (await once(ws, "error")) as [Error];
    assert.ok(error instanceof Error);
  } finally {
    ws.terminate();
    await app.stop();
  }
});

import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import type { Server } from "node:http";
import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { URL, fileURLToPath } from "node:url";
import type { SessionOrchestrator } from "../pipeline/orchestrator.js";
import type { TranslateRequest } from "../domain/types.js";
import { LANGUAGES } from "../domain/languages.js";
import { errorMessage } from "../domain/errors.js";
import { SESSION_EVENTS_PATH, type SessionEventHub } from "./event-hub.js";
import type { Logger } from "./logger.js";

const DEFAULT_PAGE_PATH = resolve(dirname(fileURLToPath(import.meta.url)), "../../public/index.html");

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  if (!chunks.length) return {};
  return JSON.parse(Buffer.concat(chunks).toString("utf8"));
}

function writeJson(res: ServerResponse, code: number, payload: unknown): void {
  res.statusCode = code;
  res.setHeader("content-type", "application/json");
  res.end(JSON.stringify(payload));
}

export function startHttpServer(
  port: number,
  logger: Logger,
  orchestrator: SessionOrchestrator,
  opts: {
    readonly events: SessionEventHub;
    readonly pagePath?: string;
  },
): Server {
  const pagePath = opts.pagePath ?? DEFAULT_PAGE_PATH;

  const server = createServer(async (req, res) => {
    try {
      const method = req.method ?? "GET";
      const url = new URL(req.url ?? "/", "http://localhost");
      const pathname = url.pathname;

      if (method === "GET" && pathname === "/") {
        const page = await readFile(pagePath);
        res.statusCode = 200;
        res.setHeader("content-type", "text/html; charset=utf-8");
        res.end(page);
        return;
      }

      if (method === "GET" && pathname === "/health") {
        return writeJson(res, 200, { ok: true, service: "voice-translator" });
      }

      if (method === "GET" && pathname === "/languages") {
        return writeJson(res, 200, { languages: LANGUAGES });
      }

      if (method === "GET" && pathname === "/session") {
        return writeJson(res, 200, { session: orchestrator.snapshot() });
      }

      if (method === "POST" && pathname === "/session/record") {
        const outcome = await orchestrator.record();
        return writeJson(res, 200, outcome);
      }

      if (method === "POST" && pathname === "/session/translate") {
        let payload: unknown;
        try {
          payload = await readJsonBody(req);
        } catch {
          return writeJson(res, 400, { error: "invalid_json" });
        }
        if (!validateTranslatePayload(payload)) {
          return writeJson(res, 400, { error: "invalid_payload" });
        }
        const outcome = await orchestrator.translate({
          targetLanguage: payload.targetLanguage,
          speed: payload.speed,
        });
        return writeJson(res, 200, outcome);
      }

      if (method === "GET" && pathname === "/session/audio") {
        const audio = orchestrator.playbackAudio();
        if (!audio) {
          res.statusCode = 204;
          res.end();
          return;
        }
        res.statusCode = 200;
        res.setHeader("content-type", "audio/mpeg");
        res.setHeader("content-length", String(audio.length));
        res.setHeader("cache-control", "no-store");
        res.end(audio);
        return;
      }

      writeJson(res, 404, { error: "not_found" });
    } catch (error) {
      logger.error("request failed", { error: errorMessage(error) });
      writeJson(res, 500, { error: "internal_error" });
    }
  });

  server.on("upgrade", (req, socket, head) => {
    const pathname = new URL(req.url ?? "/", "http://localhost").pathname;

    if (pathname !== SESSION_EVENTS_PATH) {
      socket.destroy();
      return;
    }

    opts.events.handleUpgrade(req, socket, head);
  });

  server.listen(port, () => {
    logger.info("http server started", { port, eventsPath: SESSION_EVENTS_PATH });
  });

  return server;
}

function validateTranslatePayload(payload: unknown): payload is TranslateRequest {
  if (!payload || typeof payload !== "object") return false;
  const p = payload as Record<string, unknown>;
  return typeof p.targetLanguage === "string" && typeof p.speed === "number";
}

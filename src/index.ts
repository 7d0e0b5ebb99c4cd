import { loadConfig } from "./config.js";
import { AudioCapture } from "./audio/capture.js";
import { SpeedAdjuster, ffmpegRunner } from "./audio/speed-adjuster.js";
import { SpeechTranscriber } from "./pipeline/transcriber.js";
import { LanguageDetector } from "./pipeline/language-detector.js";
import { SpeechSynthesizer } from "./pipeline/synthesizer.js";
import { SessionOrchestrator } from "./pipeline/orchestrator.js";
import { makeProviders } from "./providers/factory.js";
import { makeLogger } from "./server/logger.js";
import { SessionEventHub } from "./server/event-hub.js";
import { startHttpServer } from "./server/http.js";

function main(): void {
  const config = loadConfig(process.env);
  const logger = makeLogger(config.logLevel);
  const providers = makeProviders(config, logger);
  const events = new SessionEventHub(logger);

  const orchestrator = new SessionOrchestrator({
    logger,
    capture: new AudioCapture({
      microphone: providers.microphone,
      logger,
      tmpDir: config.tmpDir,
      listenTimeoutMs: config.listenTimeoutMs,
      speechThreshold: config.speechThreshold,
    }),
    transcriber: new SpeechTranscriber(providers.stt),
    detector: new LanguageDetector(),
    translator: providers.translator,
    synthesizer: new SpeechSynthesizer({ provider: providers.tts, logger, tmpDir: config.tmpDir }),
    speedAdjuster: new SpeedAdjuster(ffmpegRunner(config.ffmpegPath), logger),
    onSessionEvent: (event) => events.publish(event),
  });

  const server = startHttpServer(config.port, logger, orchestrator, { events });

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info("shutdown signal received", { signal });
    events.close();
    server.close((error) => {
      if (error) {
        logger.error("failed to close http server", { error: error.message });
        process.exitCode = 1;
      }
      process.exit();
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main();

import type { MicrophoneSource } from "../domain/providers.js";
import { runProcess } from "./process.js";

export type SoxMicrophoneOptions = {
  readonly soxPath: string;
  readonly sampleRateHz?: number;
};

export class SoxMicrophone implements MicrophoneSource {
  public readonly name = "sox";

  public constructor(private readonly opts: SoxMicrophoneOptions) {}

  public async capture(path: string, durationMs: number): Promise<void> {
    const seconds = (durationMs / 1000).toFixed(3);
    await runProcess(this.opts.soxPath, [
      "-q",
      "-d",
      "-c",
      "1",
      "-r",
      String(this.opts.sampleRateHz ?? 16000),
      "-b",
      "16",
      "-e",
      "signed-integer",
      path,
      "trim",
      "0",
      seconds,
    ]);
  }
}

import { spawn } from "node:child_process";

export class ProcessError extends Error {
  public constructor(
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
  ) {
    super(`${command} exited with ${exitCode ?? "signal"}${stderr ? `: ${stderr.trim()}` : ""}`);
    this.name = "ProcessError";
  }
}

/**
 * Spawns `command`, feeds it `input` on stdin (if any) and resolves with its
 * stdout once it exits with status 0.
 */
export function runProcess(command: string, args: readonly string[], input?: Buffer): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const child = spawn(command, args, { stdio: ["pipe", "pipe", "pipe"] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let settled = false;

    const fail = (error: Error): void => {
      if (settled) return;
      settled = true;
      reject(error);
    };

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
    child.on("error", fail);
    // A tool that dies early closes stdin under us; report its exit status first.
    let stdinError: Error | undefined;
    child.stdin.on("error", (error) => {
      stdinError = error;
    });

    child.on("close", (code) => {
      if (settled) return;
      if (code !== 0) {
        fail(new ProcessError(command, code, Buffer.concat(stderr).toString("utf8")));
        return;
      }
      if (stdinError) {
        fail(stdinError);
        return;
      }
      settled = true;
      resolve(Buffer.concat(stdout));
    });

    if (input) {
      child.stdin.end(input);
    } else {
      child.stdin.end();
    }
  });
}

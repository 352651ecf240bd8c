import type { Readable } from "node:stream";
import { StringDecoder } from "node:string_decoder";

import { execa } from "execa";

import { EngineLaunchError } from "../core/errors.js";

import type { EngineCommand } from "./engine-command.js";

export type LineHandler = (line: string) => void;

export type EngineExit = {
  exitCode: number;
  timedOut: boolean;
};

export type LaunchOptions = {
  timeoutMs: number;
  onLine: LineHandler;
};

// Starts the engine and streams merged stdout/stderr; resolves when it exits.
export interface EngineLauncher {
  run(command: EngineCommand, options: LaunchOptions): Promise<EngineExit>;
}

export const TIMEOUT_EXIT_CODE = 124;

// Blank lines are kept: they terminate traceback blocks in the log. The decoder
// holds back a multi-byte character split across chunks.
export function pipeLines(stream: Readable, onLine: LineHandler): () => void {
  const decoder = new StringDecoder("utf8");
  let buf = "";
  const onData = (chunk: Buffer | string) => {
    buf += typeof chunk === "string" ? chunk : decoder.write(chunk);
    let idx: number;
    while ((idx = buf.indexOf("\n")) >= 0) {
      const line = buf.slice(0, idx);
      buf = buf.slice(idx + 1);
      onLine(line.replace(/\r$/, ""));
    }
  };
  const onEnd = () => {
    buf += decoder.end();
    if (buf.length > 0) onLine(buf.replace(/\r$/, ""));
    buf = "";
  };

  stream.on("data", onData);
  stream.on("end", onEnd);

  return () => {
    stream.off("data", onData);
    stream.off("end", onEnd);
  };
}

export class ExecaEngineLauncher implements EngineLauncher {
  async run(command: EngineCommand, options: LaunchOptions): Promise<EngineExit> {
    const child = execa(command.command, command.args, {
      all: true,
      buffer: false,
      reject: false,
      timeout: options.timeoutMs > 0 ? options.timeoutMs : undefined,
      env: command.env,
      stdin: "ignore",
    });

    if (child.all) pipeLines(child.all, options.onLine);

    const result = await child;
    if (result.timedOut) {
      return { exitCode: TIMEOUT_EXIT_CODE, timedOut: true };
    }
    if (typeof result.exitCode === "number") {
      return { exitCode: result.exitCode, timedOut: false };
    }
    if (result.signal) {
      // Killed from outside; there is no exit status to report.
      return { exitCode: 1, timedOut: false };
    }
    throw new EngineLaunchError(`Engine could not be started: ${command.command}`);
  }
}

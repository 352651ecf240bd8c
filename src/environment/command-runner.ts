import { execa } from "execa";

export type CommandSpec = {
  command: string;
  args: string[];
};

export type CommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type PipeResult = {
  source: CommandResult;
  sink: CommandResult;
};

// Host commands used for database dumps and filestore copies.
export interface CommandRunner {
  run(spec: CommandSpec): Promise<CommandResult>;
  // `source | sink`
  pipe(source: CommandSpec, sink: CommandSpec): Promise<PipeResult>;
}

export function withPrefix(prefix: string[], command: string, args: string[]): CommandSpec {
  const [head, ...rest] = prefix;
  if (head === undefined) return { command, args };
  return { command: head, args: [...rest, command, ...args] };
}

export function formatCommand(spec: CommandSpec): string {
  return [spec.command, ...spec.args].join(" ");
}

export class ExecaCommandRunner implements CommandRunner {
  async run(spec: CommandSpec): Promise<CommandResult> {
    const result = await execa(spec.command, spec.args, { reject: false });
    return {
      exitCode: result.exitCode ?? 1,
      stdout: result.stdout,
      stderr: result.stderr,
    };
  }

  async pipe(source: CommandSpec, sink: CommandSpec): Promise<PipeResult> {
    // The dump is streamed, never buffered; only its stderr is kept.
    const producer = execa(source.command, source.args, { reject: false, buffer: false });
    const consumer = execa(sink.command, sink.args, { reject: false });

    if (!producer.stdout || !consumer.stdin) {
      producer.kill();
      consumer.kill();
      throw new Error(`cannot pipe ${formatCommand(source)} into ${formatCommand(sink)}`);
    }
    producer.stdout.pipe(consumer.stdin);

    let producerStderr = "";
    producer.stderr?.on("data", (chunk: Buffer | string) => {
      producerStderr += typeof chunk === "string" ? chunk : chunk.toString("utf8");
    });

    const [produced, consumed] = await Promise.all([producer, consumer]);
    return {
      source: { exitCode: produced.exitCode ?? 1, stdout: "", stderr: producerStderr },
      sink: { exitCode: consumed.exitCode ?? 1, stdout: consumed.stdout, stderr: consumed.stderr },
    };
  }
}

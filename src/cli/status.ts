import type { AppContext } from "../app/context.js";
import { bottomLineExitCode, formatBottomLine, readBottomLine } from "../reporting/status.js";

export type StatusCommandOptions = {
  json?: boolean;
  print?: (line: string) => void;
};

// Exit status mirrors the latest session's; 1 when none finished yet.
export async function statusCommand(ctx: AppContext, options: StatusCommandOptions = {}): Promise<number> {
  const print = options.print ?? ((line: string) => console.log(line));
  const line = await readBottomLine(ctx.ports.pointers);

  if (options.json) {
    print(
      JSON.stringify(
        {
          latest: line.latest,
          current: line.current,
          summary_path: line.summaryPath,
          summary: line.summary,
        },
        null,
        2,
      ),
    );
  } else {
    for (const text of formatBottomLine(line)) print(text);
  }

  return bottomLineExitCode(line);
}

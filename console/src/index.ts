import { createInterface } from "readline/promises";
import { loadConfig } from "./config";
import { promptDimension } from "./prompt";
import { GameSession } from "./session";
import type { OutputSink } from "./session";

const output: OutputSink = {
  write: (line) => console.log(line)
};

const main = async (): Promise<void> => {
  const config = loadConfig(process.env);
  if (!config.ok) {
    console.error(config.error);
    process.exitCode = 1;
    return;
  }

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  let closed = false;
  rl.once("close", () => {
    closed = true;
  });

  try {
    output.write("Welcome to Skirmish!");
    const ask = (question: string) => rl.question(question);
    const width = config.value.width ?? (await promptDimension(ask, output, "Enter board width (6-12): "));
    const height = config.value.height ?? (await promptDimension(ask, output, "Enter board height (6-12): "));
    output.write(`Starting match on the (${width} x ${height}) board...`);

    const session = new GameSession({ width, height, output });
    while (!session.finished && !closed) {
      session.renderView();
      const line = await rl.question(session.prompt).catch((error: unknown) => {
        // Input ending mid-question (Ctrl-D, closed pipe) just ends the match.
        if (closed) return null;
        throw error;
      });
      if (line === null) break;
      session.handleLine(line);
      output.write("");
    }
  } finally {
    rl.close();
  }
};

main().catch((error: unknown) => {
  console.error("Skirmish stopped unexpectedly", error);
  process.exit(1);
});

import readline from "node:readline";
import { createServices } from "../app";
import { loadEnv } from "../config/env";
import { createLogger } from "../config/logger";
import { InterviewEngine } from "../interviews/interview.engine";
import { SessionState } from "../shared/types/state.types";

type LineReader = AsyncIterator<string>;

function render(replies: ReadonlyArray<string>): void {
  for (const reply of replies) {
    process.stdout.write(`\nAssistant: ${reply}\n`);
  }
}

async function readLine(reader: LineReader): Promise<string | null> {
  process.stdout.write("\nYou: ");
  const next = await reader.next();
  return next.done ? null : next.value;
}

// Answers can span several lines; an empty line submits them.
async function readParagraph(reader: LineReader): Promise<string | null> {
  process.stdout.write("\nYour answer (finish with an empty line):\n");
  const lines: string[] = [];
  for (;;) {
    const next = await reader.next();
    if (next.done) {
      return lines.length > 0 ? lines.join("\n") : null;
    }
    if (!next.value.trim()) {
      return lines.join("\n");
    }
    lines.push(next.value);
  }
}

export async function runChat(
  engine: InterviewEngine,
  input: NodeJS.ReadableStream = process.stdin,
): Promise<SessionState> {
  const rl = readline.createInterface({ input, terminal: false });
  const reader = rl[Symbol.asyncIterator]();
  try {
    const opening = engine.start();
    render(opening.replies);
    let state = opening.state;

    while (state.phase !== "completed") {
      const text = state.phase === "interviewing" ? await readParagraph(reader) : await readLine(reader);
      if (text === null) {
        break;
      }
      const turn = await engine.handleMessage(state, text);
      render(turn.replies);
      state = turn.state;
    }
    return state;
  } finally {
    rl.close();
  }
}

async function main(): Promise<void> {
  const env = loadEnv();
  const logger = createLogger({ minLevel: env.logLevel === "debug" ? "debug" : "warn", destination: "stderr" });
  const { interviewEngine } = createServices(env, logger);
  process.stdout.write("Hiring Assistant\n");
  await runChat(interviewEngine);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    process.stderr.write(`Chat failed: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
}

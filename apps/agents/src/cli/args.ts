import type { DesignEdit } from "../stages";

const USAGE =
  "Usage: npm run -w @adforge/agents pipeline -- --run-id=<uuid> [--fresh] [--retry-failed] [--edit=<variant>:<instructions>]...";

const EDIT_PATTERN = /^(\d+):([\s\S]*\S[\s\S]*)$/;

function parseEdit(value: string | undefined): DesignEdit {
  const match = value ? EDIT_PATTERN.exec(value) : null;
  if (!match?.[1] || !match[2]) {
    throw new Error(`Invalid --edit value: ${value ?? "(missing)"}\n${USAGE}`);
  }
  return { variant: Number(match[1]), instructions: match[2].trim() };
}

export function parseArgs(argv: string[]) {
  let runId: string | undefined;
  const edits: DesignEdit[] = [];
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg?.startsWith("--run-id=")) {
      runId = arg.slice("--run-id=".length);
    } else if (arg === "--run-id") {
      runId = argv[index + 1];
      index += 1;
    } else if (arg?.startsWith("--edit=")) {
      edits.push(parseEdit(arg.slice("--edit=".length)));
    } else if (arg === "--edit") {
      edits.push(parseEdit(argv[index + 1]));
      index += 1;
    }
  }

  if (!runId) {
    throw new Error(USAGE);
  }
  return {
    runId,
    fresh: argv.includes("--fresh"),
    retryFailedVariants: argv.includes("--retry-failed"),
    edits,
  };
}

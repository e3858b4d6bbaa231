export type Command = "ingest" | "ask";

export function parseCli(argv: string[]): { command: Command; args: string[] } {
  const [, , command, ...rest] = argv;
  if (command !== "ingest" && command !== "ask") {
    throw new Error("Usage: citeseek <ingest|ask> [...]");
  }
  return { command, args: rest };
}

const ASK_USAGE = "Usage: citeseek ask [--k <n>] <question>";

function parseK(raw: string | undefined): number {
  const k = Number(raw);
  if (raw == null || !Number.isInteger(k) || k < 1) {
    throw new Error(`${ASK_USAGE}\n--k expects a positive integer`);
  }
  return k;
}

export function parseAskArgs(args: string[], defaultK: number): { question: string; k: number } {
  let k = defaultK;
  const words: string[] = [];

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i] ?? "";
    if (arg === "--k") {
      k = parseK(args[i + 1]);
      i += 1;
    } else if (arg.startsWith("--k=")) {
      k = parseK(arg.slice("--k=".length));
    } else {
      words.push(arg);
    }
  }

  const question = words.join(" ").trim();
  if (!question) {
    throw new Error(ASK_USAGE);
  }
  return { question, k };
}

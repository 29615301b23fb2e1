export type CliOptions = {
  demo: boolean;
  help: boolean;
  seed?: string;
};

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const USAGE = [
  "Usage: fifteen [--demo] [--seed <text>] [--help]",
  "",
  "  --demo         start from a fixed layout four moves from solved",
  "  --seed <text>  seed the first shuffle so a game can be replayed",
  "  --help         show this message",
  "",
  "Arrows or WASD slide tiles. R restarts, Q quits.",
].join("\n");

export const parseCliArgs = (argv: readonly string[]): CliOptions => {
  const options: CliOptions = { demo: false, help: false };
  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (token === "--demo") {
      options.demo = true;
      continue;
    }
    if (token === "--help" || token === "-h") {
      options.help = true;
      continue;
    }
    let seed: string | undefined;
    if (token.startsWith("--seed=")) {
      seed = token.slice("--seed=".length);
    } else if (token === "--seed") {
      seed = argv[i + 1];
      i++;
    } else {
      throw new UsageError(`Unknown option: ${token}`);
    }
    if (seed === undefined || seed.startsWith("--") || seed.trim().length === 0) {
      throw new UsageError("--seed needs a value.");
    }
    options.seed = seed.trim();
  }
  return options;
};

/** Last stop for anything thrown out of the render loop; prints the whole error, stack included. */
export const reportFatal = (error: unknown) => {
  console.error(error);
  process.exitCode = 1;
};

import { listGradeEntries } from "../shared/magnet-grades";
import { createLineSource } from "../modules/magnet/line-source";
import { formatGradeLine, runMagnetShell, SHELL_TEXT } from "../modules/magnet/shell";

export type MagnetPullArgs = {
  help: boolean;
  grades: boolean;
  unknown: string[];
};

export const USAGE =
  "Usage: magnet-pull [--grades] [--help]\n" +
  "  (no flags)    interactive pull-force estimate on stdin/stdout\n" +
  "  -g, --grades  print the grade table and exit\n" +
  "  -h, --help    show this message";

export function parseMagnetPullArgs(argv: string[]): MagnetPullArgs {
  const parsed: MagnetPullArgs = { help: false, grades: false, unknown: [] };
  for (const token of argv) {
    if (token === "--help" || token === "-h") {
      parsed.help = true;
    } else if (token === "--grades" || token === "-g") {
      parsed.grades = true;
    } else {
      parsed.unknown.push(token);
    }
  }
  return parsed;
}

export type MagnetPullIo = {
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  log: (line: string) => void;
  error: (line: string) => void;
};

/**
 * Returns the process exit code.
 */
export async function runMagnetPullCli(argv: string[], io: MagnetPullIo): Promise<number> {
  const args = parseMagnetPullArgs(argv);

  if (args.unknown.length > 0) {
    io.error(`Unknown argument: ${args.unknown[0]}`);
    io.error(USAGE);
    return 1;
  }
  if (args.help) {
    io.log(USAGE);
    return 0;
  }
  if (args.grades) {
    io.log(SHELL_TEXT.gradesHeader);
    for (const entry of listGradeEntries()) {
      io.log(formatGradeLine(entry.grade, entry.br_T));
    }
    return 0;
  }

  const lines = createLineSource(io.stdin, io.stdout);
  try {
    await runMagnetShell({ lines, print: io.log });
  } finally {
    lines.close();
  }
  return 0;
}

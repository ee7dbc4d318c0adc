/**
 * Console output for commands
 */

/**
 * Where commands write. `result` is the command's answer and always
 * shows; `info` is hidden by --quiet; `detail` shows only with
 * --verbose.
 */
export type Reporter = {
  readonly result: (line: string) => void;
  readonly info: (line: string) => void;
  readonly detail: (line: string) => void;
  readonly error: (line: string) => void;
};

export const createConsoleReporter = (options: {
  readonly verbose: boolean;
  readonly quiet: boolean;
}): Reporter => ({
  result: (line) => console.log(line),
  info: (line) => {
    if (!options.quiet) {
      console.log(line);
    }
  },
  detail: (line) => {
    if (options.verbose && !options.quiet) {
      console.log(line);
    }
  },
  error: (line) => console.error(line),
});

export type RecordedLine = {
  readonly stream: keyof Reporter;
  readonly line: string;
};

/**
 * Reporter that keeps every line, for tests
 */
export const createMemoryReporter = (): Reporter & {
  readonly lines: RecordedLine[];
  readonly text: (stream: keyof Reporter) => string;
} => {
  const lines: RecordedLine[] = [];
  const record =
    (stream: keyof Reporter) =>
    (line: string): void => {
      lines.push({ stream, line });
    };
  return {
    result: record("result"),
    info: record("info"),
    detail: record("detail"),
    error: record("error"),
    lines,
    text: (stream) =>
      lines
        .filter((entry) => entry.stream === stream)
        .map((entry) => entry.line)
        .join("\n"),
  };
};

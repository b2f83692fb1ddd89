/**
 * CLI testing utilities: run a command-line entry point in process with buffered streams
 */

/**
 * Result of a CLI command execution
 */
export interface CliResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Streams and environment handed to an in-process entry point
 */
export interface BufferedIo {
  stdout(text: string): void;
  stderr(text: string): void;
  readStdin(): Promise<string>;
  stdinIsTTY: boolean;
  env: NodeJS.ProcessEnv;
}

export interface CliExecOptions {
  /** Environment variables (default: empty) */
  env?: Record<string, string>;
  /** Input to pass to stdin; without it stdin behaves like a terminal */
  input?: string;
}

/**
 * Entry point signature: arguments after the program name in, exit code out
 */
export type CliMain = (argv: string[], io: BufferedIo) => Promise<number>;

/**
 * Execute a CLI entry point and capture its output
 */
export async function runCli(main: CliMain, args: string[], options: CliExecOptions = {}): Promise<CliResult> {
  let stdout = "";
  let stderr = "";
  const io: BufferedIo = {
    stdout: (text) => {
      stdout += text;
    },
    stderr: (text) => {
      stderr += text;
    },
    readStdin: async () => options.input ?? "",
    stdinIsTTY: options.input === undefined,
    env: { ...options.env },
  };

  const exitCode = await main(args, io);
  return { stdout, stderr, exitCode };
}

/**
 * Parse JSON output from CLI
 */
export function parseJsonOutput(stdout: string): unknown {
  return JSON.parse(stdout.trim());
}

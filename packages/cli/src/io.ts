/** Line-oriented output of the CLI, injected so tests can capture it. */
export interface CliIO {
  stdout(line: string): void;
  stderr(line: string): void;
}

export const consoleIO: CliIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line)
};

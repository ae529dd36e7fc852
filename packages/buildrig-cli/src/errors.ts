/**
 * An external command (the SDK tool or the notarizer) is missing or exited
 * with a non-zero status.
 */
export class ExternalToolError extends Error {
  public readonly command: string;
  public readonly exitCode: number | undefined;
  /** Last output lines of the command, for diagnostics */
  public readonly output: string[];

  constructor(command: string, message: string, options: { exitCode?: number; output?: string[] } = {}) {
    super(message);
    this.name = 'ExternalToolError';
    this.command = command;
    this.exitCode = options.exitCode;
    this.output = options.output ?? [];
  }
}

export class CliError extends Error {
  constructor(public exitCode: number, message: string) {
    super(message);
    this.name = "CliError";
  }
}

/** Bad command-line usage; exits 2 like most argument parsers. */
export class UsageError extends CliError {
  constructor(message: string) {
    super(2, message);
    this.name = "UsageError";
  }
}

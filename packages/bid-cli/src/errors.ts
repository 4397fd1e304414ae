export class CliUsageError extends Error {
  readonly code = 'USAGE_ERROR';

  constructor(message: string) {
    super(message);
  }
}

export class CliInputError extends Error {
  readonly code = 'INVALID_INPUT';

  constructor(message: string) {
    super(message);
  }
}

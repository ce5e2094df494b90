export const INVALID_INPUT_MESSAGE = 'Invalid input. Please check your response and try again.';

export interface ProblemIssue {
  path: (string | number)[];
  message: string;
  code: string;
}

export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly title: string,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed name or phone number. The message is fixed on purpose. */
export class InvalidInputError extends HttpError {
  constructor() {
    super(400, 'Bad Request', INVALID_INPUT_MESSAGE);
  }
}

export class ConflictError extends HttpError {
  constructor(message: string) {
    super(400, 'Bad Request', message);
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(404, 'Not Found', message);
  }
}

export class UnprocessableEntityError extends HttpError {
  constructor(
    message: string,
    readonly issues: ProblemIssue[],
  ) {
    super(422, 'Unprocessable Entity', message);
  }
}

import type { Request, Response, NextFunction } from 'express';
import { HttpError, ProblemIssue, UnprocessableEntityError } from '../http/errors';

interface Problem {
  type: string;
  title: string;
  status: number;
  detail: string;
  instance?: string;
  errors?: ProblemIssue[];
}

function sendProblem(res: Response, problem: Omit<Problem, 'type' | 'instance'>) {
  const body: Problem = { type: 'about:blank', ...problem };
  const requestId = res.getHeader('x-request-id');
  if (typeof requestId === 'string') body.instance = requestId;
  res.status(problem.status).type('application/problem+json').json(body);
}

// body-parser raises a SyntaxError carrying status 400 for unparsable JSON
function isMalformedBody(err: unknown): boolean {
  return err instanceof SyntaxError && 'status' in err && err.status === 400;
}

// http-errors raised by body-parser (413 too large, 415 charset or encoding)
// mark client errors with `expose: true`
function exposedClientError(err: unknown): { status: number; message: string } | null {
  if (!(err instanceof Error) || !('expose' in err) || err.expose !== true) return null;
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  if (typeof status !== 'number' || status < 400 || status > 499) return null;
  return { status, message: err.message };
}

export function notFoundProblemJson() {
  return (_req: Request, res: Response) => {
    sendProblem(res, { title: 'Not Found', status: 404, detail: 'Route not found' });
  };
}

/**
 * Renders every error as RFC 7807 problem+json. Only unexpected failures are
 * logged; expected 4xx outcomes already show up in the request log line.
 */
export function errorProblemJson() {
  return (err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (err instanceof HttpError) {
      sendProblem(res, {
        title: err.title,
        status: err.status,
        detail: err.message,
        ...(err instanceof UnprocessableEntityError ? { errors: err.issues } : {}),
      });
      return;
    }

    if (isMalformedBody(err)) {
      sendProblem(res, { title: 'Bad Request', status: 400, detail: 'Malformed JSON body' });
      return;
    }

    const clientError = exposedClientError(err);
    if (clientError) {
      sendProblem(res, { title: 'Request Error', status: clientError.status, detail: clientError.message });
      return;
    }

    req.log.error({ err, path: req.originalUrl }, 'request error');
    sendProblem(res, {
      title: 'Internal Server Error',
      status: 500,
      detail: 'Unexpected error',
    });
  };
}

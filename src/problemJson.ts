import type { ErrorRequestHandler, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';
import { PassphraseError } from './errors';
import { errorMessage, logWithTrace } from './logger';

export interface ProblemDetails {
  type: string;
  title: string;
  status: number;
  detail: string;
  code?: string;
  issues?: { path: string; message: string }[];
}

// Only error responses use application/problem+json; 2xx bodies stay plain JSON.
export function sendProblem(res: Response, problem: ProblemDetails): void {
  res.status(problem.status);
  res.type('application/problem+json');
  res.json(problem);
}

export const notFoundHandler = (): RequestHandler => {
  return (req, res) => {
    sendProblem(res, {
      type: 'about:blank',
      title: 'Not Found',
      status: 404,
      detail: `Route ${req.method} ${req.path} not found`,
    });
  };
};

export const errorHandler = (): ErrorRequestHandler => {
  return (err: unknown, req, res, _next) => {
    if (err instanceof PassphraseError) {
      logWithTrace('warn', 'Passphrase request rejected', { path: req.path, code: err.code, error: err.message });
      sendProblem(res, {
        type: 'about:blank',
        title: err.title,
        status: err.status,
        detail: err.message,
        code: err.code,
      });
      return;
    }

    if (err instanceof ZodError) {
      sendProblem(res, {
        type: 'about:blank',
        title: 'Bad Request',
        status: 400,
        detail: 'Request body failed validation',
        code: 'INVALID_REQUEST',
        issues: err.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      });
      return;
    }

    // express.json() marks malformed bodies with a 4xx status
    if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
      sendProblem(res, {
        type: 'about:blank',
        title: 'Bad Request',
        status: 400,
        detail: 'Malformed JSON body',
        code: 'INVALID_REQUEST',
      });
      return;
    }

    logWithTrace('error', 'Unhandled error', {
      path: req.path,
      error: errorMessage(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    sendProblem(res, {
      type: 'about:blank',
      title: 'Internal Server Error',
      status: 500,
      detail: 'Unexpected error',
    });
  };
};

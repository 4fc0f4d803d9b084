import type { NextFunction, Request, RequestHandler, Response } from 'express';
import morgan from 'morgan';
import { isEngineError } from '@core/errors';
import type { CaseStore } from '@core/store';
import type { EngineOptions } from '@core/orchestrator';
import type { Actor, EngineContext } from '@core/types';
import type { ApiResponse } from '@shared/types';

export const requestLogger = morgan('dev');

export const ACTOR_HEADER = 'x-person-id';

export interface AppServices {
  store: CaseStore;
  engineOptions: EngineOptions;
  processRetryLimit: number;
}

export function services(req: Request): AppServices {
  return req.app.locals.services;
}

/** Lets async handlers hand their errors to the error handler. */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>,
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

/**
 * Resolves the caller named by the `x-person-id` header. This stands in for
 * a real identity provider.
 */
export const resolveActor = asyncHandler(async (req, res, next) => {
  const personId = req.header(ACTOR_HEADER);
  if (!personId) {
    return res
      .status(401)
      .json({ success: false, error: `${ACTOR_HEADER} header is required` });
  }
  const person = await services(req).store.getPerson(personId);
  if (!person) {
    return res.status(401).json({ success: false, error: 'Unknown caller' });
  }
  const actor: Actor = { personId: person.id, role: person.role };
  res.locals.actor = actor;
  next();
});

export function contextOf(res: Response): EngineContext {
  const actor: Actor | undefined = res.locals.actor;
  if (!actor) throw new Error('resolveActor middleware did not run');
  return { actor, now: new Date() };
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction) {
  if (isEngineError(err)) {
    if (err.status >= 500) console.error('[ERROR]', err.code, err.message);
    return res
      .status(err.status)
      .json({ success: false, error: err.message, code: err.code } satisfies ApiResponse);
  }
  if (err instanceof SyntaxError && 'body' in err) {
    return res
      .status(400)
      .json({ success: false, error: 'Malformed JSON body' } satisfies ApiResponse);
  }
  console.error('[ERROR]', err.message);
  res.status(500).json({ success: false, error: err.message } satisfies ApiResponse);
}

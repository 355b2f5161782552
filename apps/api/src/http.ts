import type { Response } from 'express';
import { z } from 'zod';
import { HttpError } from './errors.js';

export function sendError(res: Response, err: unknown, fallbackCode = 'INTERNAL_ERROR') {
  if (err instanceof HttpError) {
    return res.status(err.status).json({
      error: err.code,
      message: err.message,
      ...(err.details !== undefined ? { details: err.details } : {})
    });
  }

  const message = err instanceof Error ? err.message : 'Unknown error';
  return res.status(500).json({ error: fallbackCode, message });
}

function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim().length === 0 ? undefined : value;
}

// Query strings arrive as text; an empty value counts as missing rather than 0.
export function queryNumber<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(blankToUndefined, schema);
}

export const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD')
  .refine((v) => {
    const d = new Date(`${v}T00:00:00Z`);
    return !Number.isNaN(d.getTime()) && d.toISOString().startsWith(v);
  }, 'Invalid calendar date');

import { NextResponse } from 'next/server';
import type { ZodError } from 'zod';

export type ErrorBody = {
  error: {
    code: string;
    message: string;
    field?: string;
  };
};

export function jsonError(status: number, code: string, message: string, field?: string) {
  const body: ErrorBody = { error: field ? { code, message, field } : { code, message } };
  return NextResponse.json(body, { status });
}

/** 400 naming the first failing field. */
export function validationError(error: ZodError) {
  const issue = error.issues[0];
  if (!issue) return jsonError(400, 'INVALID_INPUT', 'Invalid request');
  const field = issue.path.length > 0 ? issue.path.join('.') : undefined;
  return jsonError(400, 'INVALID_INPUT', issue.message, field);
}

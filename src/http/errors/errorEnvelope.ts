// src/http/errors/errorEnvelope.ts

/**
 * Standard error envelope
 *
 * Every error response uses this structure so clients can branch on `code`
 * and report `issues` (all schema violations at once) to their users.
 */

export type ErrorEnvelope = {
  error: {
    code: string;
    message: string;
    correlationId?: string;
    issues?: string[];
  };
};

export function buildErrorEnvelope(params: {
  code: string;
  message: string;
  correlationId?: string;
  issues?: string[];
}): ErrorEnvelope {
  return {
    error: {
      code: params.code,
      message: params.message,
      ...(params.correlationId ? { correlationId: params.correlationId } : {}),
      ...(params.issues ? { issues: params.issues } : {}),
    },
  };
}

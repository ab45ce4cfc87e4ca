/**
 * Error Taxonomy
 *
 * Every failure raised by the graph store carries one of these codes.
 */

import { z } from 'zod';

export const GraphErrorCode = z.enum([
  'DuplicateName',
  'DuplicateKey',
  'DuplicateTraitAssignment',
  'DuplicateValue',
  'UnknownType',
  'UnknownAttributeKey',
  'InvalidBaseType',
  'InvalidTraitType',
  'TypeMismatch',
  'ConstraintViolation',
  'EndpointTypeMismatch',
  'EntityNotFound',
  'RelationNotFound',
  'NotFound',
  'StoreUnavailable',
]);
export type GraphErrorCode = z.infer<typeof GraphErrorCode>;

// ─── Error Class ─────────────────────────────────────────────────────────────

export class GraphError extends Error {
  constructor(
    public readonly code: GraphErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GraphError';
  }
}

export function isGraphError(error: unknown, code?: GraphErrorCode): error is GraphError {
  return error instanceof GraphError && (code === undefined || error.code === code);
}

// ─── Error Sanitization ──────────────────────────────────────────────────────

/**
 * Sanitize error messages to remove sensitive data.
 * Redacts emails, tokens, and home directories.
 */
export function sanitizeError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);

  return (
    message
      // Redact email addresses
      .replace(/[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, '[email]')
      // Redact bearer tokens
      .replace(/Bearer\s+[A-Za-z0-9-._~+/]+=*/g, 'Bearer [token]')
      // Redact API keys
      .replace(/api[_-]?key[=:]\s*["']?[A-Za-z0-9-_]+["']?/gi, 'api_key=[redacted]')
      // Redact absolute paths
      .replace(/\/Users\/[^/\s]+/g, '/Users/[user]')
      .replace(/\/home\/[^/\s]+/g, '/home/[user]')
  );
}

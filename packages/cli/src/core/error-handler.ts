/**
 * Error Handler - User-friendly error messages, no secret leakage
 */

import { handleError as logHandledError } from '@tradesim/utils';

/**
 * Credential-shaped fragments: `<name>=<value>`, `<name>: <value>` and bearer
 * tokens. Only the value is replaced, the rest of the message is kept.
 */
const SECRET_ASSIGNMENT = /\b([\w-]*(?:api[_-]?key|token|secret|password|private[_-]?key))(\s*[=:]\s*)(\S+)/gi;
const BEARER_TOKEN = /\b(bearer)\s+\S+/gi;

export const REDACTED = '[REDACTED]';

export function redactSecrets(message: string): string {
  return message
    .replace(BEARER_TOKEN, `$1 ${REDACTED}`)
    .replace(SECRET_ASSIGNMENT, `$1$2${REDACTED}`);
}

/**
 * Format error for user display
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return redactSecrets(error.message);
  }

  if (typeof error === 'string') {
    return redactSecrets(error);
  }

  return 'An unexpected error occurred';
}

/**
 * Log the error with its context, then return the message for the terminal
 */
export function handleError(error: unknown, context?: Record<string, unknown>): string {
  const sanitizedContext = context
    ? Object.fromEntries(
        Object.entries(context).map(([key, value]) => [
          key,
          typeof value === 'string' ? redactSecrets(value) : value,
        ])
      )
    : undefined;

  logHandledError(error, sanitizedContext);
  return formatError(error);
}

/**
 * Print the error and end the process with exit code 1
 */
export function die(error: unknown): never {
  console.error(`Error: ${handleError(error)}`);
  process.exit(1);
}

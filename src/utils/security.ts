/**
 * Input validation and log masking for user-supplied questions
 */

import { ValidationError } from '../core/errors';

export const MAX_QUERY_LENGTH = 4000;

const SENSITIVE_PATTERNS = {
  // key=value style secrets
  apiKey: /(?:api[_-]?key|apikey|access[_-]?token|secret[_-]?key)\s*[:=]\s*['"]?([a-zA-Z0-9_\-]{12,})['"]?/gi,
  bearer: /\bBearer\s+([A-Za-z0-9\-._~+/]{12,}=*)/g,
  openaiKey: /\bsk-[A-Za-z0-9_\-]{12,}\b/g,
  email: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
  jwt: /eyJ[A-Za-z0-9-_=]+\.eyJ[A-Za-z0-9-_=]+\.?[A-Za-z0-9-_.+/=]*/g,
};

/**
 * Mask secrets and e-mail addresses before text reaches the logs
 */
export function maskSensitiveData(text: string, maskChar: string = '*'): string {
  if (!text) {
    return text;
  }

  let sanitized = text;

  sanitized = sanitized.replace(SENSITIVE_PATTERNS.apiKey, (match: string, key: string) =>
    match.replace(key, maskChar.repeat(key.length))
  );

  sanitized = sanitized.replace(SENSITIVE_PATTERNS.bearer, (match: string, token: string) =>
    match.replace(token, maskChar.repeat(8))
  );

  sanitized = sanitized.replace(SENSITIVE_PATTERNS.openaiKey, () => `sk-${maskChar.repeat(8)}`);

  sanitized = sanitized.replace(SENSITIVE_PATTERNS.jwt, () => `JWT_${maskChar.repeat(20)}`);

  // Keep the domain visible
  sanitized = sanitized.replace(SENSITIVE_PATTERNS.email, (match: string) => {
    const [local, domain] = match.split('@');
    return `${maskChar.repeat(Math.min(local.length, 3))}***@${domain}`;
  });

  return sanitized;
}

/**
 * Validate and normalise a question before it enters a run
 * @throws ValidationError when the input is not a usable question
 */
export function validateInput(input: unknown): string {
  if (typeof input !== 'string') {
    throw new ValidationError('Query must be a string');
  }

  // Null bytes and control characters other than tab and newline
  const sanitized = input.replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g, '').trim();

  if (!sanitized) {
    throw new ValidationError('Query must not be empty');
  }
  if (sanitized.length > MAX_QUERY_LENGTH) {
    throw new ValidationError(`Query exceeds ${MAX_QUERY_LENGTH} characters`, {
      length: sanitized.length,
    });
  }

  return sanitized;
}

/**
 * Validate session ID format
 * @param sessionId - Session ID to validate
 * @returns true if valid
 */
export function isValidSessionId(sessionId: unknown): sessionId is string {
  if (!sessionId || typeof sessionId !== 'string') {
    return false;
  }

  // Alphanumeric with hyphens/underscores, 8 to 128 characters
  return /^[a-zA-Z0-9_\-]{8,128}$/.test(sessionId);
}

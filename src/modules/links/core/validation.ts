/**
 * Input validation for codes and target URLs.
 */

import { err, ok, type Result } from 'neverthrow';

import { createInvalidInputError, type InvalidInputError } from './errors.js';
import {
  ALLOWED_TARGET_PROTOCOLS,
  MAX_CODE_LENGTH,
  MAX_TARGET_URL_LENGTH,
  isValidCode,
} from './types.js';

/**
 * Validates a short code.
 */
export const validateCode = (code: string): Result<string, InvalidInputError> => {
  if (!isValidCode(code)) {
    return err(
      createInvalidInputError(
        'code',
        `Code must be 1-${String(MAX_CODE_LENGTH)} characters of letters, digits, '_' or '-'`
      )
    );
  }
  return ok(code);
};

/**
 * Validates that a target URL is an absolute http(s) URL within length limits.
 * Returns the URL unchanged; it is stored exactly as given.
 */
export const validateTargetUrl = (url: string): Result<string, InvalidInputError> => {
  if (url.length === 0) {
    return err(createInvalidInputError('targetUrl', 'Target URL is required'));
  }

  if (url.length > MAX_TARGET_URL_LENGTH) {
    return err(
      createInvalidInputError(
        'targetUrl',
        `Target URL exceeds maximum length of ${String(MAX_TARGET_URL_LENGTH)} characters`
      )
    );
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return err(createInvalidInputError('targetUrl', 'Target URL must be an absolute URL'));
  }

  if (!ALLOWED_TARGET_PROTOCOLS.includes(parsed.protocol)) {
    return err(createInvalidInputError('targetUrl', 'Target URL must use http or https'));
  }

  if (parsed.hostname === '') {
    return err(createInvalidInputError('targetUrl', 'Target URL must include a host'));
  }

  return ok(url);
};

/**
 * Normalizes an optional owner reference: blank strings become null.
 */
export const normalizeOwner = (owner: string | null | undefined): string | null => {
  if (owner === undefined || owner === null) return null;
  const trimmed = owner.trim();
  return trimmed === '' ? null : trimmed;
};

// Users config validation
//
// The users file is fetched from a remote URL every polling turn, so it is
// validated field by field before anything is built from it.

import JSON5 from 'json5';
import type { UsersConfigFile } from '../types/notify.js';

/**
 * Result of validating a users file
 */
export type UsersConfigValidationResult = {
  valid: boolean;
  errors: UsersConfigValidationIssue<UsersConfigErrorCode>[];
  warnings: UsersConfigValidationIssue<UsersConfigWarningCode>[];
};

/**
 * A single problem, located by a dotted path into the document
 */
export type UsersConfigValidationIssue<TCode extends string> = {
  path: string;
  message: string;
  code: TCode;
};

/**
 * Validation error codes (the file cannot be used)
 */
export type UsersConfigErrorCode =
  | 'INVALID_JSON'
  | 'INVALID_TYPE'
  | 'MISSING_FIELD'
  | 'INVALID_VALUE';

/**
 * Validation warning codes (the file is usable but probably not what was meant)
 */
export type UsersConfigWarningCode = 'UNKNOWN_FIELD' | 'EMPTY_ENGINE_LIST' | 'DUPLICATE_ENGINE';

const KNOWN_TOP_LEVEL_FIELDS = new Set(['users']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a parsed users document.
 *
 * @param config - Parsed JSON of unknown shape
 */
export function validateUsersConfig(config: unknown): UsersConfigValidationResult {
  const errors: UsersConfigValidationResult['errors'] = [];
  const warnings: UsersConfigValidationResult['warnings'] = [];

  if (!isRecord(config)) {
    errors.push({
      path: 'config',
      message: 'Users config must be an object',
      code: 'INVALID_TYPE',
    });
    return { valid: false, errors, warnings };
  }

  for (const key of Object.keys(config)) {
    if (!KNOWN_TOP_LEVEL_FIELDS.has(key)) {
      warnings.push({
        path: `config.${key}`,
        message: `Unknown field "${key}" is ignored`,
        code: 'UNKNOWN_FIELD',
      });
    }
  }

  const users = config.users;
  if (users === undefined) {
    errors.push({
      path: 'config.users',
      message: 'Users config must have a users object',
      code: 'MISSING_FIELD',
    });
    return { valid: false, errors, warnings };
  }

  if (!isRecord(users)) {
    errors.push({
      path: 'config.users',
      message: 'users must map user ids to lists of engine names',
      code: 'INVALID_TYPE',
    });
    return { valid: false, errors, warnings };
  }

  for (const [userId, engines] of Object.entries(users)) {
    const path = `config.users.${userId}`;

    if (userId.trim() === '') {
      errors.push({ path, message: 'User id cannot be empty', code: 'INVALID_VALUE' });
    }

    if (!Array.isArray(engines)) {
      errors.push({ path, message: 'Engine list must be an array', code: 'INVALID_TYPE' });
      continue;
    }

    if (engines.length === 0) {
      warnings.push({
        path,
        message: `User "${userId}" follows no engines`,
        code: 'EMPTY_ENGINE_LIST',
      });
    }

    const seen = new Set<string>();
    engines.forEach((engine: unknown, index: number) => {
      const enginePath = `${path}[${index}]`;
      if (typeof engine !== 'string') {
        errors.push({
          path: enginePath,
          message: 'Engine name must be a string',
          code: 'INVALID_TYPE',
        });
        return;
      }
      if (engine.trim() === '') {
        errors.push({
          path: enginePath,
          message: 'Engine name cannot be empty',
          code: 'INVALID_VALUE',
        });
        return;
      }
      if (seen.has(engine)) {
        warnings.push({
          path: enginePath,
          message: `Engine "${engine}" is listed twice`,
          code: 'DUPLICATE_ENGINE',
        });
      }
      seen.add(engine);
    });
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Type guard form of validateUsersConfig
 */
export function isUsersConfigFile(config: unknown): config is UsersConfigFile {
  return validateUsersConfig(config).valid;
}

/**
 * Parse users-file text and validate it.
 * The file is JSON5, so comments, unquoted keys and trailing commas are
 * accepted. Syntax errors are reported as an INVALID_JSON error rather than thrown.
 */
export function parseUsersConfig(
  text: string
): { config: UsersConfigFile; result: UsersConfigValidationResult } | { config: null; result: UsersConfigValidationResult } {
  let parsed: unknown;
  try {
    parsed = JSON5.parse(text);
  } catch (error) {
    return {
      config: null,
      result: {
        valid: false,
        errors: [
          {
            path: 'config',
            message: `Users config is not valid JSON5: ${error instanceof Error ? error.message : 'Unknown error'}`,
            code: 'INVALID_JSON',
          },
        ],
        warnings: [],
      },
    };
  }

  const result = validateUsersConfig(parsed);
  if (!result.valid || !isUsersConfigFile(parsed)) {
    return { config: null, result };
  }

  return { config: parsed, result };
}

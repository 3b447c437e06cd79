/**
 * Update Errors
 * Typed error taxonomy shared by every update component
 */

import axios from 'axios';

/**
 * Error codes
 */
export enum UpdateErrorCode {
  NOT_FOUND = 'NOT_FOUND',
  TIMEOUT = 'TIMEOUT',
  IO_FAILURE = 'IO_FAILURE',
  APPLY_FAILURE = 'APPLY_FAILURE',
  CONFIG_INCONSISTENCY = 'CONFIG_INCONSISTENCY',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  BUSY = 'BUSY',
  UNKNOWN = 'UNKNOWN',
}

/**
 * Serializable form of an update error
 */
export interface UpdateErrorInfo {
  code: UpdateErrorCode;
  message: string;
}

export class UpdateError extends Error {
  public readonly code: UpdateErrorCode;
  public readonly cause?: unknown;

  constructor(code: UpdateErrorCode, message: string, cause?: unknown) {
    super(message);
    this.code = code;
    this.cause = cause;
    this.name = 'UpdateError';
  }

  toJSON(): UpdateErrorInfo {
    return { code: this.code, message: this.message };
  }
}

const PERMISSION_CODES = new Set(['EACCES', 'EPERM', 'EROFS']);
const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ECONNABORTED', 'ESOCKETTIMEDOUT']);

function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Message of any thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Classify a thrown value into the update error taxonomy
 * @param fallback Code used when nothing more specific can be derived
 */
export function toUpdateError(error: unknown, fallback: UpdateErrorCode = UpdateErrorCode.UNKNOWN): UpdateError {
  if (error instanceof UpdateError) {
    return error;
  }

  const message = describeError(error);

  if (axios.isAxiosError(error)) {
    if (error.code && TIMEOUT_CODES.has(error.code)) {
      return new UpdateError(UpdateErrorCode.TIMEOUT, message, error);
    }
    if (error.response?.status === 404) {
      return new UpdateError(UpdateErrorCode.NOT_FOUND, message, error);
    }
    return new UpdateError(fallback, message, error);
  }

  const code = errnoCode(error);
  if (code && PERMISSION_CODES.has(code)) {
    return new UpdateError(UpdateErrorCode.PERMISSION_DENIED, message, error);
  }
  if (code && TIMEOUT_CODES.has(code)) {
    return new UpdateError(UpdateErrorCode.TIMEOUT, message, error);
  }
  if (code === 'ENOENT') {
    return new UpdateError(UpdateErrorCode.NOT_FOUND, message, error);
  }

  return new UpdateError(fallback, message, error);
}

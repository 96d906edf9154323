import { isAxiosError } from 'axios';

export type NotificationErrorKind =
  | 'CONFIGURATION'
  | 'INVALID_RECIPIENT'
  | 'SUPPRESSED'
  | 'TRANSPORT'
  | 'TIMEOUT';

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Channel disabled or missing credentials; raised before any network call. */
export class ConfigurationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION', details);
  }
}

export class RecipientError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_RECIPIENT', details);
  }
}

/** Send refused by a local policy such as SMS quiet hours. */
export class SuppressedError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SUPPRESSED', details);
  }
}

export class TransportError extends AppError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly payload?: unknown
  ) {
    super(message, 'TRANSPORT', statusCode === undefined ? undefined : { statusCode });
  }
}

export class TimeoutError extends AppError {
  constructor(message = 'Request timed out', details?: Record<string, unknown>) {
    super(message, 'TIMEOUT', details);
  }
}

const ERROR_KINDS: readonly NotificationErrorKind[] = [
  'CONFIGURATION',
  'INVALID_RECIPIENT',
  'SUPPRESSED',
  'TRANSPORT',
  'TIMEOUT'
];

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export const errorMessage = (err: unknown): string => {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === 'string') return err;
  return String(err);
};

export interface ClassifiedError {
  kind: NotificationErrorKind;
  message: string;
  statusCode?: number;
}

/** Maps anything thrown inside a channel call onto the notification error taxonomy. */
export const classifyError = (err: unknown): ClassifiedError => {
  if (err instanceof TransportError) {
    return { kind: 'TRANSPORT', message: err.message, statusCode: err.statusCode };
  }
  if (err instanceof AppError) {
    const code = err.code;
    const kind = ERROR_KINDS.find((k) => k === code) ?? 'TRANSPORT';
    return { kind, message: err.message };
  }
  if (isAxiosError(err)) {
    if (err.code && TIMEOUT_CODES.has(err.code)) {
      return { kind: 'TIMEOUT', message: 'Request timed out' };
    }
    return { kind: 'TRANSPORT', message: err.message, statusCode: err.response?.status };
  }
  // SMTP socket timeouts from nodemailer carry code ETIMEDOUT
  if (err instanceof Error && 'code' in err && typeof err.code === 'string' && TIMEOUT_CODES.has(err.code)) {
    return { kind: 'TIMEOUT', message: err.message };
  }
  return { kind: 'TRANSPORT', message: errorMessage(err) };
};

import { inspect } from 'node:util';

const INSPECT_OPTIONS = {
  depth: 3,
  breakLength: 120,
} as const;
const UNKNOWN_ERROR_MESSAGE = 'Unknown error';

export class DispatcherError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ArgumentError extends DispatcherError {
  readonly paramName: string;

  constructor(paramName: string, message?: string) {
    super('E_INVALID_ARGUMENT', message ?? `Invalid argument "${paramName}"`);
    this.paramName = paramName;
  }
}

export function isObjectRecord(
  value: unknown
): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function stringifyUnknown(value: unknown): string {
  try {
    const json = JSON.stringify(value);
    if (json !== undefined) {
      return json;
    }
  } catch {
    // Fall through to inspect-based serialization.
  }
  return inspect(value, INSPECT_OPTIONS);
}

function getMessageFromErrorLike(value: unknown): string | undefined {
  if (!isObjectRecord(value)) {
    return undefined;
  }

  return typeof value.message === 'string' ? value.message : undefined;
}

export function getErrorMessage(error: unknown): string {
  if (typeof error === 'string') {
    return error;
  }
  if (error instanceof Error) {
    return error.message;
  }
  if (error === null || error === undefined) {
    return UNKNOWN_ERROR_MESSAGE;
  }
  const errorLikeMessage = getMessageFromErrorLike(error);
  if (errorLikeMessage !== undefined) {
    return errorLikeMessage;
  }
  return stringifyUnknown(error);
}

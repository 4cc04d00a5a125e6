/**
 * Maps anything thrown by a store, the model service or our own code onto the
 * three failure kinds the engagement pipeline reports.
 */

import { BackendError, StoreUnavailableError } from './types';

export type FailureKind = 'StoreUnavailable' | 'BackendError' | 'Unknown';

export interface StoreFailure {
  kind: FailureKind;
  message: string;
  /** Error name or AWS error code, when one is known */
  code?: string;
}

/**
 * Error names and socket codes meaning the store could not be reached at all.
 * A missing table is treated the same way: there is nowhere to write.
 */
const UNAVAILABLE_ERROR_NAMES = [
  'ResourceNotFoundException',
  'ServiceUnavailable',
  'ServiceUnavailableException',
  'InternalServerError',
  'NetworkingError',
  'TimeoutError',
  'RequestTimeout',
  'CredentialsProviderError',
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
];

function readStringProperty(error: object, key: string): string | undefined {
  if (key in error) {
    const value: unknown = Reflect.get(error, key);
    return typeof value === 'string' ? value : undefined;
  }
  return undefined;
}

/**
 * AWS SDK v3 service exceptions carry `$fault` and `$metadata`.
 */
function isServiceException(error: object): boolean {
  return '$fault' in error && '$metadata' in error;
}

export function isStoreUnavailableError(error: unknown): boolean {
  if (error instanceof StoreUnavailableError) {
    return true;
  }
  if (!(error instanceof Error)) {
    return false;
  }

  const code = readStringProperty(error, 'code');
  return UNAVAILABLE_ERROR_NAMES.some(
    (name) => error.name === name || code === name || error.message.includes(name)
  );
}

export function classifyFailure(error: unknown): StoreFailure {
  if (error instanceof Error) {
    const code = readStringProperty(error, 'code') ?? error.name;

    if (error instanceof BackendError) {
      return { kind: 'BackendError', message: error.message, code: error.backendCode ?? code };
    }

    if (isStoreUnavailableError(error)) {
      return { kind: 'StoreUnavailable', message: error.message, code };
    }

    if (isServiceException(error)) {
      return { kind: 'BackendError', message: error.message, code: error.name };
    }

    return { kind: 'Unknown', message: error.message, code };
  }

  return { kind: 'Unknown', message: String(error) };
}

/**
 * One-line description used in API error fields and chat replies.
 */
export function describeFailure(failure: StoreFailure): string {
  return failure.code && !failure.message.includes(failure.code)
    ? `${failure.kind} (${failure.code}): ${failure.message}`
    : `${failure.kind}: ${failure.message}`;
}

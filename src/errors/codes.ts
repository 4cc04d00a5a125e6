/**
 * Error codes for the workshop assistant.
 * These codes identify specific error types and map to user-facing messages.
 */

export const ERROR_CODES = {
  // Activity store errors
  STORE_UNAVAILABLE: 'STORE_UNAVAILABLE',
  STORE_BACKEND_ERROR: 'STORE_BACKEND_ERROR',

  // Model inference errors
  MODEL_BACKEND_ERROR: 'MODEL_BACKEND_ERROR',
  MODEL_EMPTY_RESPONSE: 'MODEL_EMPTY_RESPONSE',

  // Notification errors
  NOTIFICATION_NO_RECIPIENTS: 'NOTIFICATION_NO_RECIPIENTS',

  // Workshop content errors
  CONTENT_INVALID: 'CONTENT_INVALID',

  // General errors
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * User-friendly error messages for each error code.
 */
export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ERROR_CODES.STORE_UNAVAILABLE]:
    'Activity storage is currently unreachable.',
  [ERROR_CODES.STORE_BACKEND_ERROR]:
    'Activity storage rejected the request.',

  [ERROR_CODES.MODEL_BACKEND_ERROR]:
    'The assistant model could not answer right now. Please try again.',
  [ERROR_CODES.MODEL_EMPTY_RESPONSE]:
    'The assistant model returned an empty answer.',

  [ERROR_CODES.NOTIFICATION_NO_RECIPIENTS]:
    'No recipients specified (topic_arn or recipients required)',

  [ERROR_CODES.CONTENT_INVALID]:
    'Workshop content could not be loaded.',

  [ERROR_CODES.VALIDATION_ERROR]:
    'The request is invalid.',
  [ERROR_CODES.NOT_FOUND]:
    'Not found',
};

export function getErrorMessage(code: ErrorCode): string {
  return ERROR_MESSAGES[code];
}

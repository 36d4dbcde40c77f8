/**
 * Safely extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Flatten an error and its cause chain into a loggable object.
 */
export function describeError(error: unknown): { name: string; message: string; cause?: string } {
  if (!(error instanceof Error)) {
    return { name: "NonError", message: String(error) };
  }
  return {
    name: error.name,
    message: error.message,
    ...(error.cause !== undefined ? { cause: getErrorMessage(error.cause) } : {}),
  };
}

export interface SerializedError {
  message: string;
  stack?: string;
  name?: string;
  cause?: SerializedError;
  code?: string;
  details?: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    const serialized: SerializedError = {
      message: error.message,
      name: error.name,
      stack: error.stack,
    };

    if ('code' in error && typeof error.code === 'string') {
      serialized.code = error.code;
    }

    if (error.cause !== undefined && error.cause !== null) {
      serialized.cause = serializeError(error.cause);
    }

    if ('details' in error && isRecord(error.details)) {
      serialized.details = error.details;
    }

    return serialized;
  }

  if (typeof error === 'string') {
    return { message: error };
  }

  if (isRecord(error)) {
    const message = error.message ?? error.error;
    return {
      message: typeof message === 'string' ? message : JSON.stringify(error),
      name: typeof error.name === 'string' ? error.name : undefined,
      code: typeof error.code === 'string' ? error.code : undefined,
    };
  }

  return { message: String(error) };
}

export interface SerializedError {
  message: string;
  stack?: string;
  name?: string;
  cause?: SerializedError;
  code?: string;
  details?: Record<string, unknown>;
}

function readString(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : undefined;
}

function readRecord(source: object, key: string): Record<string, unknown> | undefined {
  const value: unknown = Reflect.get(source, key);
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return undefined;
}

export function serializeError(error: unknown, includeStack = true): SerializedError {
  if (error instanceof Error) {
    const serialized: SerializedError = {
      message: error.message,
      name: error.name,
    };

    if (includeStack) {
      serialized.stack = error.stack;
    }

    const code = readString(error, 'code');
    if (code) {
      serialized.code = code;
    }

    if (error.cause) {
      serialized.cause = serializeError(error.cause, includeStack);
    }

    const details = readRecord(error, 'details');
    if (details) {
      serialized.details = details;
    }

    return serialized;
  }

  if (typeof error === 'string') {
    return { message: error };
  }

  if (error && typeof error === 'object') {
    return {
      message: readString(error, 'message') ?? readString(error, 'error') ?? JSON.stringify(error),
      name: readString(error, 'name'),
      code: readString(error, 'code'),
    };
  }

  return { message: String(error) };
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ConfigError extends Error {
  constructor(message: string, readonly path?: string) {
    super(path ? `${path}: ${message}` : message);
    this.name = 'ConfigError';
  }
}

export class NotificationError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'NotificationError';
  }
}

export class LogWriteError extends Error {
  constructor(readonly file: string, cause: unknown) {
    super(`Failed to write to ${file}: ${getErrorMessage(cause)}`, { cause });
    this.name = 'LogWriteError';
  }
}

export class TimeoutError extends Error {
  constructor(ms: number) {
    super(`Operation timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

export async function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new TimeoutError(ms)), ms);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

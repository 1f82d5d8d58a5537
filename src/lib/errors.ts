export class ServerException extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ServerException';
  }
}

export class CacheException extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CacheException';
  }
}

/**
 * Flattens anything thrown by a backend or storage call into a message string.
 */
export const toErrorMessage = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  if (error && typeof error === 'object' && 'message' in error) {
    const { message } = error;
    if (typeof message === 'string') return message;
  }
  return String(error);
};

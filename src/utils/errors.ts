export type ScraperErrorType = 'acquisition' | 'config';

export class ScraperError extends Error {
  constructor(
    readonly type: ScraperErrorType,
    message: string,
    readonly details: { url?: string; status?: number; cause?: unknown } = {}
  ) {
    super(message);
    this.name = 'ScraperError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

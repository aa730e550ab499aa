export class AppError extends Error {
  readonly status: number;
  readonly code: number;
  readonly details?: Record<string, unknown>;

  constructor(status: number, code: number, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'AppError';
    this.status = status;
    this.code = code;
    this.details = details;
  }

  toBody(): { code: number; message: string; details: Record<string, unknown> | null } {
    return {
      code: this.code,
      message: this.message,
      details: this.details ?? null
    };
  }
}

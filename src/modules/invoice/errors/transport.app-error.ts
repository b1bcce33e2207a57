import { AppError } from '@common/errors/app-error';

export class TransportAppError extends AppError {
  constructor(message: string, cause: unknown) {
    super(message, { cause });
  }

  public readonly code = 'ERR_TRANSPORT';

  public shouldBeLogged(): boolean {
    return true;
  }

  public devMessage(): string {
    const { cause } = this;
    const reason = cause instanceof Error ? cause.message : String(cause);
    return `${this.message}: ${reason}`;
  }
}

import { AppError } from '@common/errors/app-error';

/**
 * Inbound notification is malformed. The message stays generic; the
 * offending field is only exposed through `devMessage()`.
 */
export class InvalidRequestAppError extends AppError {
  constructor(private readonly reason: string) {
    super('Invalid notification request');
  }

  public readonly code = 'ERR_INVALID_REQUEST';

  public shouldBeLogged(): boolean {
    return true;
  }

  public devMessage(): string {
    return `${this.message}: ${this.reason}`;
  }
}

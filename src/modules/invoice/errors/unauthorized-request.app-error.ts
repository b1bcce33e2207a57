import { AppError } from '@common/errors/app-error';

export class UnauthorizedRequestAppError extends AppError {
  constructor() {
    super('Notification credentials do not match');
  }

  public readonly code = 'ERR_UNAUTHORIZED_REQUEST';

  public shouldBeLogged(): boolean {
    return true;
  }
}

import { AppError } from '@common/errors/app-error';

export class EncodingAppError extends AppError {
  public readonly code = 'ERR_ENCODING';
}

import { AppError } from '@common/errors/app-error';
import { ValidationErrors } from '../validation/validation-rules';

function describe(errors: ValidationErrors): string {
  const fields = Object.keys(errors).join(', ');
  return `Invalid invoice params on fields ${fields}`;
}

export class InvalidParamsAppError extends AppError {
  constructor(public readonly errors: ValidationErrors) {
    super(describe(errors));
  }

  public readonly code = 'ERR_INVALID_PARAMS';

  public payload(): ValidationErrors {
    return this.errors;
  }
}

import { Injectable } from '@nestjs/common';
import { validateSync, ValidationError } from 'class-validator';

function describe(errors: ValidationError[]): string {
  return errors
    .map((e) => `${e.property}: ${Object.values(e.constraints ?? {}).join(', ')}`)
    .join('; ');
}

/**
 * # Base for env-backed config classes
 *
 * Properties are declared with `@UseEnv` and class-validator decorators.
 * The fragment validates itself on construction and refuses to exist
 * in an invalid state.
 */
@Injectable()
export abstract class ConfigFragment {
  constructor() {
    const errors = validateSync(this);
    if (errors.length > 0) {
      throw new Error(`Invalid ${this.constructor.name}: ${describe(errors)}`);
    }
  }
}

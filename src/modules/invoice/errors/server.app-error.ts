import { AppError } from '@common/errors/app-error';

export interface ServerErrorPayload {
  readonly status: number;
  readonly body: string;
}

function describe(status: number, body: string): string {
  if (status !== 200) {
    return body
      ? `Invoice API returned ${status}: ${body}`
      : `Invoice API returned ${status}`;
  }
  return `Invoice API rejected request: ${body}`;
}

export class ServerAppError extends AppError {
  constructor(
    public readonly status: number,
    public readonly body: string,
  ) {
    super(describe(status, body));
  }

  public readonly code = 'ERR_SERVER';

  public shouldBeLogged(): boolean {
    return true;
  }

  public payload(): ServerErrorPayload {
    return { status: this.status, body: this.body };
  }
}

export { EncodingAppError } from './encoding.app-error';
export { InvalidParamsAppError } from './invalid-params.app-error';
export { InvalidRequestAppError } from './invalid-request.app-error';
export { ServerAppError } from './server.app-error';
export type { ServerErrorPayload } from './server.app-error';
export { TransportAppError } from './transport.app-error';
export { UnauthorizedRequestAppError } from './unauthorized-request.app-error';

/**
 * Request-type discriminator sent as `regist_type`
 */
export enum RegistType {
  Issue = '1',
  Modify = '2',
  Cancel = '9',
}

export enum DepositStatus {
  /** Customer paid; the payment can still be canceled */
  DepositMade = 'deposit_made',
  /** Customer paid and then canceled */
  DepositCanceled = 'deposit_canceled',
  /** Customer paid; the payment can no longer be canceled */
  DepositFinalized = 'deposit_finalized',
}

export const DEPOSIT_STATUS_CODES: ReadonlyMap<string, DepositStatus> =
  new Map<string, DepositStatus>([
    ['1', DepositStatus.DepositMade],
    ['2', DepositStatus.DepositCanceled],
    ['3', DepositStatus.DepositFinalized],
  ]);

export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';
export const TEXT_CONTENT_TYPE = 'text/plain';

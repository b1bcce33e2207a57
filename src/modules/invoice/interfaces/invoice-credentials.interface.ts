export interface InvoiceCredentials {
  readonly loginUserId: string;
  readonly loginPassword: string;
}

export interface InvoiceClientOptions extends InvoiceCredentials {
  /**
   * Invoice API URL; every operation posts to it
   */
  readonly endpoint: string;
}

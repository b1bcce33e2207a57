import { ConfigFragment } from '@common/config/config-fragment';
import { UseEnv } from '@common/config/use-env.decorator';
import { IsNotEmpty, IsString, IsUrl } from 'class-validator';
import { InvoiceClientOptions } from './interfaces/invoice-credentials.interface';

/**
 * Configuration for the convenience-store invoice API
 */
export class InvoiceConfig
  extends ConfigFragment
  implements InvoiceClientOptions
{
  /**
   * Invoice API endpoint, e.g. https://invoice.example.test/api
   */
  @IsUrl({ require_tld: false })
  @UseEnv('INVOICE_API_ENDPOINT')
  public readonly endpoint!: string;

  /**
   * Issuer account id, also expected on inbound notifications
   */
  @IsString()
  @IsNotEmpty()
  @UseEnv('INVOICE_LOGIN_USER_ID')
  public readonly loginUserId!: string;

  @IsString()
  @IsNotEmpty()
  @UseEnv('INVOICE_LOGIN_PASSWORD')
  public readonly loginPassword!: string;
}

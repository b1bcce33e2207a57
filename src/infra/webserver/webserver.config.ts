import { ConfigFragment } from '@common/config/config-fragment';
import { UseEnv } from '@common/config/use-env.decorator';
import { IsInt, IsString, IsUrl, Max, Min } from 'class-validator';

const DEFAULT_PORT = 3000;

export class WebserverConfig extends ConfigFragment {
  @IsInt()
  @Min(0)
  @Max(65535)
  @UseEnv('PORT', (value?: string) =>
    value ? parseInt(value, 10) : DEFAULT_PORT,
  )
  public readonly port!: number;

  /**
   * Public base URL the invoice API posts notifications to
   */
  @IsString()
  @IsUrl({ require_tld: false })
  @UseEnv(
    'PUBLIC_URL',
    (value?: string) =>
      value ?? `http://localhost:${process.env.PORT ?? DEFAULT_PORT}`,
  )
  public readonly publicUrl!: string;
}

import { ServerAppError } from '@modules/invoice/errors';
import { InvoiceStatus } from '@modules/invoice/interfaces/invoice-status.interface';
import { DepositStatus } from '@modules/invoice/invoice.constants';
import { InvoiceNotificationService } from '@modules/invoice/services/invoice-notification.service';
import { HttpStatus } from '@nestjs/common';
import request from 'supertest';
import {
  closeTestApp,
  createTestApp,
  TestAppContext,
} from './utils/create-test-app.util';

/**
 * E2E test for the invoice status notification webhook
 *
 * The invoice API client is mocked, so acknowledgements are only recorded.
 */
describe('Invoice notification webhook (e2e)', () => {
  const WEBHOOK_PATH = '/api/invoices/notifications';

  let testContext: TestAppContext;
  let published: InvoiceStatus[];

  const notification = {
    login_user_id: 'test-user',
    login_password: 'test-password',
    number_of_notify: '3',
    receipt_no_0000: 'invoice-1',
    status_0000: '1',
    receipt_date_0000: '202610012010',
    payment_0000: '101',
    receipt_no_0001: 'invoice-2',
    status_0001: '2',
    receipt_date_0001: '202610012010',
    payment_0001: '102',
    receipt_no_0002: 'invoice-3',
    status_0002: '3',
    receipt_date_0002: '202610012010',
    payment_0002: '103',
  };

  const batchOf = (count: number): string => {
    const fields: [string, string][] = [
      ['login_user_id', 'test-user'],
      ['login_password', 'test-password'],
      ['number_of_notify', count.toString()],
    ];
    for (let i = 0; i < count; i += 1) {
      const index = i.toString().padStart(4, '0');
      fields.push(
        [`receipt_no_${index}`, `invoice-${i}`],
        [`status_${index}`, '1'],
        [`receipt_date_${index}`, '202610012010'],
        [`payment_${index}`, (i + 1).toString()],
      );
    }
    return fields.map(([key, value]) => `${key}=${value}`).join('&');
  };

  beforeAll(async () => {
    testContext = await createTestApp();
    testContext.app
      .get(InvoiceNotificationService)
      .statuses$.subscribe((status) => published.push(status));
  });

  afterAll(async () => {
    await closeTestApp(testContext);
  });

  beforeEach(() => {
    published = [];
    testContext.apiClient.acknowledgeStatuses.mockClear();
  });

  it('should publish and acknowledge a well-formed batch', async () => {
    await request(testContext.app.getHttpServer())
      .post(WEBHOOK_PATH)
      .type('form')
      .send(notification)
      .expect(HttpStatus.OK);

    expect(published.map((s) => [s.id, s.amount, s.status])).toEqual([
      ['invoice-1', 101, DepositStatus.DepositMade],
      ['invoice-2', 102, DepositStatus.DepositCanceled],
      ['invoice-3', 103, DepositStatus.DepositFinalized],
    ]);
    expect(published[0].updatedAt.toISOString()).toBe(
      '2026-10-01T11:10:00.000Z',
    );
    expect(testContext.apiClient.acknowledgeStatuses).toHaveBeenCalledWith([
      'invoice-1',
      'invoice-2',
      'invoice-3',
    ]);
  });

  it('should reject mismatched credentials with 401', async () => {
    const response = await request(testContext.app.getHttpServer())
      .post(WEBHOOK_PATH)
      .type('form')
      .send({
        ...notification,
        login_user_id: 'invalid_user_id',
        login_password: 'invalid_password',
      })
      .expect(HttpStatus.UNAUTHORIZED);

    expect(response.body.code).toBe('ERR_UNAUTHORIZED_REQUEST');
    expect(published).toEqual([]);
    expect(testContext.apiClient.acknowledgeStatuses).not.toHaveBeenCalled();
  });

  it('should reject the whole batch when one status is malformed', async () => {
    const response = await request(testContext.app.getHttpServer())
      .post(WEBHOOK_PATH)
      .type('form')
      .send({ ...notification, status_0002: '4' })
      .expect(HttpStatus.BAD_REQUEST);

    expect(response.body).toMatchObject({
      statusCode: HttpStatus.BAD_REQUEST,
      code: 'ERR_INVALID_REQUEST',
      message: 'Invalid notification request',
    });
    expect(published).toEqual([]);
    expect(testContext.apiClient.acknowledgeStatuses).not.toHaveBeenCalled();
  });

  it('should answer 502 when the acknowledgement fails', async () => {
    testContext.apiClient.acknowledgeStatuses.mockRejectedValueOnce(
      new ServerAppError(500, 'error'),
    );

    const response = await request(testContext.app.getHttpServer())
      .post(WEBHOOK_PATH)
      .type('form')
      .send(notification)
      .expect(HttpStatus.BAD_GATEWAY);

    expect(response.body.code).toBe('ERR_SERVER');
    expect(published).toEqual([]);
  });

  it('should accept a batch of 300 statuses', async () => {
    await request(testContext.app.getHttpServer())
      .post(WEBHOOK_PATH)
      .type('form')
      .send(batchOf(300))
      .expect(HttpStatus.OK);

    expect(published).toHaveLength(300);
    expect(published[299].id).toBe('invoice-299');
    expect(published[299].amount).toBe(300);
    const { calls } = testContext.apiClient.acknowledgeStatuses.mock;
    expect(calls).toHaveLength(1);
    expect(calls[0][0]).toHaveLength(300);
  });

  it('should decode Shift_JIS percent-encoded values', async () => {
    await request(testContext.app.getHttpServer())
      .post(WEBHOOK_PATH)
      .type('form')
      .send(
        'login_user_id=test-user&login_password=test-password' +
          '&number_of_notify=1&receipt_no_0000=%90%BF%8B%81%31' +
          '&status_0000=1&receipt_date_0000=202610012010&payment_0000=100',
      )
      .expect(HttpStatus.OK);

    expect(published.map((s) => s.id)).toEqual(['請求1']);
    expect(testContext.apiClient.acknowledgeStatuses).toHaveBeenCalledWith([
      '請求1',
    ]);
  });

  it('should reject bytes that are not valid Shift_JIS with 400', async () => {
    const response = await request(testContext.app.getHttpServer())
      .post(WEBHOOK_PATH)
      .type('form')
      .send(
        'login_user_id=test-user&login_password=test-password' +
          '&number_of_notify=1&receipt_no_0000=%82' +
          '&status_0000=1&receipt_date_0000=202610012010&payment_0000=100',
      )
      .expect(HttpStatus.BAD_REQUEST);

    expect(response.body.code).toBe('ERR_ENCODING');
    expect(published).toEqual([]);
    expect(testContext.apiClient.acknowledgeStatuses).not.toHaveBeenCalled();
  });

  it('should answer a body over the size limit with 413', async () => {
    const response = await request(testContext.app.getHttpServer())
      .post(WEBHOOK_PATH)
      .type('form')
      .send(`padding=${'x'.repeat(3 * 1024 * 1024)}`)
      .expect(HttpStatus.PAYLOAD_TOO_LARGE);

    expect(response.body.code).toBe('ERR_HTTP');
    expect(testContext.apiClient.acknowledgeStatuses).not.toHaveBeenCalled();
  });
});

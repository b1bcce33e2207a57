import { IssueInvoiceParams } from './issue-invoice.params';
import { ModifyInvoiceParams } from './modify-invoice.params';

describe('Invoice params', () => {
  const now = new Date('2026-03-01T00:00:00.000Z');
  const DAY_MS = 24 * 60 * 60 * 1000;

  const credentials = {
    loginUserId: 'test-user',
    loginPassword: 'test-password',
  };

  const validDetails = {
    name: '山田花子',
    nameKatakana: 'ヤマダハナコ',
    phoneNumber: '03-1234-5678',
    amount: 1200,
    expiry: new Date(now.getTime() + 7 * DAY_MS),
  };

  describe('IssueInvoiceParams', () => {
    it('Should be valid with every field in range', () => {
      const params = new IssueInvoiceParams(validDetails);

      expect(params.errors(now)).toEqual({});
      expect(params.isValid(now)).toBe(true);
    });

    it('Should report each of the five fields when empty', () => {
      const errors = new IssueInvoiceParams().errors(now);

      expect(Object.keys(errors)).toHaveLength(5);
      expect(errors.name).toEqual(['must be at least 1 characters long']);
      expect(errors.name_katakana).toEqual([
        'must be at least 1 characters long',
      ]);
      expect(errors.phone_number).toEqual([
        'must be at least 1 characters long',
        'invalid format',
      ]);
      expect(errors.amount).toEqual(['must be at least 1']);
      expect(errors.expiry).toHaveLength(2);
    });

    it('Should collect every violation of a field in rule order', () => {
      const errors = new IssueInvoiceParams({
        ...validDetails,
        phoneNumber: '0120-4444-44444',
      }).errors(now);

      expect(errors).toEqual({
        phone_number: ['must be at most 13 characters long', 'invalid format'],
      });
    });

    it('Should enforce name lengths in characters', () => {
      const errors = new IssueInvoiceParams({
        ...validDetails,
        name: '花'.repeat(41),
        nameKatakana: 'ハ'.repeat(30),
      }).errors(now);

      expect(errors).toEqual({
        name: ['must be at most 40 characters long'],
      });
    });

    it.each([0, -1, 1000000, 12.5])('Should reject amount %p', (amount) => {
      const params = new IssueInvoiceParams({ ...validDetails, amount });

      expect(params.isValid(now)).toBe(false);
      expect(Object.keys(params.errors(now))).toEqual(['amount']);
    });

    it.each([1, 999999])('Should accept amount %p', (amount) => {
      const params = new IssueInvoiceParams({ ...validDetails, amount });

      expect(params.isValid(now)).toBe(true);
    });

    it('Should require the expiry to be strictly after now', () => {
      const atNow = new IssueInvoiceParams({ ...validDetails, expiry: now });
      const before = new IssueInvoiceParams({
        ...validDetails,
        expiry: new Date(now.getTime() - 1),
      });

      expect(atNow.errors(now)).toEqual({
        expiry: ['must be after 2026-03-01T00:00:00.000Z'],
      });
      expect(before.isValid(now)).toBe(false);
    });

    it('Should allow the expiry up to 60 days ahead', () => {
      const lastDay = new IssueInvoiceParams({
        ...validDetails,
        expiry: new Date(now.getTime() + 60 * DAY_MS),
      });
      const tooLate = new IssueInvoiceParams({
        ...validDetails,
        expiry: new Date(now.getTime() + 60 * DAY_MS + 1),
      });

      expect(lastDay.isValid(now)).toBe(true);
      expect(tooLate.errors(now)).toEqual({
        expiry: ['must not be after 2026-04-30T00:00:00.000Z'],
      });
    });

    it('Should evaluate the expiry bounds at validation time', () => {
      const params = new IssueInvoiceParams(validDetails);
      const later = new Date(now.getTime() + 8 * DAY_MS);

      expect(params.isValid(now)).toBe(true);
      expect(params.isValid(later)).toBe(false);
    });

    it('Should not share the expiry date with the caller', () => {
      const expiry = new Date(validDetails.expiry.getTime());
      const params = new IssueInvoiceParams({ ...validDetails, expiry });

      expiry.setTime(0);

      expect(params.expiry.getTime()).toBe(validDetails.expiry.getTime());
    });

    it('Should render the issue form', () => {
      const params = new IssueInvoiceParams({
        ...validDetails,
        amount: 7,
        expiry: new Date('2026-03-09T10:00:00+09:00'),
      });

      expect(Array.from(params.toForm(credentials).entries())).toEqual([
        ['login_user_id', 'test-user'],
        ['login_password', 'test-password'],
        ['regist_type', '1'],
        ['name', '山田花子'],
        ['kana', 'ヤマダハナコ'],
        ['phone_no', '03-1234-5678'],
        ['payment', '7'],
        ['date_of_expiry', '20260309'],
      ]);
    });
  });

  describe('ModifyInvoiceParams', () => {
    it('Should validate the id before the other fields', () => {
      const errors = new ModifyInvoiceParams({
        ...validDetails,
        id: 'x'.repeat(19),
        amount: 0,
      }).errors(now);

      expect(Object.keys(errors)).toEqual(['id', 'amount']);
      expect(errors.id).toEqual(['must be at most 18 characters long']);
    });

    it('Should report six fields when empty', () => {
      expect(Object.keys(new ModifyInvoiceParams().errors(now))).toHaveLength(
        6,
      );
    });

    it('Should render the modify form with the invoice id', () => {
      const params = new ModifyInvoiceParams({
        ...validDetails,
        id: 'invoice-1234',
        expiry: new Date('2026-03-09T10:00:00+09:00'),
      });

      expect(Array.from(params.toForm(credentials).keys())).toEqual([
        'login_user_id',
        'login_password',
        'regist_type',
        'receipt_no',
        'name',
        'kana',
        'phone_no',
        'payment',
        'date_of_expiry',
      ]);
      expect(params.toForm(credentials).get('regist_type')).toBe('2');
      expect(params.toForm(credentials).get('receipt_no')).toBe(
        'invoice-1234',
      );
    });
  });
});

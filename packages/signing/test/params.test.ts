import { ValidationError } from '@wxgate/domain';
import { describe, expect, it } from 'vitest';
import { requireAnyParam, requireExactlyOneParam, requireParams } from '../src/params.js';
import { toSignableFields } from '../src/fields.js';

const required = ['appid', 'mch_id', 'nonce_str', 'out_trade_no', 'total_fee'] as const;
const complete = {
  appid: 'wx-test-app',
  mch_id: '1900000109',
  nonce_str: 'n1',
  out_trade_no: 'T1',
  total_fee: 100
};

function catchValidation(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('requireParams', () => {
  it('passes when every required field has a value', () => {
    expect(() => requireParams(complete, required)).not.toThrow();
  });

  it.each(required)('names %s when it is removed', (name) => {
    const fields: Record<string, string | number> = { ...complete };
    delete fields[name];

    expect(catchValidation(() => requireParams(fields, required)).field).toBe(name);
  });

  it('treats empty strings and zero as missing', () => {
    expect(catchValidation(() => requireParams({ ...complete, out_trade_no: '' }, required)).field).toBe('out_trade_no');
    expect(catchValidation(() => requireParams({ ...complete, total_fee: 0 }, required)).field).toBe('total_fee');
  });

  it('reports the first missing field in the given order', () => {
    expect(catchValidation(() => requireParams({ appid: 'wx-test-app' }, required)).field).toBe('mch_id');
  });

  it('does not mutate the fields', () => {
    const fields = { ...complete };
    requireParams(fields, required);
    expect(fields).toEqual(complete);
  });
});

describe('alternative field constraints', () => {
  const refs = ['transaction_id', 'out_trade_no'] as const;

  it('accepts any present alternative', () => {
    expect(requireAnyParam({ out_trade_no: 'T1' }, refs)).toEqual(['out_trade_no']);
    expect(requireAnyParam({ transaction_id: '42', out_trade_no: 'T1' }, refs)).toEqual(['transaction_id', 'out_trade_no']);
  });

  it('fails when none is present', () => {
    const error = catchValidation(() => requireAnyParam({ transaction_id: '' }, refs));
    expect(error.field).toBe('transaction_id|out_trade_no');
    expect(error.message).toBe('Missing required parameters "transaction_id|out_trade_no": provide at least one.');
  });

  it('requires exactly one when asked to', () => {
    expect(requireExactlyOneParam({ transaction_id: '42' }, refs)).toBe('transaction_id');
    expect(catchValidation(() => requireExactlyOneParam({ transaction_id: '42', out_trade_no: 'T1' }, refs)).message).toBe(
      'Parameters "transaction_id|out_trade_no" are mutually exclusive: provide exactly one.'
    );
  });
});

describe('toSignableFields', () => {
  it('renders numbers and drops absent values', () => {
    expect(toSignableFields({ total_fee: 100, attach: '', openid: undefined, device_info: null })).toEqual({
      total_fee: '100',
      attach: ''
    });
  });
});

import { describe, expect, it } from 'vitest';

import { isTxHash } from '../validate.js';

const BODY = 'a'.repeat(64);

describe('isTxHash', () => {
  it('accepts 0x followed by 64 hex digits in any case', () => {
    expect(isTxHash(`0x${BODY}`)).toBe(true);
    expect(isTxHash(`0x${'AbCdEf0123456789'.repeat(4)}`)).toBe(true);
    expect(isTxHash(`0x${'0'.repeat(64)}`)).toBe(true);
  });

  it('rejects the wrong length', () => {
    expect(isTxHash('')).toBe(false);
    expect(isTxHash('0x')).toBe(false);
    expect(isTxHash(`0x${'a'.repeat(63)}`)).toBe(false);
    expect(isTxHash(`0x${'a'.repeat(65)}`)).toBe(false);
  });

  it('rejects a missing or different prefix', () => {
    expect(isTxHash(`00${BODY}`)).toBe(false);
    expect(isTxHash(`0X${BODY}`)).toBe(false);
    expect(isTxHash(`${BODY}ab`)).toBe(false);
  });

  it('rejects non-hex characters after the prefix', () => {
    expect(isTxHash(`0x${'g'.repeat(64)}`)).toBe(false);
    expect(isTxHash(`0x${'a'.repeat(63)}z`)).toBe(false);
    expect(isTxHash(`0x${'a'.repeat(62)} a`)).toBe(false);
    expect(isTxHash(`0x${'a'.repeat(63)}\n`)).toBe(false);
  });
});

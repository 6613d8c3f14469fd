import { describe, it, expect } from 'vitest';
import {
  createEmptyAddress,
  createEmptyDate,
  formatAddress,
  formatDate,
  isAddressEmpty,
  isDateEmpty,
} from '../../src/domain/form.js';

describe('formatDate', () => {
  it('joins components as written', () => {
    expect(formatDate({ day: '3', month: '04', year: '1999' })).toBe('3/04/1999');
  });

  it('returns an empty string for an empty date', () => {
    expect(formatDate(createEmptyDate())).toBe('');
  });

  it('keeps blanks of a partial date', () => {
    expect(formatDate({ day: '', month: '05', year: '2023' })).toBe('/05/2023');
  });
});

describe('formatAddress', () => {
  it('renders every part', () => {
    const address = {
      street: 'הרצל',
      houseNumber: '12',
      entrance: 'א',
      apartment: '4',
      city: 'חיפה',
      postalCode: '3100000',
      poBox: '55',
    };

    expect(formatAddress(address)).toBe('הרצל 12 כניסה א דירה 4, חיפה, מיקוד 3100000, ת.ד. 55');
  });

  it('skips missing parts', () => {
    expect(formatAddress({ ...createEmptyAddress(), street: 'הרצל', city: 'חיפה' })).toBe('הרצל, חיפה');
  });

  it('drops house details without a street', () => {
    expect(formatAddress({ ...createEmptyAddress(), houseNumber: '12', city: 'חיפה' })).toBe('חיפה');
  });

  it('returns an empty string for an empty address', () => {
    expect(formatAddress(createEmptyAddress())).toBe('');
  });
});

describe('emptiness', () => {
  it('treats a date with any component as filled', () => {
    expect(isDateEmpty(createEmptyDate())).toBe(true);
    expect(isDateEmpty({ ...createEmptyDate(), year: '2020' })).toBe(false);
  });

  it('treats an address with any part as filled', () => {
    expect(isAddressEmpty(createEmptyAddress())).toBe(true);
    expect(isAddressEmpty({ ...createEmptyAddress(), poBox: '7' })).toBe(false);
  });
});

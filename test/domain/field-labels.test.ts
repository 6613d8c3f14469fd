import { describe, it, expect } from 'vitest';
import { FIELD_LABELS, localizeFieldPath, remapKeys } from '../../src/domain/field-labels.js';

describe('remapKeys', () => {
  it('maps every label variant to the canonical key', () => {
    expect(
      remapKeys({ 'Last Name': 'a', 'שם פרטי': 'b', id_number: 'c', 'MOBILE-PHONE': 'd' }, FIELD_LABELS),
    ).toEqual({ lastName: 'a', firstName: 'b', idNumber: 'c', mobilePhone: 'd' });
  });

  it('drops keys outside the table', () => {
    expect(remapKeys({ notes: 'x' }, FIELD_LABELS)).toEqual({});
  });
});

describe('localizeFieldPath', () => {
  it('translates top-level fields', () => {
    expect(localizeFieldPath('idNumber')).toBe('מספר זהות');
  });

  it('translates composite parts', () => {
    expect(localizeFieldPath('dateOfBirth.day')).toBe('תאריך לידה.יום');
    expect(localizeFieldPath('address.postalCode')).toBe('כתובת.מיקוד');
    expect(localizeFieldPath('medicalInstitutionFields.healthFundMember')).toBe('למילוי ע"י המוסד הרפואי.חבר בקופת חולים');
  });

  it('keeps unknown segments', () => {
    expect(localizeFieldPath('notes')).toBe('notes');
    expect(localizeFieldPath('address.floor')).toBe('כתובת.floor');
  });
});

import { describe, it, expect } from 'vitest';
import {
  completenessPercentage,
  countFilledFields,
  listMissingFields,
} from '../../src/services/validation/completeness.js';
import { isUnitFilled, leafFields, logicalUnits } from '../../src/services/validation/field-paths.js';
import { createEmptyAddress, createEmptyDate, createEmptyFormRecord } from '../../src/domain/form.js';
import { buildForm } from '../helpers/forms.js';

const ALL_UNIT_PATHS = [
  'lastName',
  'firstName',
  'idNumber',
  'gender',
  'dateOfBirth',
  'address',
  'landlinePhone',
  'mobilePhone',
  'jobType',
  'dateOfInjury',
  'timeOfInjury',
  'accidentLocation',
  'accidentAddress',
  'accidentDescription',
  'injuredBodyPart',
  'signature',
  'formFillingDate',
  'formReceiptDateAtClinic',
  'medicalInstitutionFields.healthFundMember',
  'medicalInstitutionFields.natureOfAccident',
  'medicalInstitutionFields.medicalDiagnoses',
];

describe('logicalUnits', () => {
  it('yields 21 units in layout order', () => {
    expect(logicalUnits(createEmptyFormRecord()).map((unit) => unit.path)).toEqual(ALL_UNIT_PATHS);
  });

  it('tags composite units with their parts', () => {
    const units = logicalUnits(buildForm());
    const dateOfBirth = units[4];
    expect(dateOfBirth).toEqual({
      kind: 'date',
      path: 'dateOfBirth',
      parts: [
        { path: 'dateOfBirth.day', value: '02' },
        { path: 'dateOfBirth.month', value: '02' },
        { path: 'dateOfBirth.year', value: '1995' },
      ],
    });
    expect(units[5].kind).toBe('address');
  });

  it('treats a composite with one filled part as filled', () => {
    const units = logicalUnits(buildForm({ dateOfInjury: { day: '', month: '', year: '2022' } }));
    expect(isUnitFilled(units[9])).toBe(true);
  });
});

describe('leafFields', () => {
  it('walks every leaf of the form', () => {
    const leaves = leafFields(createEmptyFormRecord());
    // 13 scalars + 4 dates × 3 + 7 address parts + 3 medical fields
    expect(leaves).toHaveLength(35);
    expect(leaves.slice(4, 8).map((leaf) => leaf.path)).toEqual([
      'dateOfBirth.day',
      'dateOfBirth.month',
      'dateOfBirth.year',
      'address.street',
    ]);
  });
});

describe('countFilledFields', () => {
  it('counts a full form as 21 of 21', () => {
    expect(countFilledFields(buildForm())).toEqual({ filled: 21, total: 21 });
  });

  it('counts an empty form as 0 of 21', () => {
    expect(countFilledFields(createEmptyFormRecord())).toEqual({ filled: 0, total: 21 });
  });

  it('counts a date once no matter how many parts are filled', () => {
    const form = createEmptyFormRecord();
    form.dateOfBirth = { day: '02', month: '02', year: '1995' };
    form.dateOfInjury = { day: '16', month: '', year: '' };
    expect(countFilledFields(form)).toEqual({ filled: 2, total: 21 });
  });

  it('counts each medical field on its own', () => {
    const form = createEmptyFormRecord();
    form.medicalInstitutionFields.healthFundMember = 'מכבי';
    form.medicalInstitutionFields.medicalDiagnoses = 'שבר';
    expect(countFilledFields(form).filled).toBe(2);
  });

  it('does not count an address with every part empty', () => {
    const form = buildForm({ address: createEmptyAddress() });
    expect(countFilledFields(form).filled).toBe(20);
  });
});

describe('completenessPercentage', () => {
  it('returns the filled share as a percentage', () => {
    expect(completenessPercentage({ filled: 18, total: 21 })).toBeCloseTo(85.714, 3);
  });

  it('returns 0 for an empty field set', () => {
    expect(completenessPercentage({ filled: 0, total: 0 })).toBe(0);
  });
});

describe('listMissingFields', () => {
  it('lists nothing for a full form', () => {
    expect(listMissingFields(buildForm())).toEqual([]);
  });

  it('lists each empty unit once for an empty form', () => {
    expect(listMissingFields(createEmptyFormRecord())).toEqual(ALL_UNIT_PATHS);
  });

  it('lists the empty parts of a partly filled composite', () => {
    const form = buildForm({
      landlinePhone: '',
      dateOfBirth: { day: '02', month: '', year: '1995' },
      address: { ...createEmptyAddress(), street: 'הרמבם', city: 'אבן יהודה' },
      formFillingDate: createEmptyDate(),
    });
    expect(listMissingFields(form)).toEqual([
      'dateOfBirth.month',
      'address.houseNumber',
      'address.entrance',
      'address.apartment',
      'address.postalCode',
      'address.poBox',
      'landlinePhone',
      'formFillingDate',
    ]);
  });
});

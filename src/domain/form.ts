import {
  ADDRESS_PARTS,
  DATE_PARTS,
  type AddressValue,
  type DateValue,
  type FormRecord,
  type MedicalBlock,
} from './types.js';

export function createEmptyDate(): DateValue {
  return { day: '', month: '', year: '' };
}

export function createEmptyAddress(): AddressValue {
  return { street: '', houseNumber: '', entrance: '', apartment: '', city: '', postalCode: '', poBox: '' };
}

export function createEmptyMedicalBlock(): MedicalBlock {
  return { healthFundMember: '', natureOfAccident: '', medicalDiagnoses: '' };
}

export function createEmptyFormRecord(): FormRecord {
  return {
    lastName: '',
    firstName: '',
    idNumber: '',
    gender: '',
    dateOfBirth: createEmptyDate(),
    address: createEmptyAddress(),
    landlinePhone: '',
    mobilePhone: '',
    jobType: '',
    dateOfInjury: createEmptyDate(),
    timeOfInjury: '',
    accidentLocation: '',
    accidentAddress: '',
    accidentDescription: '',
    injuredBodyPart: '',
    signature: '',
    formFillingDate: createEmptyDate(),
    formReceiptDateAtClinic: createEmptyDate(),
    medicalInstitutionFields: createEmptyMedicalBlock(),
  };
}

export function isDateEmpty(date: DateValue): boolean {
  return DATE_PARTS.every((part) => date[part] === '');
}

export function isAddressEmpty(address: AddressValue): boolean {
  return ADDRESS_PARTS.every((part) => address[part] === '');
}

/** `DD/MM/YYYY` with components as written, or `""` for an empty date. */
export function formatDate(date: DateValue): string {
  if (isDateEmpty(date)) return '';
  return `${date.day}/${date.month}/${date.year}`;
}

export function formatAddress(address: AddressValue): string {
  if (isAddressEmpty(address)) return '';

  const parts: string[] = [];

  if (address.street) {
    let street = address.street;
    if (address.houseNumber) street += ` ${address.houseNumber}`;
    if (address.entrance) street += ` כניסה ${address.entrance}`;
    if (address.apartment) street += ` דירה ${address.apartment}`;
    parts.push(street);
  }
  if (address.city) parts.push(address.city);
  if (address.postalCode) parts.push(`מיקוד ${address.postalCode}`);
  if (address.poBox) parts.push(`ת.ד. ${address.poBox}`);

  return parts.join(', ');
}


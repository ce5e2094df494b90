import { ContactField } from '../model/contact';

export class DuplicateContactError extends Error {
  constructor(readonly field: ContactField) {
    super(`Duplicate ${field}`);
    this.name = 'DuplicateContactError';
  }
}

export const PHONE_NUMBER_KEY = 'uq_phonebook_phone_number';
export const FULL_NAME_KEY = 'uq_phonebook_full_name';

// mysql2 reports "Duplicate entry '<value>' for key '<table>.<key>'"
export function duplicateFieldOf(err: unknown): ContactField | null {
  if (!(err instanceof Error) || !('code' in err) || err.code !== 'ER_DUP_ENTRY') {
    return null;
  }
  return err.message.includes(PHONE_NUMBER_KEY) ? 'phone_number' : 'full_name';
}

import type { Request, Response } from 'express';
import { Contact, NewContact } from '../model/contact';
import { AuditAction } from '../model/auditEntry';
import { ContactStore, DuplicateContactError, PhoneBookStores } from '../repo';
import { asyncHandler } from '../middleware/asyncHandler';
import { ConflictError, InvalidInputError, NotFoundError } from '../http/errors';
import { validateFullName, validatePhoneNumber } from '../validators/phoneBookValidator';
import { parseRequest, zFullNameQuery, zPerson, zPhoneNumberQuery } from '../validators/requestSchemas';

export const PHONE_NUMBER_EXISTS = 'Phone number already exists in the database';
export const PERSON_EXISTS = 'Person already exists in the database';
export const PERSON_NOT_FOUND = 'Person not found in the database';
export const PERSON_ADDED = 'Person added successfully';
export const PERSON_DELETED = 'Person deleted successfully';

async function insertContact(contacts: ContactStore, newContact: NewContact): Promise<Contact> {
  try {
    return await contacts.insert(newContact);
  } catch (error) {
    // a concurrent add won the race past the existence checks
    if (error instanceof DuplicateContactError) {
      throw new ConflictError(error.field === 'phone_number' ? PHONE_NUMBER_EXISTS : PERSON_EXISTS);
    }
    throw error;
  }
}

export function createPhoneBookController({ contacts, audit }: PhoneBookStores) {
  async function deleteContact(res: Response, found: Contact | null, action: AuditAction) {
    if (!found) {
      throw new NotFoundError(PERSON_NOT_FOUND);
    }

    await contacts.deleteById(found.id);
    await audit.append({ action, full_name: found.full_name, phone_number: found.phone_number });

    res.status(200).json({ message: PERSON_DELETED });
  }

  const list = asyncHandler(async (_req: Request, res: Response) => {
    const phoneBook = await contacts.findAll();
    await audit.append({ action: 'list', full_name: '', phone_number: '' });

    res.status(200).json(phoneBook);
  });

  const add = asyncHandler(async (req: Request, res: Response) => {
    const { full_name, phone_number } = parseRequest(zPerson, req.body);

    if (!validateFullName(full_name)) throw new InvalidInputError();
    if (!validatePhoneNumber(phone_number)) throw new InvalidInputError();

    if (await contacts.findByNumber(phone_number)) {
      throw new ConflictError(PHONE_NUMBER_EXISTS);
    }
    if (await contacts.findByName(full_name)) {
      throw new ConflictError(PERSON_EXISTS);
    }

    await insertContact(contacts, { full_name, phone_number });
    await audit.append({ action: 'add', full_name, phone_number });

    res.status(200).json({ message: PERSON_ADDED });
  });

  const deleteByName = asyncHandler(async (req: Request, res: Response) => {
    const { full_name } = parseRequest(zFullNameQuery, req.query);
    if (!validateFullName(full_name)) throw new InvalidInputError();

    await deleteContact(res, await contacts.findByName(full_name), 'delete-by-name');
  });

  const deleteByNumber = asyncHandler(async (req: Request, res: Response) => {
    const { phone_number } = parseRequest(zPhoneNumberQuery, req.query);
    if (!validatePhoneNumber(phone_number)) throw new InvalidInputError();

    await deleteContact(res, await contacts.findByNumber(phone_number), 'delete-by-number');
  });

  return { list, add, deleteByName, deleteByNumber };
}

export type PhoneBookController = ReturnType<typeof createPhoneBookController>;

import { Contact, NewContact } from '../model/contact';
import { AuditEntry, NewAuditEntry } from '../model/auditEntry';

export interface ContactStore {
  /** Creates the phonebook table when it does not exist yet. */
  init(): Promise<void>;
  findAll(): Promise<Contact[]>;
  findByName(fullName: string): Promise<Contact | null>;
  findByNumber(phoneNumber: string): Promise<Contact | null>;
  /** Rejects with DuplicateContactError when the name or number is already stored. */
  insert(contact: NewContact): Promise<Contact>;
  deleteById(id: number): Promise<void>;
  close(): Promise<void>;
}

export interface AuditStore {
  init(): Promise<void>;
  append(entry: NewAuditEntry): Promise<AuditEntry>;
  findAll(): Promise<AuditEntry[]>;
  close(): Promise<void>;
}

export interface PhoneBookStores {
  contacts: ContactStore;
  audit: AuditStore;
}

import { Contact, NewContact } from '../model/contact';
import { AuditEntry, NewAuditEntry } from '../model/auditEntry';
import { AuditStore, ContactStore } from './types';
import { DuplicateContactError } from './errors';

/**
 * In-process stores selected by the `memory:` URI. Used for local development
 * and tests; data lives only as long as the process.
 */
export class InMemoryContactStore implements ContactStore {
  private contacts = new Map<number, Contact>();
  private nextId = 1;

  async init(): Promise<void> {}

  async findAll(): Promise<Contact[]> {
    return Array.from(this.contacts.values()).map((contact) => ({ ...contact }));
  }

  async findByName(fullName: string): Promise<Contact | null> {
    return this.find((contact) => contact.full_name === fullName);
  }

  async findByNumber(phoneNumber: string): Promise<Contact | null> {
    return this.find((contact) => contact.phone_number === phoneNumber);
  }

  async insert(contact: NewContact): Promise<Contact> {
    if (this.find((each) => each.phone_number === contact.phone_number)) {
      throw new DuplicateContactError('phone_number');
    }
    if (this.find((each) => each.full_name === contact.full_name)) {
      throw new DuplicateContactError('full_name');
    }
    const stored: Contact = { id: this.nextId++, ...contact };
    this.contacts.set(stored.id, stored);
    return { ...stored };
  }

  async deleteById(id: number): Promise<void> {
    this.contacts.delete(id);
  }

  async close(): Promise<void> {
    this.contacts.clear();
  }

  private find(predicate: (contact: Contact) => boolean): Contact | null {
    for (const contact of this.contacts.values()) {
      if (predicate(contact)) return { ...contact };
    }
    return null;
  }
}

export class InMemoryAuditStore implements AuditStore {
  private entries: AuditEntry[] = [];

  async init(): Promise<void> {}

  async append(entry: NewAuditEntry): Promise<AuditEntry> {
    const stored: AuditEntry = {
      id: this.entries.length + 1,
      timestamp: new Date(),
      ...entry,
    };
    this.entries.push(stored);
    return { ...stored };
  }

  async findAll(): Promise<AuditEntry[]> {
    return this.entries.map((entry) => ({ ...entry }));
  }

  async close(): Promise<void> {
    this.entries = [];
  }
}

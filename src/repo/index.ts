import { DatabaseConfig, MEMORY_URI } from '../config/appConfig';
import { InMemoryAuditStore, InMemoryContactStore } from './inMemoryStores';
import { MySqlAuditStore } from './mysqlAuditStore';
import { MySqlContactStore } from './mysqlContactStore';
import { AuditStore, ContactStore, PhoneBookStores } from './types';

export * from './types';
export { DuplicateContactError } from './errors';
export { InMemoryAuditStore, InMemoryContactStore } from './inMemoryStores';

export function openContactStore(uri: string): ContactStore {
  return uri === MEMORY_URI ? new InMemoryContactStore() : MySqlContactStore.fromUri(uri);
}

export function openAuditStore(uri: string): AuditStore {
  return uri === MEMORY_URI ? new InMemoryAuditStore() : MySqlAuditStore.fromUri(uri);
}

export function openStores(database: DatabaseConfig): PhoneBookStores {
  return {
    contacts: openContactStore(database.pb),
    audit: openAuditStore(database.log),
  };
}

export async function initStores({ contacts, audit }: PhoneBookStores): Promise<void> {
  await Promise.all([contacts.init(), audit.init()]);
}

export async function closeStores({ contacts, audit }: PhoneBookStores): Promise<void> {
  await Promise.all([contacts.close(), audit.close()]);
}

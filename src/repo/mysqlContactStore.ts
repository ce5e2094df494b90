import mysql from 'mysql2/promise';
import { Contact, NewContact } from '../model/contact';
import { ContactStore } from './types';
import { DuplicateContactError, FULL_NAME_KEY, PHONE_NUMBER_KEY, duplicateFieldOf } from './errors';
import { EXACT_MATCH_COLLATION, withConnection } from './mysqlPool';

interface ContactRow extends mysql.RowDataPacket {
  id: number;
  full_name: string;
  phone_number: string;
}

export const createPhoneBookTableQuery = `
  CREATE TABLE IF NOT EXISTS phonebook (
    id INT AUTO_INCREMENT PRIMARY KEY,
    full_name VARCHAR(35) COLLATE ${EXACT_MATCH_COLLATION} NOT NULL,
    phone_number VARCHAR(64) COLLATE ${EXACT_MATCH_COLLATION} NOT NULL,
    CONSTRAINT ${FULL_NAME_KEY} UNIQUE (full_name),
    CONSTRAINT ${PHONE_NUMBER_KEY} UNIQUE (phone_number)
  )
`;

function toContact(row: ContactRow): Contact {
  return {
    id: row.id,
    full_name: row.full_name,
    phone_number: row.phone_number,
  };
}

export class MySqlContactStore implements ContactStore {
  constructor(private readonly pool: mysql.Pool) {}

  static fromUri(uri: string): MySqlContactStore {
    return new MySqlContactStore(mysql.createPool(uri));
  }

  private async findOne(column: 'full_name' | 'phone_number', value: string): Promise<Contact | null> {
    const query = `
      SELECT id, full_name, phone_number
      FROM phonebook
      WHERE ${column} = ?
      LIMIT 1
    `;
    const [rows] = await withConnection(this.pool, (connection) => connection.execute<ContactRow[]>(query, [value]));
    return rows.length ? toContact(rows[0]) : null;
  }

  async init(): Promise<void> {
    await withConnection(this.pool, (connection) => connection.execute(createPhoneBookTableQuery));
  }

  async findAll(): Promise<Contact[]> {
    const query = 'SELECT id, full_name, phone_number FROM phonebook ORDER BY id';
    const [rows] = await withConnection(this.pool, (connection) => connection.execute<ContactRow[]>(query));
    return rows.map(toContact);
  }

  findByName(fullName: string): Promise<Contact | null> {
    return this.findOne('full_name', fullName);
  }

  findByNumber(phoneNumber: string): Promise<Contact | null> {
    return this.findOne('phone_number', phoneNumber);
  }

  async insert(contact: NewContact): Promise<Contact> {
    const insertQuery = `
      INSERT INTO phonebook (full_name, phone_number)
      VALUES (?, ?)
    `;
    try {
      const [insertResult] = await withConnection(this.pool, (connection) =>
        connection.execute<mysql.ResultSetHeader>(insertQuery, [contact.full_name, contact.phone_number]),
      );
      return { id: insertResult.insertId, ...contact };
    } catch (error) {
      const field = duplicateFieldOf(error);
      if (field) {
        throw new DuplicateContactError(field);
      }
      throw error;
    }
  }

  async deleteById(id: number): Promise<void> {
    await withConnection(this.pool, (connection) => connection.execute('DELETE FROM phonebook WHERE id = ?', [id]));
  }

  close(): Promise<void> {
    return this.pool.end();
  }
}

import mysql from 'mysql2/promise';
import { AUDIT_ACTIONS, AuditAction, AuditEntry, NewAuditEntry } from '../model/auditEntry';
import { AuditStore } from './types';
import { EXACT_MATCH_COLLATION, withConnection } from './mysqlPool';

// the ENUM column only ever holds an AuditAction
interface AuditRow extends mysql.RowDataPacket {
  id: number;
  timestamp: Date;
  action: AuditAction;
  full_name: string;
  phone_number: string;
}

const actionEnum = AUDIT_ACTIONS.map((action) => `'${action}'`).join(', ');

export const createAuditLogTableQuery = `
  CREATE TABLE IF NOT EXISTS audit_log (
    id INT AUTO_INCREMENT PRIMARY KEY,
    \`timestamp\` DATETIME(3) NOT NULL DEFAULT CURRENT_TIMESTAMP(3),
    action ENUM(${actionEnum}) NOT NULL,
    full_name VARCHAR(35) COLLATE ${EXACT_MATCH_COLLATION} NOT NULL DEFAULT '',
    phone_number VARCHAR(64) COLLATE ${EXACT_MATCH_COLLATION} NOT NULL DEFAULT ''
  )
`;

const selectAuditLog = 'SELECT id, `timestamp`, action, full_name, phone_number FROM audit_log';

function toAuditEntry(row: AuditRow): AuditEntry {
  return {
    id: row.id,
    timestamp: row.timestamp,
    action: row.action,
    full_name: row.full_name,
    phone_number: row.phone_number,
  };
}

export class MySqlAuditStore implements AuditStore {
  constructor(private readonly pool: mysql.Pool) {}

  static fromUri(uri: string): MySqlAuditStore {
    return new MySqlAuditStore(mysql.createPool(uri));
  }

  async init(): Promise<void> {
    await withConnection(this.pool, (connection) => connection.execute(createAuditLogTableQuery));
  }

  append(entry: NewAuditEntry): Promise<AuditEntry> {
    return withConnection(this.pool, async (connection) => {
      const [insertResult] = await connection.execute<mysql.ResultSetHeader>(
        'INSERT INTO audit_log (action, full_name, phone_number) VALUES (?, ?, ?)',
        [entry.action, entry.full_name, entry.phone_number],
      );
      const [rows] = await connection.execute<AuditRow[]>(`${selectAuditLog} WHERE id = ?`, [insertResult.insertId]);
      return toAuditEntry(rows[0]);
    });
  }

  async findAll(): Promise<AuditEntry[]> {
    const [rows] = await withConnection(this.pool, (connection) =>
      connection.execute<AuditRow[]>(`${selectAuditLog} ORDER BY id`),
    );
    return rows.map(toAuditEntry);
  }

  close(): Promise<void> {
    return this.pool.end();
  }
}

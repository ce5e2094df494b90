export const AUDIT_ACTIONS = ['list', 'add', 'delete-by-name', 'delete-by-number'] as const;

export type AuditAction = (typeof AUDIT_ACTIONS)[number];

export interface AuditEntry {
  id: number;
  timestamp: Date;
  action: AuditAction;
  full_name: string;
  phone_number: string;
}

export type NewAuditEntry = Pick<AuditEntry, 'action' | 'full_name' | 'phone_number'>;

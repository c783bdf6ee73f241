export type AuditKind = 'payload_submitted' | 'preference_changed' | 'session_evicted' | 'remediation';

export interface AuditRecord {
  readonly at: number;
  readonly userId?: number;
  readonly kind: AuditKind;
  readonly detail?: Readonly<Record<string, string | number | boolean>>;
}

export interface AuditLog {
  append(record: AuditRecord): Promise<void>;
}

export class InMemoryAuditLog implements AuditLog {
  readonly records: AuditRecord[] = [];

  async append(record: AuditRecord): Promise<void> {
    this.records.push(record);
  }
}

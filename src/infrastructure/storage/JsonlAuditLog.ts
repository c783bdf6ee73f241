import fs from 'node:fs/promises';
import path from 'node:path';
import type { AuditLog, AuditRecord } from '../../application/sessions/AuditLog';

/** Uma linha JSON por evento, só acrescenta. */
export class JsonlAuditLog implements AuditLog {
  private directoryReady: Promise<void> | null = null;

  constructor(private readonly filePath: string) {}

  async append(record: AuditRecord): Promise<void> {
    this.directoryReady = this.directoryReady ?? fs.mkdir(path.dirname(this.filePath), { recursive: true }).then(() => undefined);
    await this.directoryReady;
    await fs.appendFile(this.filePath, `${JSON.stringify(record)}\n`, 'utf8');
  }
}

import type { Logger } from '../../logging/logger.js';
import { createSilentLogger } from '../../logging/logger.js';
import type { SourceAdapter, SourceRecord, SourceSnapshot } from '../../reconciler/types.js';

export const silentLogger: Logger = createSilentLogger();

/**
 * A source whose records the test sets directly
 */
export class StaticSource implements SourceAdapter {
  records: SourceRecord[];
  windowStart: string | undefined;
  fetchError: Error | undefined;
  acknowledge?: (record: SourceRecord) => Promise<void>;

  constructor(records: SourceRecord[] = [], windowStart?: string) {
    this.records = records;
    this.windowStart = windowStart;
  }

  async fetch(): Promise<SourceSnapshot> {
    if (this.fetchError) {
      throw this.fetchError;
    }
    return this.windowStart === undefined
      ? { records: [...this.records] }
      : { records: [...this.records], windowStart: this.windowStart };
  }
}

export function record(id: string, name: string, overrides: Partial<SourceRecord['content']> = {}, timestamp = '2024-06-01T12:00:00.000Z'): SourceRecord {
  return {
    id,
    timestamp,
    content: {
      name,
      description: `About ${name}`,
      list: { name: 'Inbox' },
      due: null,
      attachments: [],
      ...overrides,
    },
  };
}

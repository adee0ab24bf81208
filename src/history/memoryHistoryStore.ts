import { CallControlError } from '../errors';
import type {
  CallHistoryRecord,
  CallHistoryStore,
  CallHistoryUpdate,
  ListOptions,
  NewCallHistoryRecord,
} from './types';

function cloneRecord(record: CallHistoryRecord): CallHistoryRecord {
  return {
    ...record,
    startTime: new Date(record.startTime),
    connectTime: record.connectTime ? new Date(record.connectTime) : null,
    endTime: record.endTime ? new Date(record.endTime) : null,
    sentiment: record.sentiment ? { ...record.sentiment } : null,
  };
}

export class MemoryCallHistoryStore implements CallHistoryStore {
  private readonly records = new Map<string, CallHistoryRecord>();
  private sequence = 0;

  public async create(input: NewCallHistoryRecord): Promise<CallHistoryRecord> {
    this.sequence += 1;
    const record: CallHistoryRecord = {
      id: String(this.sequence),
      remoteUri: input.remoteUri,
      direction: input.direction,
      status: input.status,
      startTime: new Date(input.startTime),
      connectTime: null,
      endTime: null,
      duration: 0,
      endReason: null,
      recordingPath: null,
      transcript: null,
      sentiment: null,
      summary: null,
    };
    this.records.set(record.id, record);
    return cloneRecord(record);
  }

  public async update(id: string, fields: CallHistoryUpdate): Promise<CallHistoryRecord> {
    const existing = this.records.get(id);
    if (!existing) {
      throw new CallControlError('NotFound', `call history record ${id} not found`);
    }

    const next: CallHistoryRecord = { ...existing, ...fields };
    this.records.set(id, next);
    return cloneRecord(next);
  }

  public async get(id: string): Promise<CallHistoryRecord | null> {
    const record = this.records.get(id);
    return record ? cloneRecord(record) : null;
  }

  public async list(options: ListOptions): Promise<CallHistoryRecord[]> {
    return [...this.records.values()]
      .sort((a, b) => b.startTime.getTime() - a.startTime.getTime() || Number(b.id) - Number(a.id))
      .slice(options.offset, options.offset + options.limit)
      .map(cloneRecord);
  }

  public size(): number {
    return this.records.size;
  }
}

import type { CallRecord } from "../types";

/**
 * Append-only log of completed calls for the lifetime of one client.
 * Records are frozen on entry and only frozen snapshots leave the store.
 */
export class CallHistory {
  private readonly records: CallRecord[] = [];

  append(record: CallRecord): Readonly<CallRecord> {
    const frozen = Object.freeze({
      ...record,
      messages: Object.freeze(
        record.messages.map((m) => Object.freeze({ ...m })),
      ),
    });
    this.records.push(frozen);
    return frozen;
  }

  snapshot(): readonly Readonly<CallRecord>[] {
    return Object.freeze(this.records.slice());
  }
}

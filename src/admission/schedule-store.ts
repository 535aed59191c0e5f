import { randomUUID } from "node:crypto";
import type { Interval, StoredInterval, WorkerScheduleSnapshot } from "../types.js";

/**
 * Persistence seam for the admission service.
 *
 * Implementations must only return intervals that belong to `workerId`.
 *
 * @category Admission
 */
export interface ScheduleStore {
  loadSnapshot(workerId: string): Promise<WorkerScheduleSnapshot>;
  /**
   * Inserts `interval` when it has no id, replaces the record with that id
   * otherwise. Resolves to the stored record.
   */
  saveInterval(workerId: string, interval: Interval): Promise<StoredInterval>;
}

interface WorkerRecords {
  rest: Map<string, StoredInterval>;
  work: Map<string, StoredInterval>;
}

function copyInterval(interval: StoredInterval): StoredInterval {
  return {
    id: interval.id,
    start: new Date(interval.start),
    end: new Date(interval.end),
    category: interval.category,
  };
}

/**
 * In-process {@link ScheduleStore}. Snapshots are deep copies, so callers can
 * not change stored records through them.
 *
 * @category Admission
 */
export class InMemoryScheduleStore implements ScheduleStore {
  #workers = new Map<string, WorkerRecords>();
  #generateId: () => string;

  constructor(options: { generateId?: () => string } = {}) {
    this.#generateId = options.generateId ?? randomUUID;
  }

  #records(workerId: string): WorkerRecords {
    let records = this.#workers.get(workerId);
    if (!records) {
      records = { rest: new Map(), work: new Map() };
      this.#workers.set(workerId, records);
    }
    return records;
  }

  async loadSnapshot(workerId: string): Promise<WorkerScheduleSnapshot> {
    const records = this.#workers.get(workerId);
    return {
      workerId,
      restIntervals: records ? [...records.rest.values()].map(copyInterval) : [],
      workIntervals: records ? [...records.work.values()].map(copyInterval) : [],
    };
  }

  async saveInterval(workerId: string, interval: Interval): Promise<StoredInterval> {
    const records = this.#records(workerId);
    const stored = copyInterval({ ...interval, id: interval.id ?? this.#generateId() });

    // A record may change category on update; it must not stay in both sets.
    if (stored.category === "REST") {
      records.work.delete(stored.id);
      records.rest.set(stored.id, stored);
    } else {
      records.rest.delete(stored.id);
      records.work.set(stored.id, stored);
    }

    return copyInterval(stored);
  }

  /** Seeds existing records, e.g. in tests. */
  async seed(workerId: string, intervals: readonly StoredInterval[]): Promise<void> {
    for (const interval of intervals) {
      await this.saveInterval(workerId, interval);
    }
  }
}

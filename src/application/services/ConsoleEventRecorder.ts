import { BrowserPort, PageConsoleEvent } from '../ports/BrowserPort';
import { ConsoleRecord, ConsoleRecordKind, formatLocation } from '../../domain/console/ConsoleRecord';
import { Logger, getLogger } from '../../infrastructure/logging';

/** Console levels that are recorded; everything else (log, info, debug, ...) is dropped */
const RECORDED_LEVELS = new Map<string, ConsoleRecordKind>([
  ['error', 'error'],
  ['warning', 'warning'],
]);

/**
 * Append-only log of console errors, console warnings and page errors
 * seen on the page during a run.
 *
 * Records keep arrival order. Repeated identical messages each get their own record.
 */
export class ConsoleEventRecorder {
  private readonly records: ConsoleRecord[] = [];
  private readonly logger: Logger;
  private attached = false;

  constructor(private readonly now: () => Date = () => new Date()) {
    this.logger = getLogger('Console');
  }

  /**
   * Subscribes to the browser's console events. Call before navigating.
   */
  attach(browser: BrowserPort): void {
    if (this.attached) {
      return;
    }
    this.attached = true;
    browser.onConsoleEvent(event => this.record(event));
  }

  /**
   * Turns a page event into a record. Returns the record, or null when the event is not kept.
   */
  record(event: PageConsoleEvent): ConsoleRecord | null {
    let record: ConsoleRecord;

    if (event.source === 'page') {
      record = ConsoleRecord.create({
        kind: 'page_error',
        message: event.message,
        timestamp: this.now(),
      });
    } else {
      const kind = RECORDED_LEVELS.get(event.level);
      if (!kind) {
        return null;
      }
      record = ConsoleRecord.create({
        kind,
        message: event.text,
        timestamp: this.now(),
        location: formatLocation(event.location),
      });
    }

    this.records.push(record);
    this.logger.debug(
      `${record.kind}: ${record.message}`,
      record.location ? { location: record.location } : undefined
    );
    return record;
  }

  getRecords(): ReadonlyArray<ConsoleRecord> {
    return [...this.records];
  }

  count(): number {
    return this.records.length;
  }
}

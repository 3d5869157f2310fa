/**
 * Kind of captured browser event.
 * - error / warning: console messages of that severity
 * - page_error: uncaught exception thrown by page script
 */
export type ConsoleRecordKind = 'error' | 'warning' | 'page_error';

export interface ConsoleRecordProps {
  kind: ConsoleRecordKind;
  message: string;
  timestamp: Date;
  /** `url:line:column` of the emitting script, when the browser reports one */
  location?: string;
}

/**
 * Serialized form written to the report file.
 */
export interface ConsoleRecordJSON {
  type: ConsoleRecordKind;
  message: string;
  timestamp: string;
  location?: string;
}

/**
 * Source position attached to a console message.
 */
export interface SourceLocation {
  url: string;
  lineNumber: number;
  columnNumber: number;
}

/**
 * Formats a source position as `url:line:column`.
 * Returns undefined when the browser did not attribute the message to a script.
 */
export function formatLocation(location?: SourceLocation): string | undefined {
  if (!location || !location.url) {
    return undefined;
  }
  return `${location.url}:${location.lineNumber}:${location.columnNumber}`;
}

/**
 * A single console error, console warning or page error captured during a run.
 * Immutable once created.
 */
export class ConsoleRecord {
  private readonly props: Readonly<ConsoleRecordProps>;

  private constructor(props: ConsoleRecordProps) {
    this.props = Object.freeze(props);
  }

  public static create(props: ConsoleRecordProps): ConsoleRecord {
    return new ConsoleRecord({
      ...props,
      timestamp: new Date(props.timestamp.getTime()),
    });
  }

  public get kind(): ConsoleRecordKind {
    return this.props.kind;
  }

  public get message(): string {
    return this.props.message;
  }

  public get timestamp(): Date {
    return new Date(this.props.timestamp.getTime());
  }

  public get location(): string | undefined {
    return this.props.location;
  }

  public toJSON(): ConsoleRecordJSON {
    const json: ConsoleRecordJSON = {
      type: this.props.kind,
      message: this.props.message,
      timestamp: this.props.timestamp.toISOString(),
    };
    if (this.props.location !== undefined) {
      json.location = this.props.location;
    }
    return json;
  }
}

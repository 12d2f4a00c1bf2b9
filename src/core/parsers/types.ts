export type Dialect = 'erb' | 'haml' | 'ruby';

export interface HelperInvocation {
  /** Helper name exactly as written, e.g. `edit_user_path`. */
  method: string;
  /** 1-based line in the scanned file. */
  line: number;
}

/** Returns true when the invocation should be kept (reported). */
export type InvocationFilter = (pathOrUrl: string) => boolean;

export interface ParserAdapter {
  readonly dialect: Dialect;
  run(filename: string, filter: InvocationFilter): HelperInvocation[];
}

export interface ParserFactory {
  readonly dialect: Dialect;
  /** Optional dialects degrade to a warning when they cannot be loaded. */
  readonly optional: boolean;
  load(): ParserAdapter;
}

export type DialectAvailability = 'available' | 'unavailable' | 'not-applicable';

/** One row of `w` output, stamped with the capture time. */
export interface LoginEntry {
  /** `YYYY-MM-DD HH:MM:SS`, or the bare date when the summary line carried no time. */
  readonly recordTime: string;
  readonly user: string;
  readonly tty: string;
  readonly from: string;
  /** The `LOGIN@` column. */
  readonly loginAt: string;
  readonly idle: string;
  readonly jcpu: string;
  readonly pcpu: string;
  /** Rest of the line, internal whitespace kept. */
  readonly what: string;
}

/** Store column names in insert order. */
export const LOGIN_ENTRY_COLUMNS = [
  "record_time",
  "user",
  "tty",
  "from",
  "login@",
  "idle",
  "jcpu",
  "pcpu",
  "what",
] as const;

export type LoginEntryColumn = (typeof LOGIN_ENTRY_COLUMNS)[number];

/** The nine column values of an entry, in LOGIN_ENTRY_COLUMNS order. */
export function toColumnValues(entry: LoginEntry): string[] {
  return [
    entry.recordTime,
    entry.user,
    entry.tty,
    entry.from,
    entry.loginAt,
    entry.idle,
    entry.jcpu,
    entry.pcpu,
    entry.what,
  ];
}

/** Identity of an entry in the store: (user, record_time, tty). */
export function loginEntryKey(entry: LoginEntry): string {
  return `${entry.user}\u0000${entry.recordTime}\u0000${entry.tty}`;
}

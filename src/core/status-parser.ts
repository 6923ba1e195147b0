/**
 * Status Parser — turns the text printed by `w` into LoginEntry records.
 *
 * Expected layout:
 * ```
 *  10:15:32 up 2 days,  3:04,  2 users,  load average: 0.00, 0.01, 0.05
 * USER     TTY      FROM             LOGIN@   IDLE   JCPU   PCPU WHAT
 * alice    pts/0    10.0.0.5         09:00    0.00s  0.10s  0.01s -bash
 * ```
 * The first two lines are never data. Every later line that does not split
 * into eight columns is dropped.
 *
 * @module
 */

import type { LoginEntry } from "../types/login-entry.js";

const HEADER_LINES = 2;
const TIME_OF_DAY = /(\d{2}:\d{2}:\d{2})/;
const ROW = /^\s*(\S+)\s+(\S+)\s+(\S+)\s+(\S+)\s+(\S+)\s+(\S+)\s+(\S+)\s+(\S.*)$/;

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local calendar date as `YYYY-MM-DD`. */
export function formatLocalDate(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

/** The first `HH:MM:SS` in the summary line, if any. `w` prints the clock first. */
export function extractTimeOfDay(summaryLine: string): string | undefined {
  return TIME_OF_DAY.exec(summaryLine)?.[1];
}

/** Parse one data line. Returns null when the line does not have eight columns. */
export function parseStatusRow(line: string, recordTime: string): LoginEntry | null {
  const match = ROW.exec(line);
  if (!match) return null;
  const [, user, tty, from, loginAt, idle, jcpu, pcpu, what] = match;
  return { recordTime, user, tty, from, loginAt, idle, jcpu, pcpu, what };
}

/**
 * Parse the full output of `w`. Only `now` is read from outside the input, for
 * the date part of each record's timestamp.
 */
export function parseStatusOutput(rawOutput: string, now: Date = new Date()): LoginEntry[] {
  const lines = rawOutput.split(/\r?\n/);
  const date = formatLocalDate(now);
  const time = extractTimeOfDay(lines[0] ?? "");
  const recordTime = time ? `${date} ${time}` : date;

  const entries: LoginEntry[] = [];
  for (const line of lines.slice(HEADER_LINES)) {
    const entry = parseStatusRow(line, recordTime);
    if (entry) entries.push(entry);
  }
  return entries;
}

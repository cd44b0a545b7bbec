/**
 * Append-only storage for newsletter signups
 */

import { appendFile, mkdir } from 'fs/promises';
import { dirname } from 'path';

/**
 * Destination for accepted signups
 */
export interface SignupSink {
  append(email: string): Promise<void>;
}

/**
 * Format one signup line: `<ISO timestamp>,<email>\n`.
 * Line breaks are removed from the address so one signup stays on one line.
 */
export function formatSignupLine(email: string, at: Date = new Date()): string {
  return `${at.toISOString()},${email.replace(/[\r\n]/g, '')}\n`;
}

/**
 * Appends signups to a CSV-style file.
 * Writes are serialized: each append waits for the previous one to settle.
 */
export class SignupStore implements SignupSink {
  private tail: Promise<void> = Promise.resolve();

  constructor(
    readonly filePath: string,
    private readonly clock: () => Date = () => new Date()
  ) {}

  append(email: string): Promise<void> {
    const next = this.tail.then(() => this.write(email));
    // Keep the chain alive after a failed write; the caller still sees the rejection
    this.tail = next.catch(() => undefined);
    return next;
  }

  private async write(email: string): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await appendFile(this.filePath, formatSignupLine(email, this.clock()), 'utf-8');
  }
}

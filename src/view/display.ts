/**
 * Output sinks for rendered tables
 */

const CLEAR_SCREEN = '\x1b[H\x1b[2J';

export interface Display {
  paint(lines: readonly string[]): void;
}

/**
 * Where tables are written; process.stdout satisfies it
 */
export interface TableOutput {
  isTTY?: boolean;
  write(chunk: string): unknown;
}

/**
 * Interactive mode repaints the screen in place; batch mode appends each table
 * followed by a blank line.
 */
export class TerminalDisplay implements Display {
  private readonly stream: TableOutput;
  private readonly interactive: boolean;

  constructor(stream: TableOutput, interactive: boolean) {
    this.stream = stream;
    this.interactive = interactive;
  }

  paint(lines: readonly string[]): void {
    const body = lines.join('\n');
    this.stream.write(this.interactive ? `${CLEAR_SCREEN}${body}\n` : `${body}\n\n`);
  }
}

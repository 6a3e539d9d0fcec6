/**
 * Splits streamed tool output into lines.
 *
 * esptool redraws its progress indicator with a bare `\r`, so `\r`, `\n`
 * and `\r\n` all end a line. Blank lines are dropped, which also absorbs a
 * `\r\n` pair split across two chunks.
 */
export class LineSplitter {
  private pending = '';

  push(chunk: string): string[] {
    const parts = (this.pending + chunk).split(/\r\n|\r|\n/);
    this.pending = parts.pop() ?? '';
    return this.clean(parts);
  }

  flush(): string[] {
    const rest = this.pending;
    this.pending = '';
    return this.clean([rest]);
  }

  private clean(parts: string[]): string[] {
    return parts.map(part => part.trimEnd()).filter(part => part.length > 0);
  }
}

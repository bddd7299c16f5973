/**
 * @fileoverview Streaming JSONL parser with line buffering.
 *
 * The hook activity log is appended to while the daemon reads it, so a read
 * can end in the middle of a record. This parser buffers incomplete lines
 * until their newline arrives and reports malformed lines without stopping.
 *
 * @module services/JsonlParser
 */

/**
 * Options for JsonlParser constructor.
 */
export interface JsonlParserOptions {
  /**
   * Callback invoked for each line that parsed to a JSON object.
   * The value is unvalidated; callers check its shape.
   */
  onRecord: (record: unknown, line: string) => void;

  /**
   * Optional callback for lines that are not JSON objects.
   */
  onError?: (error: Error, line: string) => void;
}

/**
 * Streaming JSONL parser with line buffering.
 *
 * @example
 * ```typescript
 * const parser = new JsonlParser({
 *   onRecord: (record) => records.push(record),
 *   onError: (error, line) => logDebug(`skipped: ${error.message}`),
 * });
 *
 * stream.on('data', (chunk: string) => parser.processChunk(chunk));
 * stream.on('end', () => parser.flush());
 * ```
 */
export class JsonlParser {
  /** Internal buffer for incomplete lines */
  private buffer: string = '';

  /** Number of lines parsed successfully */
  private parsedCount = 0;

  /** Number of lines rejected */
  private errorCount = 0;

  private readonly onRecord: (record: unknown, line: string) => void;
  private readonly onError?: (error: Error, line: string) => void;

  constructor(options: JsonlParserOptions) {
    this.onRecord = options.onRecord;
    this.onError = options.onError;
  }

  /**
   * Processes a chunk of data from a stream.
   *
   * May contain partial lines - incomplete content is buffered
   * until the next chunk arrives with a newline delimiter.
   */
  processChunk(chunk: string): void {
    this.buffer += chunk;

    const lines = this.buffer.split('\n');

    // Last element may be incomplete
    this.buffer = lines.pop() || '';

    for (const line of lines) {
      this.parseLine(line);
    }
  }

  /**
   * Flushes any remaining buffered content.
   *
   * Should be called at end of stream to process the final
   * line if it doesn't end with a newline.
   */
  flush(): void {
    if (this.buffer.trim().length > 0) {
      this.parseLine(this.buffer);
    }
    this.buffer = '';
  }

  /**
   * Counts of parsed and rejected lines so far.
   */
  getStats(): { parsed: number; errors: number } {
    return { parsed: this.parsedCount, errors: this.errorCount };
  }

  private parseLine(line: string): void {
    const trimmed = line.trim();

    if (trimmed.length === 0) {
      return;
    }

    // JSONL records must be objects
    if (!trimmed.startsWith('{')) {
      this.reject(new Error('Line does not start with { - not valid JSONL'), line);
      return;
    }

    let record: unknown;
    try {
      record = JSON.parse(trimmed);
    } catch (error) {
      this.reject(error instanceof Error ? error : new Error(String(error)), line);
      return;
    }

    this.parsedCount++;
    this.onRecord(record, trimmed);
  }

  private reject(error: Error, line: string): void {
    this.errorCount++;
    this.onError?.(error, line);
  }
}

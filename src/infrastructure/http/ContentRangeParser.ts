/**
 * Parsed Content-Range response header
 */
export type ContentRange =
  | { type: 'range'; start: number; end: number; total: number | null }
  | { type: 'unsatisfied'; total: number };

export type ContentRangeParseResult =
  | { success: true; value: ContentRange }
  | { success: false; message: string };

/**
 * Parses `bytes START-END/TOTAL`, `bytes START-END/*` and the
 * unsatisfied form that carries only the total
 */
export class ContentRangeParser {
  private static readonly RANGE = /^bytes\s+(\d+)-(\d+)\/(\d+|\*)$/i;
  private static readonly UNSATISFIED = /^bytes\s+\*\/(\d+)$/i;

  static parse(header: string): ContentRangeParseResult {
    const value = header.trim();

    const unsatisfied = this.UNSATISFIED.exec(value);
    if (unsatisfied) {
      return { success: true, value: { type: 'unsatisfied', total: Number(unsatisfied[1]) } };
    }

    const match = this.RANGE.exec(value);
    if (!match) {
      return { success: false, message: `Invalid Content-Range: '${header}'` };
    }

    const start = Number(match[1]);
    const end = Number(match[2]);
    if (end < start) {
      return { success: false, message: `Content-Range end ${end} < start ${start}` };
    }

    const total = match[3] === '*' ? null : Number(match[3]);
    return { success: true, value: { type: 'range', start, end, total } };
  }
}

import { Option } from 'effect';
import { StringDecoder } from 'node:string_decoder';

const LF = 0x0a;
const CR = 0x0d;

/**
 * Turns the raw bytes of one pipe into logical lines.
 *
 * A carriage return rewinds the line the way a terminal does: whatever was
 * written since the last line feed is dropped and nothing is emitted. A
 * carriage return directly followed by a line feed ends the line instead, so
 * CRLF output keeps its content.
 */
export class LineBuffer {
  private readonly decoder = new StringDecoder('utf8');
  private line = '';
  private carriageReturn = false;

  push(data: Buffer | string): Array<string> {
    return this.consume(typeof data === 'string' ? data : this.decoder.write(data));
  }

  /** Flushes the decoder and returns the unterminated remainder, if any. */
  end(): { readonly records: Array<string>; readonly rest: Option.Option<string> } {
    const records = this.consume(this.decoder.end());
    if (this.carriageReturn) {
      this.carriageReturn = false;
      this.line = '';
    }
    const rest = this.line;
    this.line = '';
    return { records, rest: rest.length > 0 ? Option.some(rest) : Option.none() };
  }

  private consume(text: string): Array<string> {
    const records: Array<string> = [];
    let start = 0;

    for (let i = 0; i < text.length; i++) {
      const code = text.charCodeAt(i);

      if (this.carriageReturn) {
        this.carriageReturn = false;
        if (code !== LF) {
          this.line = '';
        }
      }

      if (code === LF) {
        records.push(this.line + text.slice(start, i));
        this.line = '';
        start = i + 1;
      } else if (code === CR) {
        this.line += text.slice(start, i);
        this.carriageReturn = true;
        start = i + 1;
      }
    }

    this.line += text.slice(start);
    return records;
  }
}

import type { Middleware, RequestContext, ResponseContext } from '@kubernetes/client-node';
import { getLogger } from '@fluidware-it/saddlebag';
import type { WarningHeaderValue } from '../types/k8s';
import type { WarningHandler } from '../types/violations';

const logger = getLogger();

class HeaderReader {
  private pos = 0;

  constructor(private readonly input: string) {}

  get done(): boolean {
    return this.pos >= this.input.length;
  }

  skipSpaces(): void {
    while (this.input[this.pos] === ' ' || this.input[this.pos] === '\t') this.pos++;
  }

  peek(): string | undefined {
    return this.input[this.pos];
  }

  expect(char: string): void {
    if (this.input[this.pos] !== char) {
      throw new Error(`expected '${char}' at offset ${this.pos}`);
    }
    this.pos++;
  }

  token(): string {
    const start = this.pos;
    while (!this.done && this.input[this.pos] !== ' ' && this.input[this.pos] !== '\t') this.pos++;
    return this.input.slice(start, this.pos);
  }

  quoted(): string {
    this.expect('"');
    let value = '';
    while (!this.done) {
      const char = this.input[this.pos++];
      if (char === undefined) break;
      if (char === '"') return value;
      if (char === '\\') {
        const escaped = this.input[this.pos++];
        if (escaped === undefined) break;
        value += escaped;
      } else {
        value += char;
      }
    }
    throw new Error('unterminated quoted string');
  }
}

export interface WarningHeaderParseResult {
  values: WarningHeaderValue[];
  error?: string;
}

// Decode a Warning header as sent by the API server:
//   299 - "first warning", 299 - "second warning"
// Values are `<3-digit code> <agent> "<text>"` with an optional quoted date.
// Decoding stops at the first malformed value; the values before it are kept.
export function parseWarningHeader(header: string): WarningHeaderParseResult {
  const reader = new HeaderReader(header);
  const values: WarningHeaderValue[] = [];

  try {
    readValues(reader, values);
  } catch (error: unknown) {
    return { values, error: error instanceof Error ? error.message : String(error) };
  }
  return { values };
}

function readValues(reader: HeaderReader, values: WarningHeaderValue[]): void {
  reader.skipSpaces();
  while (!reader.done) {
    const codeToken = reader.token();
    if (!/^\d{3}$/.test(codeToken)) {
      throw new Error(`invalid warning code "${codeToken}"`);
    }
    reader.expect(' ');
    const agent = reader.token();
    if (!agent) throw new Error('missing warning agent');
    reader.expect(' ');
    const text = reader.quoted();

    reader.skipSpaces();
    if (reader.peek() === '"') reader.quoted(); // warn-date

    values.push({ code: Number(codeToken), agent, text });

    reader.skipSpaces();
    if (reader.done) break;
    reader.expect(',');
    reader.skipSpaces();
  }
}

function warningHeaders(context: ResponseContext): string[] {
  return Object.entries(context.headers)
    .filter(([name]) => name.toLowerCase() === 'warning')
    .map(([, value]) => value);
}

// Response middleware that hands every Warning header value to the handler.
// It only observes: a broken header is logged and the response passes through untouched.
export function warningMiddleware(handler: WarningHandler): Middleware {
  return {
    pre: async (context: RequestContext) => context,
    post: async (context: ResponseContext) => {
      for (const header of warningHeaders(context)) {
        const { values, error } = parseWarningHeader(header);
        if (error) {
          logger.warn(`Malformed Warning header (${error}), dropping the rest of: ${header}`);
        }
        for (const { code, agent, text } of values) {
          try {
            handler.handle(code, agent, text);
          } catch (handlerError: unknown) {
            const message = handlerError instanceof Error ? handlerError.message : String(handlerError);
            logger.error(`Warning handler failed on "${text}": ${message}`);
          }
        }
      }
      return context;
    }
  };
}

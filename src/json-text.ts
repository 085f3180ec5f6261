/**
 * Order-preserving JSON reader and compact writer for archive headers.
 *
 * Objects are read into Maps so every member name keeps its position,
 * including integer-like names and `__proto__`.
 */
import type { JsonObject, JsonValue } from './types/archive-header.js';

const WHITESPACE = /[ \t\n\r]*/y;
const STRING = /"(?:[^"\\\u0000-\u001f]|\\(?:["\\/bfnrt]|u[0-9a-fA-F]{4}))*"/y;
const NUMBER = /-?(?:0|[1-9][0-9]*)(?:\.[0-9]+)?(?:[eE][+-]?[0-9]+)?/y;
const LITERAL = /true|false|null/y;

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return value instanceof Map;
}

class JsonReader {
  private position = 0;

  constructor(private readonly text: string) {}

  read(): JsonValue {
    const value = this.value();
    this.match(WHITESPACE);
    if (this.position !== this.text.length) {
      this.fail('end of input');
    }
    return value;
  }

  private match(pattern: RegExp): string | undefined {
    pattern.lastIndex = this.position;
    const found = pattern.exec(this.text);
    if (!found) {
      return undefined;
    }
    this.position = pattern.lastIndex;
    return found[0];
  }

  private fail(expected: string): never {
    throw new SyntaxError(`Expected ${expected} at position ${this.position}`);
  }

  private expect(char: string): void {
    this.match(WHITESPACE);
    if (this.text[this.position] !== char) {
      this.fail(`"${char}"`);
    }
    this.position++;
  }

  private value(): JsonValue {
    this.match(WHITESPACE);
    switch (this.text[this.position]) {
      case '{':
        return this.object();
      case '[':
        return this.array();
      case '"':
        return this.string();
    }
    const literal = this.match(LITERAL);
    if (literal !== undefined) {
      return literal === 'null' ? null : literal === 'true';
    }
    const number = this.match(NUMBER);
    if (number !== undefined) {
      return Number(number);
    }
    return this.fail('a JSON value');
  }

  private string(): string {
    const token = this.match(STRING);
    if (token === undefined) {
      return this.fail('a string');
    }
    const decoded: unknown = JSON.parse(token);
    if (typeof decoded !== 'string') {
      return this.fail('a string');
    }
    return decoded;
  }

  private object(): JsonObject {
    this.expect('{');
    const members = new Map<string, JsonValue>();
    this.match(WHITESPACE);
    if (this.text[this.position] === '}') {
      this.position++;
      return members;
    }
    for (;;) {
      this.match(WHITESPACE);
      const nameAt = this.position;
      const name = this.string();
      if (members.has(name)) {
        throw new SyntaxError(`Duplicate member ${JSON.stringify(name)} at position ${nameAt}`);
      }
      this.expect(':');
      members.set(name, this.value());
      this.match(WHITESPACE);
      if (this.text[this.position] !== ',') {
        this.expect('}');
        return members;
      }
      this.position++;
    }
  }

  private array(): JsonValue[] {
    this.expect('[');
    const items: JsonValue[] = [];
    this.match(WHITESPACE);
    if (this.text[this.position] === ']') {
      this.position++;
      return items;
    }
    for (;;) {
      items.push(this.value());
      this.match(WHITESPACE);
      if (this.text[this.position] !== ',') {
        this.expect(']');
        return items;
      }
      this.position++;
    }
  }
}

/**
 * Parses JSON text, keeping object members in document order.
 * Duplicate member names are rejected since a Map can hold only one of them.
 *
 * @throws {SyntaxError} If `text` is not a single JSON value
 */
export function readJson(text: string): JsonValue {
  return new JsonReader(text).read();
}

/**
 * Compact JSON text, members in Map order. Same output as `JSON.stringify`
 * for values whose member names are not integer-like.
 */
export function writeJson(value: JsonValue): string {
  if (isJsonObject(value)) {
    const members: string[] = [];
    for (const [name, member] of value) {
      members.push(`${JSON.stringify(name)}:${writeJson(member)}`);
    }
    return `{${members.join(',')}}`;
  }
  if (Array.isArray(value)) {
    return `[${value.map(writeJson).join(',')}]`;
  }
  return JSON.stringify(value);
}

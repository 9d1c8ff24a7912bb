import { BaseRecordValidator } from "./base-record.validator";

const MAX_CHARACTER_STRING = 255;
const PRINTABLE_ASCII = /^[\x20-\x7e]*$/;

/**
 * Splits `"a" "b"` into its character-strings (escapes kept). Returns null
 * when a quote is left open or text sits outside the quotes.
 */
export function splitQuotedStrings(value: string): string[] | null {
  const chunks: string[] = [];
  let index = 0;

  while (index < value.length) {
    if (value[index] !== '"') {
      return null;
    }

    let chunk = "";
    let cursor = index + 1;
    while (cursor < value.length && value[cursor] !== '"') {
      if (value[cursor] === "\\") {
        if (cursor + 1 >= value.length) {
          return null;
        }
        chunk += value.slice(cursor, cursor + 2);
        cursor += 2;
        continue;
      }
      chunk += value[cursor];
      cursor += 1;
    }
    if (cursor >= value.length) {
      return null;
    }

    chunks.push(chunk);
    index = cursor + 1;

    if (index < value.length) {
      if (!/\s/.test(value[index])) {
        return null;
      }
      while (index < value.length && /\s/.test(value[index])) {
        index += 1;
      }
    }
  }

  return chunks;
}

const unescapedLength = (chunk: string): number =>
  chunk.replace(/\\(.)/g, "$1").length;

/**
 * Quotes plain text, cutting it into character-strings of at most 255
 * characters.
 */
export function quoteText(text: string): string {
  const escaped: string[] = [];
  let current = "";
  let currentLength = 0;

  for (const char of text) {
    if (currentLength === MAX_CHARACTER_STRING) {
      escaped.push(current);
      current = "";
      currentLength = 0;
    }
    current += char === '"' || char === "\\" ? `\\${char}` : char;
    currentLength += 1;
  }
  escaped.push(current);

  return escaped.map((chunk) => `"${chunk}"`).join(" ");
}

export class TxtRecordValidator extends BaseRecordValidator {
  constructor(protected readonly type: string = "TXT") {
    super();
  }

  protected validateContent(content: string, errors: string[]): string {
    const trimmed = content.trim();
    if (trimmed === "") {
      errors.push(`${this.type} content must not be empty.`);
      return content;
    }
    if (!PRINTABLE_ASCII.test(trimmed)) {
      errors.push(
        `${this.type} content may only contain printable ASCII characters.`,
      );
      return content;
    }

    if (!trimmed.startsWith('"')) {
      const quoted = quoteText(trimmed);
      this.validateText([trimmed], errors);
      return quoted;
    }

    const chunks = splitQuotedStrings(trimmed);
    if (!chunks) {
      errors.push(
        `Invalid ${this.type} content. Quoted strings must be closed and inner quotes escaped.`,
      );
      return content;
    }
    if (chunks.some((chunk) => unescapedLength(chunk) > MAX_CHARACTER_STRING)) {
      errors.push(
        `Invalid ${this.type} content. Each quoted string is limited to ${MAX_CHARACTER_STRING} characters.`,
      );
    }
    this.validateText(
      chunks.map((chunk) => chunk.replace(/\\(.)/g, "$1")),
      errors,
    );
    return trimmed;
  }

  /** Hook for types that constrain the text itself. */
  protected validateText(_strings: string[], _errors: string[]): void {}
}

export class SpfRecordValidator extends TxtRecordValidator {
  constructor() {
    super("SPF");
  }

  protected validateText(strings: string[], errors: string[]): void {
    const text = strings.join("");
    if (!/^v=spf1(\s|$)/.test(text)) {
      errors.push("SPF content must start with v=spf1.");
    }
  }
}

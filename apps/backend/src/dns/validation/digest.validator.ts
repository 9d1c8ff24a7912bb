import { BaseRecordValidator } from "./base-record.validator";
import { parseBoundedInteger, splitFields } from "./record-validation.util";

/**
 * Content made of one-octet numeric fields followed by a hex digest, as in
 * SSHFP (`<algorithm> <fp-type> <fingerprint>`) and TLSA
 * (`<usage> <selector> <matching-type> <data>`).
 */
export class DigestRecordValidator extends BaseRecordValidator {
  constructor(
    private readonly type: string,
    private readonly numericFields: readonly string[],
    private readonly digestField: string,
  ) {
    super();
  }

  protected validateContent(content: string, errors: string[]): string {
    const fields = splitFields(content);
    const expected = this.numericFields.length + 1;
    if (fields.length !== expected) {
      const layout = [...this.numericFields, this.digestField]
        .map((field) => `<${field}>`)
        .join(" ");
      errors.push(
        `Invalid ${this.type} content. It must contain ${expected} fields: ${layout}`,
      );
      return content;
    }

    this.numericFields.forEach((field, index) => {
      if (parseBoundedInteger(fields[index], 255) === null) {
        errors.push(
          `Invalid ${this.type} ${field}. It should be numeric (0-255).`,
        );
      }
    });
    if (!/^[0-9a-f]+$/i.test(fields[expected - 1])) {
      errors.push(
        `Invalid ${this.type} ${this.digestField}. It must be hexadecimal.`,
      );
    }

    return content;
  }
}

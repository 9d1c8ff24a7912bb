import { BaseRecordValidator } from "./base-record.validator";
import { parseBoundedInteger } from "./record-validation.util";

const CAA_PATTERN = /^(\S+)\s+([A-Za-z0-9]+)\s+"((?:[^"\\]|\\.)*)"$/;

export class CaaRecordValidator extends BaseRecordValidator {
  protected validateContent(content: string, errors: string[]): string {
    const match = CAA_PATTERN.exec(content.trim());
    if (!match) {
      errors.push(
        'Invalid CAA content. It must have the form <flags> <tag> "<value>"',
      );
      return content;
    }

    if (parseBoundedInteger(match[1], 255) === null) {
      errors.push("Invalid CAA flags. It should be numeric (0-255).");
    }
    return content;
  }
}

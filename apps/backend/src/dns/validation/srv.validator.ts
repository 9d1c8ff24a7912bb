import { BaseRecordValidator } from "./base-record.validator";
import {
  MAX_NAME_LENGTH,
  MAX_PRIORITY,
  isValidHostname,
  parseBoundedInteger,
  splitFields,
} from "./record-validation.util";

const SRV_NAME_PATTERN = /^_[a-z0-9-]+\._[a-z0-9-]+\.(?!_)(.+)$/i;

/**
 * SRV owner names are `_service._protocol.domain`; content is
 * `<weight> <port> <target>` with the priority held in its own field.
 */
export class SrvRecordValidator extends BaseRecordValidator {
  protected readonly defaultPriority = 10;
  protected readonly usesPriority = true;

  protected validateName(name: string, errors: string[]): void {
    if (name.length > MAX_NAME_LENGTH) {
      errors.push(
        `Invalid SRV name. It must not exceed ${MAX_NAME_LENGTH} characters.`,
      );
      return;
    }

    const match = SRV_NAME_PATTERN.exec(name);
    if (!match || !isValidHostname(match[1])) {
      errors.push(
        "Invalid SRV name. It must have the form _service._protocol.domain",
      );
    }
  }

  protected validateContent(content: string, errors: string[]): string {
    const fields = splitFields(content);
    if (fields.length !== 3) {
      errors.push(
        "Invalid SRV content. It must contain exactly three fields: <weight> <port> <target>",
      );
      return content;
    }

    const [weight, port, target] = fields;
    if (parseBoundedInteger(weight, MAX_PRIORITY) === null) {
      errors.push(
        `Invalid SRV weight. It should be numeric (0-${MAX_PRIORITY}).`,
      );
    }
    if (parseBoundedInteger(port, MAX_PRIORITY) === null) {
      errors.push(`Invalid SRV port. It should be numeric (0-${MAX_PRIORITY}).`);
    }
    if (target !== "." && !isValidHostname(target)) {
      errors.push(`Invalid SRV target hostname: ${target}`);
    }

    return content;
  }
}

import { BaseRecordValidator } from "./base-record.validator";
import {
  MAX_UINT32,
  isValidHostname,
  parseBoundedInteger,
  splitFields,
} from "./record-validation.util";

const TIMER_FIELDS = ["serial", "refresh", "retry", "expire", "minimum"];

export class SoaRecordValidator extends BaseRecordValidator {
  protected validateContent(content: string, errors: string[]): string {
    const fields = splitFields(content);
    if (fields.length !== 7) {
      errors.push(
        "Invalid SOA content. It must contain seven fields: <mname> <rname> <serial> <refresh> <retry> <expire> <minimum>",
      );
      return content;
    }

    const [mname, rname, ...timers] = fields;
    if (!isValidHostname(mname)) {
      errors.push(`Invalid SOA primary name server: ${mname}`);
    }
    if (!isValidHostname(rname)) {
      errors.push(`Invalid SOA hostmaster address: ${rname}`);
    }
    timers.forEach((value, index) => {
      if (parseBoundedInteger(value, MAX_UINT32) === null) {
        errors.push(
          `Invalid SOA ${TIMER_FIELDS[index]}. It should be numeric (0-${MAX_UINT32}).`,
        );
      }
    });

    return content;
  }
}

import { BaseRecordValidator } from "./base-record.validator";
import { isValidHostname } from "./record-validation.util";

/**
 * Types whose content is a single domain name (CNAME, DNAME, NS, PTR, ALIAS).
 */
export class HostnameTargetValidator extends BaseRecordValidator {
  constructor(private readonly type: string) {
    super();
  }

  protected validateContent(content: string, errors: string[]): string {
    if (!isValidHostname(content)) {
      errors.push(`Invalid ${this.type} target hostname: ${content}`);
    }
    return content;
  }
}

export class MxRecordValidator extends HostnameTargetValidator {
  protected readonly defaultPriority = 10;
  protected readonly usesPriority = true;

  constructor() {
    super("MX");
  }
}

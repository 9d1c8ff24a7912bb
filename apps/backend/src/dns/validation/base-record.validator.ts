import type {
  FieldInput,
  RecordValidator,
  ValidationResult,
} from "./record-validation.types";
import {
  invalidResult,
  normalizePriority,
  normalizeTtl,
  validResult,
  validateRecordName,
} from "./record-validation.util";

/**
 * Runs the checks every record type shares (owner name, priority, TTL)
 * around the type-specific content grammar. Errors are collected in the
 * order name, content, priority, TTL.
 */
export abstract class BaseRecordValidator implements RecordValidator {
  /** Priority used when the field is left blank. */
  protected readonly defaultPriority: number = 0;

  /** When false the record carries priority 0 whatever was submitted. */
  protected readonly usesPriority: boolean = false;

  validate(
    content: string,
    name: string,
    prio: FieldInput,
    ttl: FieldInput,
    defaultTtl: number,
  ): ValidationResult {
    const errors: string[] = [];

    this.validateName(name, errors);
    const normalizedContent = this.validateContent(content, errors);
    const normalizedPrio = normalizePriority(
      prio,
      this.defaultPriority,
      errors,
    );
    const normalizedTtl = normalizeTtl(ttl, defaultTtl, errors);

    if (errors.length > 0) {
      return invalidResult(errors);
    }

    return validResult({
      name,
      content: normalizedContent,
      ttl: normalizedTtl,
      prio: this.usesPriority ? normalizedPrio : 0,
    });
  }

  protected validateName(name: string, errors: string[]): void {
    validateRecordName(name, errors);
  }

  /**
   * Pushes content errors and returns the content to store.
   */
  protected abstract validateContent(content: string, errors: string[]): string;
}

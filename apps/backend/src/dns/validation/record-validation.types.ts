export type FieldInput = number | string | null | undefined;

export interface RecordData {
  name: string;
  content: string;
  ttl: number;
  prio: number;
}

export type ValidationResult =
  | { valid: true; data: RecordData }
  | { valid: false; errors: string[] };

export interface RecordValidator {
  validate(
    content: string,
    name: string,
    prio: FieldInput,
    ttl: FieldInput,
    defaultTtl: number,
  ): ValidationResult;
}

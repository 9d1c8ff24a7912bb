import { isReverseZone, stripTrailingDot } from "../name-rules.util";
import type {
  FieldInput,
  RecordData,
  ValidationResult,
} from "./record-validation.types";

export const MAX_NAME_LENGTH = 255;
export const MAX_TTL = 2_147_483_647;
export const MAX_PRIORITY = 65_535;
export const MAX_UINT32 = 4_294_967_295;

const LABEL_PATTERN = /^[a-z0-9_](?:[a-z0-9_-]{0,61}[a-z0-9_])?$/i;
const CIDR_LABEL_PATTERN = /^[a-z0-9_-]+(?:\/\d+)?$/i;

export const TTL_ERROR = `Invalid value for TTL field. It should be numeric (0-${MAX_TTL}).`;
export const PRIORITY_ERROR = `Invalid value for priority field. It should be numeric (0-${MAX_PRIORITY}).`;

export const validResult = (data: RecordData): ValidationResult => ({
  valid: true,
  data,
});

export const invalidResult = (errors: string[]): ValidationResult => ({
  valid: false,
  errors,
});

/** Returns null for a field left empty in the form. */
export function filledValue(value: FieldInput): string | number | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === "string" && value.trim() === "") {
    return null;
  }
  return value;
}

export function parseUnsignedInteger(value: string | number): number | null {
  if (typeof value === "number") {
    return Number.isInteger(value) && value >= 0 ? value : null;
  }
  const trimmed = value.trim();
  return /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
}

export function parseBoundedInteger(
  value: string | number,
  max: number,
): number | null {
  const parsed = parseUnsignedInteger(value);
  return parsed !== null && parsed <= max ? parsed : null;
}

export interface HostnameOptions {
  allowWildcard?: boolean;
  /** Permits `/` inside labels, used by classless reverse delegations. */
  allowCidrLabels?: boolean;
}

export function isValidHostname(
  value: string,
  options: HostnameOptions = {},
): boolean {
  const name = stripTrailingDot(value);
  if (name.length === 0 || name.length > MAX_NAME_LENGTH) {
    return false;
  }

  const labels = name.split(".");
  return labels.every((label, index) => {
    if (label === "*" && index === 0 && options.allowWildcard) {
      return true;
    }
    if (label.length === 0 || label.length > 63) {
      return false;
    }
    if (label.startsWith("-") || label.endsWith("-")) {
      return false;
    }
    if (options.allowCidrLabels) {
      return CIDR_LABEL_PATTERN.test(label);
    }
    return LABEL_PATTERN.test(label);
  });
}

/** Owner-name check shared by every record type. */
export function validateRecordName(name: string, errors: string[]): void {
  if (name.length > MAX_NAME_LENGTH) {
    errors.push(
      `Invalid hostname. It must not exceed ${MAX_NAME_LENGTH} characters.`,
    );
    return;
  }
  const valid = isValidHostname(name, {
    allowWildcard: true,
    allowCidrLabels: isReverseZone(name),
  });
  if (!valid) {
    errors.push(`Invalid hostname: ${name}`);
  }
}

export function normalizeTtl(
  ttl: FieldInput,
  defaultTtl: number,
  errors: string[],
): number {
  const value = filledValue(ttl);
  if (value === null) {
    return defaultTtl;
  }
  const parsed = parseBoundedInteger(value, MAX_TTL);
  if (parsed === null) {
    errors.push(TTL_ERROR);
    return defaultTtl;
  }
  return parsed;
}

export function normalizePriority(
  prio: FieldInput,
  defaultPriority: number,
  errors: string[],
): number {
  const value = filledValue(prio);
  if (value === null) {
    return defaultPriority;
  }
  const parsed = parseBoundedInteger(value, MAX_PRIORITY);
  if (parsed === null) {
    errors.push(PRIORITY_ERROR);
    return defaultPriority;
  }
  return parsed;
}

export function splitFields(content: string): string[] {
  const trimmed = content.trim();
  return trimmed === "" ? [] : trimmed.split(/\s+/);
}

import { Injectable } from "@nestjs/common";
import { AddressRecordValidator } from "./address.validator";
import { CaaRecordValidator } from "./caa.validator";
import { DigestRecordValidator } from "./digest.validator";
import {
  HostnameTargetValidator,
  MxRecordValidator,
} from "./hostname-target.validator";
import type {
  FieldInput,
  RecordValidator,
  ValidationResult,
} from "./record-validation.types";
import { invalidResult } from "./record-validation.util";
import { SoaRecordValidator } from "./soa.validator";
import { SrvRecordValidator } from "./srv.validator";
import { SpfRecordValidator, TxtRecordValidator } from "./txt.validator";

export const RECORD_TYPES = [
  "A",
  "AAAA",
  "ALIAS",
  "CAA",
  "CNAME",
  "DNAME",
  "MX",
  "NS",
  "PTR",
  "SOA",
  "SPF",
  "SRV",
  "SSHFP",
  "TLSA",
  "TXT",
] as const;

export type RecordType = (typeof RECORD_TYPES)[number];

const RECORD_TYPE_SET: ReadonlySet<string> = new Set(RECORD_TYPES);

export function isRecordType(value: string): value is RecordType {
  return RECORD_TYPE_SET.has(value);
}

export type ValidatorLookup =
  | { supported: true; type: RecordType; validator: RecordValidator }
  | { supported: false; error: string };

@Injectable()
export class RecordValidatorRegistry {
  private readonly validators: ReadonlyMap<RecordType, RecordValidator> =
    new Map<RecordType, RecordValidator>([
      ["A", new AddressRecordValidator(4)],
      ["AAAA", new AddressRecordValidator(6)],
      ["ALIAS", new HostnameTargetValidator("ALIAS")],
      ["CAA", new CaaRecordValidator()],
      ["CNAME", new HostnameTargetValidator("CNAME")],
      ["DNAME", new HostnameTargetValidator("DNAME")],
      ["MX", new MxRecordValidator()],
      ["NS", new HostnameTargetValidator("NS")],
      ["PTR", new HostnameTargetValidator("PTR")],
      ["SOA", new SoaRecordValidator()],
      ["SPF", new SpfRecordValidator()],
      ["SRV", new SrvRecordValidator()],
      [
        "SSHFP",
        new DigestRecordValidator(
          "SSHFP",
          ["algorithm", "fingerprint type"],
          "fingerprint",
        ),
      ],
      [
        "TLSA",
        new DigestRecordValidator(
          "TLSA",
          ["usage", "selector", "matching type"],
          "certificate data",
        ),
      ],
      ["TXT", new TxtRecordValidator()],
    ]);

  resolve(type: string): ValidatorLookup {
    const normalized = type.trim().toUpperCase();
    if (!isRecordType(normalized)) {
      return { supported: false, error: `Unsupported record type: ${type}` };
    }

    const validator = this.validators.get(normalized);
    if (!validator) {
      return { supported: false, error: `Unsupported record type: ${type}` };
    }
    return { supported: true, type: normalized, validator };
  }

  validate(
    type: string,
    content: string,
    name: string,
    prio: FieldInput,
    ttl: FieldInput,
    defaultTtl: number,
  ): ValidationResult {
    const lookup = this.resolve(type);
    if (!lookup.supported) {
      return invalidResult([lookup.error]);
    }
    return lookup.validator.validate(content, name, prio, ttl, defaultTtl);
  }

  supportedTypes(): readonly RecordType[] {
    return RECORD_TYPES;
  }
}

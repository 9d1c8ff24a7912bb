import { isIP } from "node:net";
import { expandIpv6ToNibbles } from "../name-rules.util";
import { BaseRecordValidator } from "./base-record.validator";

/**
 * Lower-case, zero-compressed form of an IPv6 address, the form PowerDNS
 * stores. Addresses with an embedded IPv4 tail are only lower-cased.
 */
export function canonicalIpv6(address: string): string {
  const nibbles = expandIpv6ToNibbles(address);
  if (!nibbles || address.includes(".")) {
    return address.toLowerCase();
  }

  const hextets = Array.from({ length: 8 }, (_, index) =>
    Number.parseInt(nibbles.slice(index * 4, index * 4 + 4).join(""), 16).toString(16),
  );

  let bestStart = -1;
  let bestLength = 0;
  for (let start = 0; start < hextets.length; ) {
    if (hextets[start] !== "0") {
      start += 1;
      continue;
    }
    let end = start;
    while (end < hextets.length && hextets[end] === "0") {
      end += 1;
    }
    if (end - start > bestLength) {
      bestStart = start;
      bestLength = end - start;
    }
    start = end;
  }

  // A single zero hextet is never compressed.
  if (bestLength < 2) {
    return hextets.join(":");
  }
  const head = hextets.slice(0, bestStart).join(":");
  const tail = hextets.slice(bestStart + bestLength).join(":");
  return `${head}::${tail}`;
}

export class AddressRecordValidator extends BaseRecordValidator {
  constructor(private readonly family: 4 | 6) {
    super();
  }

  protected validateContent(content: string, errors: string[]): string {
    if (isIP(content) !== this.family) {
      errors.push(
        this.family === 4
          ? `Invalid IPv4 address: ${content}`
          : `Invalid IPv6 address: ${content}`,
      );
      return content;
    }
    return this.family === 6 ? canonicalIpv6(content) : content;
  }
}

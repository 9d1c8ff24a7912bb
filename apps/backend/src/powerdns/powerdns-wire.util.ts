import type { ZoneKind } from "../records/records.types";
import type { PowerDnsZoneKind } from "./powerdns.types";

const HOSTNAME_CONTENT_TYPES = new Set([
  "ALIAS",
  "CNAME",
  "DNAME",
  "MX",
  "NS",
  "PTR",
]);

/** Types whose priority travels as the first content field on the wire. */
const PRIORITY_PREFIX_TYPES = new Set(["MX", "SRV"]);

export function toCanonicalName(name: string): string {
  return name === "." || name.endsWith(".") ? name : `${name}.`;
}

export function fromCanonicalName(name: string): string {
  return name !== "." && name.endsWith(".") ? name.slice(0, -1) : name;
}

function mapFields(
  content: string,
  positions: readonly number[],
  transform: (value: string) => string,
): string {
  const fields = content.trim().split(/\s+/);
  for (const position of positions) {
    if (fields[position] !== undefined) {
      fields[position] = transform(fields[position]);
    }
  }
  return fields.join(" ");
}

function hostnameFieldPositions(type: string): readonly number[] {
  if (HOSTNAME_CONTENT_TYPES.has(type)) {
    return [0];
  }
  if (type === "SRV") {
    return [2];
  }
  if (type === "SOA") {
    return [0, 1];
  }
  return [];
}

export function toWireContent(
  type: string,
  content: string,
  prio: number,
): string {
  const positions = hostnameFieldPositions(type);
  const canonical =
    positions.length > 0
      ? mapFields(content, positions, toCanonicalName)
      : content;
  return PRIORITY_PREFIX_TYPES.has(type) ? `${prio} ${canonical}` : canonical;
}

export function fromWireContent(
  type: string,
  wire: string,
): { content: string; prio: number } {
  let content = wire;
  let prio = 0;

  if (PRIORITY_PREFIX_TYPES.has(type)) {
    const match = /^\s*(\d+)\s+(.*)$/.exec(wire);
    if (match) {
      prio = Number.parseInt(match[1], 10);
      content = match[2];
    }
  }

  const positions = hostnameFieldPositions(type);
  if (positions.length > 0) {
    content = mapFields(content, positions, fromCanonicalName);
  }
  return { content, prio };
}

export function toZoneKind(kind: PowerDnsZoneKind): ZoneKind {
  switch (kind) {
    case "Master":
    case "Producer":
      return "PRIMARY";
    case "Slave":
    case "Consumer":
      return "SECONDARY";
    default:
      return "NATIVE";
  }
}

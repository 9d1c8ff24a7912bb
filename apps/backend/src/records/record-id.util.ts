import type { RecordKey } from "./records.types";

/**
 * PowerDNS has no per-record ids, so a record is addressed by the values
 * that identify it inside its rrset.
 */
export function encodeRecordId(key: RecordKey): string {
  return Buffer.from(
    JSON.stringify([key.zoneId, key.name, key.type, key.content]),
    "utf-8",
  ).toString("base64url");
}

export function decodeRecordId(recordId: string): RecordKey | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(recordId, "base64url").toString("utf-8"));
  } catch {
    return null;
  }

  if (!Array.isArray(parsed) || parsed.length !== 4) {
    return null;
  }
  const [zoneId, name, type, content]: unknown[] = parsed;
  if (
    typeof zoneId !== "string" ||
    typeof name !== "string" ||
    typeof type !== "string" ||
    typeof content !== "string"
  ) {
    return null;
  }
  return { zoneId, name, type, content };
}

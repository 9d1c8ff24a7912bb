/** Zone kinds as reported by the PowerDNS Authoritative HTTP API. */
export type PowerDnsZoneKind =
  | "Native"
  | "Master"
  | "Slave"
  | "Producer"
  | "Consumer";

export interface PowerDnsZoneSummary {
  id: string;
  name: string;
  kind: PowerDnsZoneKind;
  url?: string;
  serial?: number;
  dnssec?: boolean;
}

export interface PowerDnsRecordEntry {
  content: string;
  disabled: boolean;
}

export interface PowerDnsComment {
  content: string;
  account: string;
  modified_at?: number;
}

export interface PowerDnsRRSet {
  name: string;
  type: string;
  ttl: number;
  records: PowerDnsRecordEntry[];
  comments?: PowerDnsComment[];
}

export interface PowerDnsZoneDetail extends PowerDnsZoneSummary {
  rrsets: PowerDnsRRSet[];
}

/**
 * One entry of a zone PATCH. With REPLACE, omitting `records` keeps the
 * records and omitting `comments` keeps the comments.
 */
export interface PowerDnsRRSetChange {
  name: string;
  type: string;
  changetype: "REPLACE" | "DELETE";
  ttl?: number;
  records?: PowerDnsRecordEntry[];
  comments?: PowerDnsComment[];
}

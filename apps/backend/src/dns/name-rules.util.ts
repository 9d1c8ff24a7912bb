import { isIP } from "node:net";

const IPV4_REVERSE_SUFFIX = "in-addr.arpa";
const IPV6_REVERSE_SUFFIX = "ip6.arpa";

const REVERSE_ZONE_PATTERN =
  /^(?:[a-z0-9-]+(?:\/\d+)?\.)+(?:in-addr|ip6)\.arpa\.?$/;

/**
 * Second-level labels under which registrations happen one level deeper
 * (`example.co.uk` rather than `co.uk`). Not a public-suffix list.
 */
const SECOND_LEVEL_COUNTRY_SUFFIXES = new Set([
  "co.uk",
  "org.uk",
  "ac.uk",
  "gov.uk",
  "me.uk",
  "net.uk",
  "com.au",
  "net.au",
  "org.au",
  "co.nz",
  "co.jp",
  "co.za",
  "com.br",
  "com.cn",
  "co.in",
]);

export class UnsupportedDomainNameError extends Error {
  constructor(readonly domainName: string) {
    super(`Cannot determine the registered domain of "${domainName}"`);
    this.name = "UnsupportedDomainNameError";
  }
}

export function stripTrailingDot(value: string): string {
  return value.endsWith(".") ? value.slice(0, -1) : value;
}

export function isReverseZone(name: string): boolean {
  if (name !== name.trim()) {
    return false;
  }
  return REVERSE_ZONE_PATTERN.test(name.toLowerCase());
}

/**
 * Returns the last two labels of the name, or the last three when the
 * name sits under a known second-level country suffix.
 *
 * @throws UnsupportedDomainNameError for empty or single-label names
 */
export function getRegisteredDomain(fqdn: string): string {
  const labels = stripTrailingDot(fqdn).split(".");
  if (labels.length < 2 || labels.some((label) => label.length === 0)) {
    throw new UnsupportedDomainNameError(fqdn);
  }

  const lastTwo = labels.slice(-2).join(".");
  if (
    labels.length >= 3 &&
    SECOND_LEVEL_COUNTRY_SUFFIXES.has(lastTwo.toLowerCase())
  ) {
    return labels.slice(-3).join(".");
  }
  return lastTwo;
}

export function getSubDomainName(fqdn: string): string {
  const name = stripTrailingDot(fqdn);
  const labels = name.split(".");
  if (labels.length <= 2) {
    return name;
  }

  const registeredLabels = getRegisteredDomain(name).split(".").length;
  if (registeredLabels === labels.length) {
    return labels[0];
  }
  return labels.slice(0, labels.length - registeredLabels).join(".");
}

/**
 * Converts a fully qualified name into the form used by record forms:
 * `@` for the apex, the relative prefix for names inside the zone, and the
 * input untouched for anything else.
 */
export function stripZoneSuffix(name: string, zone: string): string {
  const fqdn = stripTrailingDot(name);
  const zoneName = stripTrailingDot(zone);

  if (fqdn.toLowerCase() === zoneName.toLowerCase()) {
    return "@";
  }

  const suffix = `.${zoneName.toLowerCase()}`;
  if (fqdn.toLowerCase().endsWith(suffix)) {
    return fqdn.slice(0, fqdn.length - suffix.length);
  }
  return name;
}

export function restoreZoneSuffix(relative: string, zone: string): string {
  const name = stripTrailingDot(relative);
  const zoneName = stripTrailingDot(zone);

  if (name === "" || name === "@") {
    return zoneName;
  }

  const lowerName = name.toLowerCase();
  const lowerZone = zoneName.toLowerCase();
  if (lowerName === lowerZone || lowerName.endsWith(`.${lowerZone}`)) {
    return name;
  }
  return `${name}.${zoneName}`;
}

export function ipv4ToPtrName(ip: string): string | null {
  if (isIP(ip) !== 4) {
    return null;
  }
  return `${ip.split(".").reverse().join(".")}.${IPV4_REVERSE_SUFFIX}`;
}

export function ipv6ToPtrName(ip: string): string | null {
  const nibbles = expandIpv6ToNibbles(ip);
  if (!nibbles) {
    return null;
  }
  return `${[...nibbles].reverse().join(".")}.${IPV6_REVERSE_SUFFIX}`;
}

export function addressToPtrName(
  type: "A" | "AAAA",
  content: string,
): string | null {
  return type === "A" ? ipv4ToPtrName(content) : ipv6ToPtrName(content);
}

export function expandIpv6ToNibbles(ip: string): string[] | null {
  // Zone index (fe80::1%eth0) is not part of the address.
  const withoutZone = ip.split("%")[0] ?? ip;

  if (!withoutZone.includes(":") || withoutZone.split("::").length > 2) {
    return null;
  }

  const [head, tail] = withoutZone.split("::");
  const compressed = tail !== undefined;
  const headParts = head ? head.split(":") : [];
  const tailParts = tail ? tail.split(":") : [];

  const lastPart = compressed
    ? tailParts[tailParts.length - 1]
    : headParts[headParts.length - 1];
  let mappedNibbles: string[] = [];
  if (lastPart?.includes(".")) {
    if (isIP(lastPart) !== 4) {
      return null;
    }
    (compressed ? tailParts : headParts).pop();
    const bytes = lastPart.split(".").map((o) => Number.parseInt(o, 10));
    mappedNibbles = bytes.flatMap((byte) =>
      byte.toString(16).padStart(2, "0").split(""),
    );
  }

  const parseHextet = (value: string): string[] | null =>
    /^[0-9a-fA-F]{1,4}$/.test(value)
      ? value.toLowerCase().padStart(4, "0").split("")
      : null;

  const headNibbles: string[] = [];
  const tailNibbles: string[] = [];
  for (const [parts, target] of [
    [headParts, headNibbles],
    [tailParts, tailNibbles],
  ] as const) {
    for (const part of parts) {
      const parsed = parseHextet(part);
      if (!parsed) {
        return null;
      }
      target.push(...parsed);
    }
  }

  const known = headNibbles.length + tailNibbles.length + mappedNibbles.length;
  if (known > 32 || (!compressed && known !== 32)) {
    return null;
  }
  if (compressed && known === 32) {
    return null;
  }

  const zeros = Array.from({ length: 32 - known }, () => "0");
  return [...headNibbles, ...zeros, ...tailNibbles, ...mappedNibbles];
}

/**
 * Longest-suffix match of `name` against the given zones. A zone matches
 * when the name is the zone itself or lies below it.
 */
export function findBestMatchingZone<T extends { name: string }>(
  name: string,
  zones: readonly T[],
): T | undefined {
  const target = stripTrailingDot(name).toLowerCase();
  let best: T | undefined;
  let bestLength = -1;

  for (const zone of zones) {
    const zoneName = stripTrailingDot(zone.name).toLowerCase();
    const matches = target === zoneName || target.endsWith(`.${zoneName}`);
    if (matches && zoneName.length > bestLength) {
      best = zone;
      bestLength = zoneName.length;
    }
  }

  return best;
}

export function namesEqual(a: string, b: string): boolean {
  return stripTrailingDot(a).toLowerCase() === stripTrailingDot(b).toLowerCase();
}

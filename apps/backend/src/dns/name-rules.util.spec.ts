import {
  UnsupportedDomainNameError,
  expandIpv6ToNibbles,
  findBestMatchingZone,
  getRegisteredDomain,
  getSubDomainName,
  ipv4ToPtrName,
  ipv6ToPtrName,
  isReverseZone,
  restoreZoneSuffix,
  stripZoneSuffix,
} from "./name-rules.util";

describe("name-rules.util", () => {
  describe("isReverseZone", () => {
    it.each([
      "1.0.0.127.in-addr.arpa",
      "2.0.192.in-addr.arpa.",
      "160/27.236.20.172.in-addr.arpa",
      "0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.ip6.arpa",
      "1/48.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.8.b.d.0.1.0.0.2.ip6.arpa",
      "1.0.0.127.IN-ADDR.ARPA",
    ])("accepts %s", (name) => {
      expect(isReverseZone(name)).toBe(true);
    });

    it.each([
      "example.com",
      "subdomain.example.com",
      "example.in-addr.arpa.com",
      "",
      " ",
      "in-addr.arpa",
      "ip6.arpa",
      "1.0.0.127.in-addr.arpa ",
      " 1.0.0.127.in-addr.arpa",
    ])("rejects %j", (name) => {
      expect(isReverseZone(name)).toBe(false);
    });
  });

  describe("getRegisteredDomain", () => {
    it("keeps two-label names", () => {
      expect(getRegisteredDomain("example.com")).toBe("example.com");
    });

    it("drops subdomain labels", () => {
      expect(getRegisteredDomain("sub.example.com")).toBe("example.com");
      expect(getRegisteredDomain("sub.sub2.example.com")).toBe("example.com");
    });

    it("keeps three labels under second-level country suffixes", () => {
      expect(getRegisteredDomain("sub.example.co.uk")).toBe("example.co.uk");
    });

    it("ignores a trailing dot", () => {
      expect(getRegisteredDomain("host.example.org.")).toBe("example.org");
    });

    it("rejects single-label names", () => {
      expect(() => getRegisteredDomain("localhost")).toThrow(
        UnsupportedDomainNameError,
      );
    });
  });

  describe("getSubDomainName", () => {
    it("returns the labels before the registered domain", () => {
      expect(getSubDomainName("sub.example.com")).toBe("sub");
      expect(getSubDomainName("sub.sub.example.com")).toBe("sub.sub");
      expect(getSubDomainName("sub.example.co.uk")).toBe("sub");
    });

    it("returns short names unchanged", () => {
      expect(getSubDomainName("example.com")).toBe("example.com");
      expect(getSubDomainName("localhost")).toBe("localhost");
    });

    it("returns the first label of a three-label country-code form", () => {
      expect(getSubDomainName("example.co.uk")).toBe("example");
    });
  });

  describe("stripZoneSuffix", () => {
    it("returns @ for the apex regardless of case or trailing dots", () => {
      expect(stripZoneSuffix("example.com", "example.com")).toBe("@");
      expect(stripZoneSuffix("ExAmPlE.CoM", "example.com")).toBe("@");
      expect(stripZoneSuffix("example.com.", "EXAMPLE.COM")).toBe("@");
      expect(stripZoneSuffix("example.com.", "example.com.")).toBe("@");
    });

    it("keeps the casing of the relative part", () => {
      expect(stripZoneSuffix("WwW.ExAmPlE.CoM", "example.com")).toBe("WwW");
      expect(stripZoneSuffix("www.example.com", "EXAMPLE.COM")).toBe("www");
    });

    it("handles trailing dots and multi-level names", () => {
      expect(stripZoneSuffix("www.example.com.", "example.com")).toBe("www");
      expect(stripZoneSuffix("a.b.c.example.com", "example.com.")).toBe(
        "a.b.c",
      );
    });

    it("leaves names from other zones untouched", () => {
      expect(stripZoneSuffix("www.other.com", "example.com")).toBe(
        "www.other.com",
      );
    });

    it("is idempotent on already relative names", () => {
      const once = stripZoneSuffix("mail.example.com", "example.com");
      expect(stripZoneSuffix(once, "example.com")).toBe("mail");
    });

    it("works on reverse zones", () => {
      expect(
        stripZoneSuffix(
          "10.1.0.168.192.in-addr.arpa",
          "1.0.168.192.in-addr.arpa",
        ),
      ).toBe("10");
    });
  });

  describe("restoreZoneSuffix", () => {
    it("maps @ and empty input to the zone", () => {
      expect(restoreZoneSuffix("@", "example.com")).toBe("example.com");
      expect(restoreZoneSuffix("", "example.com.")).toBe("example.com");
    });

    it("appends the zone to relative names", () => {
      expect(restoreZoneSuffix("sub.www", "example.com")).toBe(
        "sub.www.example.com",
      );
      expect(restoreZoneSuffix("www.", "example.com.")).toBe(
        "www.example.com",
      );
      expect(restoreZoneSuffix("10", "1.0.168.192.in-addr.arpa")).toBe(
        "10.1.0.168.192.in-addr.arpa",
      );
    });

    it("does not qualify a name twice", () => {
      expect(restoreZoneSuffix("WWW.EXAMPLE.COM", "example.com")).toBe(
        "WWW.EXAMPLE.COM",
      );
      expect(restoreZoneSuffix("www.example.com.", "example.com")).toBe(
        "www.example.com",
      );
      expect(restoreZoneSuffix("example.com", "example.com")).toBe(
        "example.com",
      );
    });
  });

  describe("strip then restore", () => {
    it.each([
      ["www.example.com", "example.com", "www.example.com"],
      ["example.com", "example.com", "example.com"],
      ["www.example.com.", "example.com", "www.example.com"],
      ["WWW.EXAMPLE.COM", "example.com", "WWW.example.com"],
      ["EXAMPLE.COM", "example.com", "example.com"],
    ])("%s in %s restores to %s", (fqdn, zone, expected) => {
      expect(restoreZoneSuffix(stripZoneSuffix(fqdn, zone), zone)).toBe(
        expected,
      );
    });
  });

  describe("PTR names", () => {
    it("reverses IPv4 octets", () => {
      expect(ipv4ToPtrName("192.0.2.1")).toBe("1.2.0.192.in-addr.arpa");
    });

    it("expands and reverses IPv6 nibbles", () => {
      expect(ipv6ToPtrName("2001:db8::1")).toBe(
        "1.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.0.8.b.d.0.1.0.0.2.ip6.arpa",
      );
    });

    it("rejects malformed addresses", () => {
      expect(ipv4ToPtrName("192.0.2")).toBeNull();
      expect(ipv6ToPtrName("2001:db8:::1")).toBeNull();
      expect(ipv6ToPtrName("1:2:3:4:5:6:7")).toBeNull();
    });

    it("expands IPv4-mapped addresses", () => {
      expect(expandIpv6ToNibbles("::ffff:192.0.2.128")?.join("")).toBe(
        "00000000000000000000ffffc0000280",
      );
    });
  });

  describe("findBestMatchingZone", () => {
    const zones = [
      { id: "1", name: "in-addr.arpa." },
      { id: "2", name: "2.0.192.in-addr.arpa." },
      { id: "3", name: "example.com." },
    ];

    it("prefers the longest matching suffix", () => {
      expect(findBestMatchingZone("1.2.0.192.in-addr.arpa", zones)?.id).toBe(
        "2",
      );
    });

    it("matches the apex itself", () => {
      expect(findBestMatchingZone("EXAMPLE.com", zones)?.id).toBe("3");
    });

    it("does not match on a partial label", () => {
      expect(findBestMatchingZone("notexample.com", zones)).toBeUndefined();
    });
  });
});

import { RecordValidatorRegistry } from "./record-validator.registry";

describe("RecordValidatorRegistry", () => {
  const registry = new RecordValidatorRegistry();
  const validate = (
    type: string,
    content: string,
    name = "host.example.com",
    prio: number | string = "",
  ) => registry.validate(type, content, name, prio, "", 3600);

  it("reports unsupported types as a validation error", () => {
    expect(validate("WKS", "anything")).toEqual({
      valid: false,
      errors: ["Unsupported record type: WKS"],
    });
    expect(registry.resolve("wks")).toEqual({
      supported: false,
      error: "Unsupported record type: wks",
    });
  });

  it("resolves type tokens case-insensitively", () => {
    const lookup = registry.resolve("aaaa");
    expect(lookup.supported && lookup.type).toBe("AAAA");
  });

  it("has a validator for every listed type", () => {
    for (const type of registry.supportedTypes()) {
      expect(registry.resolve(type).supported).toBe(true);
    }
  });

  describe("address records", () => {
    it("accepts matching address families", () => {
      expect(validate("A", "192.0.2.1")).toEqual({
        valid: true,
        data: {
          name: "host.example.com",
          content: "192.0.2.1",
          ttl: 3600,
          prio: 0,
        },
      });
      expect(validate("AAAA", "2001:db8::1").valid).toBe(true);
    });

    it("rejects the wrong family", () => {
      expect(validate("A", "2001:db8::1")).toEqual({
        valid: false,
        errors: ["Invalid IPv4 address: 2001:db8::1"],
      });
      expect(validate("AAAA", "192.0.2.1")).toEqual({
        valid: false,
        errors: ["Invalid IPv6 address: 192.0.2.1"],
      });
    });

    it("stores priority 0 for types without one", () => {
      const result = validate("A", "192.0.2.1", "host.example.com", 25);
      expect(result.valid && result.data.prio).toBe(0);
    });

    it("still range-checks a submitted priority", () => {
      expect(validate("A", "192.0.2.1", "host.example.com", "abc")).toEqual({
        valid: false,
        errors: [
          "Invalid value for priority field. It should be numeric (0-65535).",
        ],
      });
    });
  });

  describe("owner names", () => {
    it("allows wildcards and underscores", () => {
      expect(validate("TXT", "v=DMARC1; p=none", "_dmarc.example.com").valid).toBe(
        true,
      );
      expect(validate("A", "192.0.2.1", "*.example.com").valid).toBe(true);
    });

    it("rejects bad characters and over-long names", () => {
      expect(validate("A", "192.0.2.1", "bad name.example.com")).toEqual({
        valid: false,
        errors: ["Invalid hostname: bad name.example.com"],
      });
      expect(validate("A", "192.0.2.1", `${"a.".repeat(128)}com`)).toEqual({
        valid: false,
        errors: ["Invalid hostname. It must not exceed 255 characters."],
      });
    });

    it("accepts classless reverse delegation labels on PTR names", () => {
      expect(
        validate("PTR", "host.example.com", "161.160/27.236.20.172.in-addr.arpa")
          .valid,
      ).toBe(true);
    });

    it("does not accept slashes outside reverse zones", () => {
      expect(validate("A", "192.0.2.1", "a/24.example.com").valid).toBe(false);
    });
  });

  describe("hostname targets", () => {
    it.each(["CNAME", "NS", "PTR", "DNAME", "ALIAS"])(
      "%s accepts a hostname with or without trailing dot",
      (type) => {
        expect(validate(type, "target.example.net").valid).toBe(true);
        expect(validate(type, "target.example.net.").valid).toBe(true);
      },
    );

    it("rejects malformed targets", () => {
      expect(validate("CNAME", "-bad.example.net")).toEqual({
        valid: false,
        errors: ["Invalid CNAME target hostname: -bad.example.net"],
      });
    });

    it("gives MX records a default priority of 10", () => {
      expect(validate("MX", "mail.example.com")).toEqual({
        valid: true,
        data: {
          name: "host.example.com",
          content: "mail.example.com",
          ttl: 3600,
          prio: 10,
        },
      });
    });
  });

  describe("TXT and SPF", () => {
    it("quotes plain text", () => {
      const result = validate("TXT", 'say "hi"');
      expect(result.valid && result.data.content).toBe('"say \\"hi\\""');
    });

    it("splits long plain text into 255 character strings", () => {
      const result = validate("TXT", "x".repeat(300));
      expect(result.valid && result.data.content).toBe(
        `"${"x".repeat(255)}" "${"x".repeat(45)}"`,
      );
    });

    it("keeps well-formed quoted content", () => {
      const result = validate("TXT", '"part one" "part \\"two\\""');
      expect(result.valid && result.data.content).toBe(
        '"part one" "part \\"two\\""',
      );
    });

    it("rejects unbalanced quotes", () => {
      expect(validate("TXT", '"open')).toEqual({
        valid: false,
        errors: [
          "Invalid TXT content. Quoted strings must be closed and inner quotes escaped.",
        ],
      });
      expect(validate("TXT", '"a"b"').valid).toBe(false);
    });

    it("rejects quoted strings longer than 255 characters", () => {
      expect(validate("TXT", `"${"y".repeat(256)}"`)).toEqual({
        valid: false,
        errors: [
          "Invalid TXT content. Each quoted string is limited to 255 characters.",
        ],
      });
    });

    it("rejects empty and non-printable content", () => {
      expect(validate("TXT", "  ")).toEqual({
        valid: false,
        errors: ["TXT content must not be empty."],
      });
      expect(validate("TXT", "tab\there")).toEqual({
        valid: false,
        errors: ["TXT content may only contain printable ASCII characters."],
      });
    });

    it("requires the SPF version tag", () => {
      expect(validate("SPF", '"v=spf1 mx -all"').valid).toBe(true);
      expect(validate("SPF", "include:example.com -all")).toEqual({
        valid: false,
        errors: ["SPF content must start with v=spf1."],
      });
    });
  });

  describe("structured content", () => {
    it("validates CAA flags, tag and quoted value", () => {
      expect(validate("CAA", '0 issue "ca.example.net"').valid).toBe(true);
      expect(validate("CAA", '256 issue "ca.example.net"')).toEqual({
        valid: false,
        errors: ["Invalid CAA flags. It should be numeric (0-255)."],
      });
      expect(validate("CAA", "0 issue ca.example.net").valid).toBe(false);
    });

    it("validates SOA fields", () => {
      expect(
        validate(
          "SOA",
          "ns1.example.com hostmaster.example.com 2024010101 10800 3600 604800 3600",
          "example.com",
        ).valid,
      ).toBe(true);
      expect(
        validate(
          "SOA",
          "ns1.example.com hostmaster.example.com soon 10800 3600 604800 3600",
          "example.com",
        ),
      ).toEqual({
        valid: false,
        errors: ["Invalid SOA serial. It should be numeric (0-4294967295)."],
      });
      expect(validate("SOA", "ns1.example.com 1 2 3", "example.com").valid).toBe(
        false,
      );
    });

    it("validates SSHFP and TLSA digests", () => {
      expect(validate("SSHFP", "4 2 123456789abcdef0").valid).toBe(true);
      expect(validate("SSHFP", "4 2 not-hex")).toEqual({
        valid: false,
        errors: ["Invalid SSHFP fingerprint. It must be hexadecimal."],
      });
      expect(validate("TLSA", "3 1 1 abcdef", "_443._tcp.example.com").valid).toBe(
        true,
      );
      expect(validate("TLSA", "3 1 abcdef", "_443._tcp.example.com")).toEqual({
        valid: false,
        errors: [
          "Invalid TLSA content. It must contain 4 fields: <usage> <selector> <matching type> <certificate data>",
        ],
      });
    });
  });
});

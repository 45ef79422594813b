import { describe, expect, it } from "vitest";

import { ConfigError } from "../../../src/errors.js";
import { parseCollectorAddress, validateHostPort, validateSourceAddress } from "../../../src/transport/address.js";

describe("validateHostPort()", () => {
  it.each(["127.0.0.1:6030", "collector.example.net:6000", "[2001:db8::1]:6030", "unix:/tmp/gnmi.sock", "dns:///collector:6000"])(
    "accepts %s",
    (address) => {
      expect(validateHostPort(address, "target")).toBe(address);
    },
  );

  it("trims whitespace", () => {
    expect(validateHostPort(" 10.0.0.1:6030 ", "target")).toBe("10.0.0.1:6030");
  });

  it.each([
    ["", "target address is required"],
    ["localhost", 'target address "localhost" must be in the form host:port'],
    ["[zz::1]:6030", 'target address "[zz::1]:6030" has an invalid IPv6 literal'],
    ["localhost:0", 'target address "localhost:0" has an invalid port'],
    ["localhost:70000", 'target address "localhost:70000" has an invalid port'],
  ])("rejects %j", (address, message) => {
    expect(() => validateHostPort(address, "target")).toThrow(new ConfigError(message));
  });
});

describe("parseCollectorAddress()", () => {
  it("parses a plain address", () => {
    expect(parseCollectorAddress("10.0.0.5:6000")).toEqual({ address: "10.0.0.5:6000" });
  });

  it("splits off a VRF name", () => {
    expect(parseCollectorAddress("mgmt/10.0.0.5:6000")).toEqual({ vrf: "mgmt", address: "10.0.0.5:6000" });
  });

  it("does not treat a URI scheme as a VRF", () => {
    expect(parseCollectorAddress("dns:///collector:6000")).toEqual({ address: "dns:///collector:6000" });
  });

  it("rejects an empty VRF name", () => {
    expect(() => parseCollectorAddress("/10.0.0.5:6000")).toThrow(
      'collector address "/10.0.0.5:6000" has an invalid VRF name',
    );
  });

  it("validates the address after the VRF", () => {
    expect(() => parseCollectorAddress("mgmt/collector")).toThrow(
      'collector address "collector" must be in the form host:port',
    );
  });
});

describe("validateSourceAddress()", () => {
  it("accepts IPv4 and IPv6 addresses", () => {
    expect(validateSourceAddress("192.0.2.10")).toBe("192.0.2.10");
    expect(validateSourceAddress("2001:db8::10")).toBe("2001:db8::10");
  });

  it("rejects host names", () => {
    expect(() => validateSourceAddress("mgmt0")).toThrow('source address "mgmt0" must be an IP address');
  });
});

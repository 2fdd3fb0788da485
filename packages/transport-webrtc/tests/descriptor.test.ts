import { describe, expect, it } from "vitest";
import { DescriptorParseError, parseDescriptor, serializeDescriptor } from "../src/index.js";

const SDP = "v=0\r\no=- 1 2 IN IP4 127.0.0.1\r\ns=-\r\nt=0 0\r\n";

describe("serializeDescriptor", () => {
  it("uses the RTCSessionDescriptionInit shape", () => {
    expect(serializeDescriptor({ kind: "offer", body: "v=0\r\n" })).toBe(
      '{"type":"offer","sdp":"v=0\\r\\n"}',
    );
  });
});

describe("parseDescriptor", () => {
  it("reads back a serialized descriptor", () => {
    const text = serializeDescriptor({ kind: "answer", body: SDP });
    expect(parseDescriptor(text)).toEqual({ kind: "answer", body: SDP });
  });

  it("accepts the expected kind", () => {
    const text = serializeDescriptor({ kind: "offer", body: SDP });
    expect(parseDescriptor(text, "offer").kind).toBe("offer");
  });

  it("rejects a descriptor of the other kind", () => {
    const text = serializeDescriptor({ kind: "offer", body: SDP });
    expect(() => parseDescriptor(text, "answer")).toThrow(DescriptorParseError);
    expect(() => parseDescriptor(text, "answer")).toThrow("Expected an answer but received an offer");
  });

  it("rejects invalid JSON", () => {
    expect(() => parseDescriptor("v=0")).toThrow(DescriptorParseError);
  });

  it("rejects missing fields", () => {
    expect(() => parseDescriptor('{"type":"offer"}')).toThrow(
      "Session description must have 'type' and 'sdp' fields",
    );
    expect(() => parseDescriptor('{"sdp":"v=0"}')).toThrow(DescriptorParseError);
    expect(() => parseDescriptor("null")).toThrow(DescriptorParseError);
  });

  it("rejects unsupported types", () => {
    expect(() => parseDescriptor('{"type":"pranswer","sdp":"v=0"}')).toThrow(
      "Unsupported session description type: pranswer",
    );
  });

  it("rejects an empty or non-string sdp", () => {
    expect(() => parseDescriptor('{"type":"offer","sdp":""}')).toThrow(DescriptorParseError);
    expect(() => parseDescriptor('{"type":"offer","sdp":42}')).toThrow(DescriptorParseError);
  });
});

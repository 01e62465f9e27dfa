import { describe, expect, it } from "vitest";

import { classify, controlText, isControl, isLocalOrigin, parseControlText } from "./classifier.js";
import { chatBody, createEnvelope, presenceBody } from "./Envelope.js";

describe("parseControlText", () => {
  it("recognizes the presence token only as an exact match", () => {
    expect(parseControlText("__JOIN__")).toEqual({ kind: "presence" });
    expect(parseControlText("__JOIN__ now")).toEqual({ kind: "chat", text: "__JOIN__ now" });
  });

  it("extracts probe and reply ids", () => {
    expect(parseControlText("__PING__ab12cd34")).toEqual({ kind: "probe", probeId: "ab12cd34" });
    expect(parseControlText("__PONG__ab12cd34")).toEqual({ kind: "probe-reply", probeId: "ab12cd34" });
  });

  it("treats a bare prefix as chat", () => {
    expect(parseControlText("__PING__")).toEqual({ kind: "chat", text: "__PING__" });
  });

  it("treats everything else as chat", () => {
    expect(parseControlText("hello")).toEqual({ kind: "chat", text: "hello" });
  });
});

describe("controlText", () => {
  it("inverts parseControlText for control bodies", () => {
    for (const text of ["__JOIN__", "__PING__01", "__PONG__02", "plain"]) {
      expect(controlText(parseControlText(text))).toBe(text);
    }
  });
});

describe("isLocalOrigin", () => {
  const self = { nick: "alice", instanceId: "instance-1" };

  it("compares instance ids when the local identity has one", () => {
    expect(isLocalOrigin({ nick: "alice", instanceId: "instance-1" }, self)).toBe(true);
    expect(isLocalOrigin({ nick: "alice", instanceId: "instance-2" }, self)).toBe(false);
    expect(isLocalOrigin({ nick: "alice" }, self)).toBe(false);
  });

  it("falls back to the nick without an instance id", () => {
    expect(isLocalOrigin({ nick: "alice" }, { nick: "alice" })).toBe(true);
    expect(isLocalOrigin({ nick: "bob" }, { nick: "alice" })).toBe(false);
  });
});

describe("classify", () => {
  it("pairs the body with its origin", () => {
    const self = { nick: "alice", instanceId: "instance-1" };
    const own = createEnvelope(self, presenceBody());
    const remote = createEnvelope({ nick: "alice", instanceId: "instance-9" }, chatBody("hi"));

    expect(classify(own, self)).toEqual({ body: { kind: "presence" }, isLocal: true });
    expect(classify(remote, self)).toEqual({ body: { kind: "chat", text: "hi" }, isLocal: false });
  });

  it("flags control bodies", () => {
    expect(isControl(presenceBody())).toBe(true);
    expect(isControl(chatBody("hi"))).toBe(false);
  });
});

import { z } from "zod";

import { EnvelopeDecodeError } from "../errors.js";
import { controlText, parseControlText } from "./classifier.js";
import { ENVELOPE_KINDS, createEnvelope, type Envelope, type EnvelopeBody, type Identity } from "./Envelope.js";

// RFC 3339, plus the six-digit signed years `Date#toISOString` writes outside 0000-9999
const TIMESTAMP_PATTERN = /^(?:\d{4}|[+-]\d{6})-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})$/;

const WireEnvelopeSchema = z.object({
  nick: z.string(),
  text: z.string(),
  ts: z.string().regex(TIMESTAMP_PATTERN, "Invalid datetime"),
  kind: z.enum(ENVELOPE_KINDS).optional(),
  from: z.string().optional(),
  probe: z.string().optional(),
});

export type WireEnvelope = z.infer<typeof WireEnvelopeSchema>;

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

export function toWire(envelope: Envelope): WireEnvelope {
  const wire: WireEnvelope = {
    nick: envelope.sender.nick,
    text: controlText(envelope.body),
    ts: envelope.sentAt.toISOString(),
    kind: envelope.body.kind,
  };
  if (envelope.sender.instanceId !== undefined) {
    wire.from = envelope.sender.instanceId;
  }
  if (envelope.body.kind === "probe" || envelope.body.kind === "probe-reply") {
    wire.probe = envelope.body.probeId;
  }
  return wire;
}

function bodyFromWire(wire: WireEnvelope): EnvelopeBody {
  if (wire.kind === undefined) {
    return parseControlText(wire.text);
  }
  switch (wire.kind) {
    case "chat":
      return { kind: "chat", text: wire.text };
    case "presence":
      return { kind: "presence" };
    case "probe":
    case "probe-reply": {
      const probeId = wire.probe ?? probeIdFromText(wire.text, wire.kind);
      if (probeId === undefined) {
        throw new EnvelopeDecodeError(`Envelope of kind ${wire.kind} carries no probe id`);
      }
      return { kind: wire.kind, probeId };
    }
  }
}

function probeIdFromText(text: string, kind: "probe" | "probe-reply"): string | undefined {
  const parsed = parseControlText(text);
  if (parsed.kind === "probe" || parsed.kind === "probe-reply") {
    return parsed.kind === kind ? parsed.probeId : undefined;
  }
  return undefined;
}

export function fromWire(wire: WireEnvelope): Envelope {
  const sentAt = new Date(wire.ts);
  if (Number.isNaN(sentAt.getTime())) {
    throw new EnvelopeDecodeError(`Envelope timestamp is not a valid date: ${wire.ts}`);
  }
  const sender: Identity = { nick: wire.nick };
  if (wire.from !== undefined) {
    sender.instanceId = wire.from;
  }
  return createEnvelope(sender, bodyFromWire(wire), sentAt);
}

export function encodeEnvelope(envelope: Envelope): Uint8Array {
  return encoder.encode(JSON.stringify(toWire(envelope)));
}

export function decodeEnvelope(data: Uint8Array): Envelope {
  let raw: unknown;
  try {
    raw = JSON.parse(decoder.decode(data));
  } catch (error) {
    throw new EnvelopeDecodeError("Envelope is not valid UTF-8 JSON", { cause: error });
  }
  const parsed = WireEnvelopeSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new EnvelopeDecodeError(`Envelope failed validation: ${issues}`, { cause: parsed.error });
  }
  return fromWire(parsed.data);
}

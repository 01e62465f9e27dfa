import type { Envelope, EnvelopeBody, Identity } from "./Envelope.js";

export const PRESENCE_TOKEN = "__JOIN__";
export const PROBE_PREFIX = "__PING__";
export const PROBE_REPLY_PREFIX = "__PONG__";

export type ClassifiedEnvelope = {
  body: EnvelopeBody;
  isLocal: boolean;
};

/**
 * Reads the reserved text prefixes. Used for envelopes that carry no explicit `kind`.
 */
export function parseControlText(text: string): EnvelopeBody {
  if (text === PRESENCE_TOKEN) {
    return { kind: "presence" };
  }
  if (text.startsWith(PROBE_PREFIX) && text.length > PROBE_PREFIX.length) {
    return { kind: "probe", probeId: text.slice(PROBE_PREFIX.length) };
  }
  if (text.startsWith(PROBE_REPLY_PREFIX) && text.length > PROBE_REPLY_PREFIX.length) {
    return { kind: "probe-reply", probeId: text.slice(PROBE_REPLY_PREFIX.length) };
  }
  return { kind: "chat", text };
}

/** The `text` field written for a body, reserved tokens included. */
export function controlText(body: EnvelopeBody): string {
  switch (body.kind) {
    case "chat":
      return body.text;
    case "presence":
      return PRESENCE_TOKEN;
    case "probe":
      return `${PROBE_PREFIX}${body.probeId}`;
    case "probe-reply":
      return `${PROBE_REPLY_PREFIX}${body.probeId}`;
  }
}

export function isLocalOrigin(sender: Readonly<Identity>, self: Readonly<Identity>): boolean {
  if (self.instanceId !== undefined) {
    return sender.instanceId === self.instanceId;
  }
  return sender.nick === self.nick;
}

export function classify(envelope: Envelope, self: Readonly<Identity>): ClassifiedEnvelope {
  return {
    body: envelope.body,
    isLocal: isLocalOrigin(envelope.sender, self),
  };
}

export function isControl(body: EnvelopeBody): boolean {
  return body.kind !== "chat";
}

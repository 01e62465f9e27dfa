export interface Identity {
  /** Display name. */
  nick: string;
  /** Unique per running session; decides whether an envelope is our own echo. */
  instanceId?: string;
}

export type EnvelopeBody =
  | { kind: "chat"; text: string }
  | { kind: "presence" }
  | { kind: "probe"; probeId: string }
  | { kind: "probe-reply"; probeId: string };

export type EnvelopeKind = EnvelopeBody["kind"];

export const ENVELOPE_KINDS = ["chat", "presence", "probe", "probe-reply"] as const satisfies readonly EnvelopeKind[];

export interface Envelope {
  readonly sender: Readonly<Identity>;
  readonly sentAt: Date;
  readonly body: Readonly<EnvelopeBody>;
}

export function createEnvelope(sender: Identity, body: EnvelopeBody, sentAt: Date = new Date()): Envelope {
  if (Number.isNaN(sentAt.getTime())) {
    throw new RangeError("Envelope sentAt must be a valid date");
  }
  const frozenSender: Identity = { nick: sender.nick };
  if (sender.instanceId !== undefined) {
    frozenSender.instanceId = sender.instanceId;
  }
  return Object.freeze({
    sender: Object.freeze(frozenSender),
    sentAt: new Date(sentAt.getTime()),
    body: Object.freeze({ ...body }),
  });
}

export const chatBody = (text: string): EnvelopeBody => ({ kind: "chat", text });
export const presenceBody = (): EnvelopeBody => ({ kind: "presence" });
export const probeBody = (probeId: string): EnvelopeBody => ({ kind: "probe", probeId });
export const probeReplyBody = (probeId: string): EnvelopeBody => ({ kind: "probe-reply", probeId });

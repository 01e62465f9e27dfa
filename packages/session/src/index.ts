/**
 * Chat session loop over a broadcast pub/sub channel.
 *
 * @example
 * ```typescript
 * import { ChatSession, MemoryPubSub } from "@peerchat/session";
 *
 * const broker = new MemoryPubSub();
 * const session = new ChatSession({
 *   nick: "alice",
 *   channel: broker.join("alice"),
 *   terminal: myTerminal,
 * });
 * const reason = await session.run();
 * ```
 */

// Session
export { ChatSession } from "./session/ChatSession.js";
export type { ChatSessionOptions, SessionEndReason, SessionState } from "./session/ChatSession.js";
export { handleIncoming, runReceiver } from "./session/ReceiverLoop.js";
export type { ReceiveOutcome } from "./session/ReceiverLoop.js";
export { runSender } from "./session/SenderLoop.js";
export type { SenderOptions } from "./session/SenderLoop.js";
export { COMMAND_PREFIX, parseCommand } from "./session/commands.js";
export type { Command } from "./session/commands.js";
export type { SessionContext } from "./session/SessionContext.js";

// Envelopes
export {
  ENVELOPE_KINDS,
  chatBody,
  createEnvelope,
  presenceBody,
  probeBody,
  probeReplyBody,
} from "./envelope/Envelope.js";
export type { Envelope, EnvelopeBody, EnvelopeKind, Identity } from "./envelope/Envelope.js";
export { decodeEnvelope, encodeEnvelope, fromWire, toWire } from "./envelope/codec.js";
export type { WireEnvelope } from "./envelope/codec.js";
export {
  PRESENCE_TOKEN,
  PROBE_PREFIX,
  PROBE_REPLY_PREFIX,
  classify,
  controlText,
  isControl,
  isLocalOrigin,
  parseControlText,
} from "./envelope/classifier.js";
export type { ClassifiedEnvelope } from "./envelope/classifier.js";

// Probes and presence
export { ProbeTracker, createProbeId } from "./probes/ProbeTracker.js";
export type { ProbeRecord, ProbeTrackerOptions } from "./probes/ProbeTracker.js";
export { DEFAULT_PRESENCE_POLL_MS, PresenceAnnouncer } from "./presence/PresenceAnnouncer.js";
export type { PresenceAnnouncerOptions } from "./presence/PresenceAnnouncer.js";

// Channels
export { AsyncQueue } from "./channel/AsyncQueue.js";
export { MemoryChannel, MemoryPubSub } from "./channel/MemoryChannel.js";
export type { PubSubChannel } from "./channel/PubSubChannel.js";

// Terminal
export { CLEAR_LINE, ChatRenderer, ERASE_PREVIOUS_LINE, HELP_TEXT, formatTimestamp } from "./terminal/ChatRenderer.js";
export type { Terminal } from "./terminal/Terminal.js";

// Errors and logging
export {
  ChannelClosedError,
  ChatError,
  EnvelopeDecodeError,
  SessionCancelledError,
  TerminalClosedError,
  TerminalInterruptError,
} from "./errors.js";
export { abortReason, toError } from "./utils/errorUtils.js";
export { appLogger, createLogger, normalizeError } from "./observability/logger.js";
export type { AppLogger, LoggerBindings, NormalizedError } from "./observability/logger.js";

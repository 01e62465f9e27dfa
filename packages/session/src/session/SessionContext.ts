import type { PubSubChannel } from "../channel/PubSubChannel.js";
import type { Identity } from "../envelope/Envelope.js";
import type { AppLogger } from "../observability/logger.js";
import type { ProbeTracker } from "../probes/ProbeTracker.js";
import type { ChatRenderer } from "../terminal/ChatRenderer.js";
import type { Terminal } from "../terminal/Terminal.js";

/** What the receiver and sender loops share for the lifetime of one session. */
export interface SessionContext {
  identity: Identity;
  channel: PubSubChannel;
  terminal: Terminal;
  renderer: ChatRenderer;
  probes: ProbeTracker;
  clock: () => Date;
  logger: AppLogger;
}

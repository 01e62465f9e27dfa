export class ChatError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ChatError";
  }
}

export class EnvelopeDecodeError extends ChatError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "ENVELOPE_DECODE_ERROR", options);
    this.name = "EnvelopeDecodeError";
  }
}

export class ChannelClosedError extends ChatError {
  constructor(message: string = "Channel closed") {
    super(message, "CHANNEL_CLOSED");
    this.name = "ChannelClosedError";
  }
}

export class TerminalInterruptError extends ChatError {
  constructor(message: string = "Input interrupted") {
    super(message, "TERMINAL_INTERRUPT");
    this.name = "TerminalInterruptError";
  }
}

export class TerminalClosedError extends ChatError {
  constructor(message: string = "Terminal input closed") {
    super(message, "TERMINAL_CLOSED");
    this.name = "TerminalClosedError";
  }
}

export class SessionCancelledError extends ChatError {
  constructor(message: string = "Session cancelled") {
    super(message, "SESSION_CANCELLED");
    this.name = "SessionCancelledError";
  }
}

/**
 * Line-oriented interactive device.
 *
 * `readLine` rejects with `TerminalInterruptError` on an interrupt keystroke
 * and `TerminalClosedError` at end of input.
 */
export interface Terminal {
  readonly prompt: string;
  readLine(signal: AbortSignal): Promise<string>;
  write(text: string): void;
  /** Re-displays the prompt and any half-typed input after foreign output. */
  redrawPrompt(): void;
}

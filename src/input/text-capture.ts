/**
 * Side channel for typed text (name entry, search boxes). Characters arrive
 * from the host's text-input facility, which already applies keyboard layout
 * and key repeat, so this never looks at key states.
 */

export type TextListener = (text: string) => void;

export type TextInputSource = {
  /** Ask the host to start delivering characters (e.g. show an IME). */
  start(): void;
  stop(): void;
  subscribe(listener: TextListener): () => void;
};

const BACKSPACE = "\b";
const IGNORED = new Set(["\n", "\r", "\u001b"]);

export class TextCapture {
  private chars: Array<string> = [];

  constructor(private maxLength = 32) {}

  get text(): string {
    return this.chars.join("");
  }

  get limit(): number {
    return this.maxLength;
  }

  reset(maxLength: number = this.maxLength): void {
    this.chars = [];
    this.maxLength = maxLength;
  }

  set(value: string): void {
    this.chars = Array.from(value);
  }

  /** Truncates to `size` characters; longer limits leave the text alone. */
  clamp(size: number): void {
    if (size >= this.chars.length) return;
    this.chars = this.chars.slice(0, Math.max(0, size));
  }

  /** Applies each character of `input` in order. */
  append(input: string): void {
    for (const ch of input) this.appendChar(ch);
  }

  private appendChar(ch: string): void {
    if (ch === BACKSPACE) {
      this.chars.pop();
      return;
    }
    if (IGNORED.has(ch)) return;
    if (this.chars.length >= this.maxLength) return;

    const code = ch.codePointAt(0) ?? 0;
    // Remaining C0 controls and DEL
    if (code < 32 || code === 127) return;

    this.chars.push(ch);
  }
}

export type ManualTextInputSource = TextInputSource & {
  readonly active: boolean;
  /** Delivers `text` to subscribers; dropped while the source is stopped. */
  type: (text: string) => void;
};

/** In-process source for tests and hosts that forward characters themselves. */
export function createManualTextInputSource(): ManualTextInputSource {
  const listeners = new Set<TextListener>();
  let active = false;

  return {
    get active(): boolean {
      return active;
    },
    start: (): void => {
      active = true;
    },
    stop: (): void => {
      active = false;
    },
    subscribe: (listener: TextListener): (() => void) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    type: (text: string): void => {
      if (!active) return;
      for (const listener of listeners) listener(text);
    },
  };
}

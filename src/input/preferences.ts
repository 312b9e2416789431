import { readFileSync, writeFileSync } from "node:fs";

import { isRecord } from "../app/settings";
import {
  bindingToken,
  isAxisBinding,
  isButtonBinding,
  parseBindingToken,
  type AxisBinding,
  type ButtonBinding,
} from "../device/keys";
import { isAxisId, isButtonId, type AxisId, type ButtonId } from "../types/brands";
import { warn } from "../utils/debug";

export type BindingsEntry<Id, B> = Readonly<{
  id: Id;
  bindings: ReadonlyArray<B>;
}>;

export type ButtonBindingsEntry = BindingsEntry<ButtonId, ButtonBinding>;
export type AxisBindingsEntry = BindingsEntry<AxisId, AxisBinding>;

/** Player-chosen bindings, persisted by the host between sessions. */
export type BindingPreferences = {
  getButtonBindings(): ReadonlyArray<ButtonBindingsEntry>;
  getAxisBindings(): ReadonlyArray<AxisBindingsEntry>;
  setButtonBindings(entries: ReadonlyArray<ButtonBindingsEntry>): void;
  setAxisBindings(entries: ReadonlyArray<AxisBindingsEntry>): void;
};

export class MemoryBindingPreferences implements BindingPreferences {
  private buttons: ReadonlyArray<ButtonBindingsEntry> = [];
  private axes: ReadonlyArray<AxisBindingsEntry> = [];

  getButtonBindings(): ReadonlyArray<ButtonBindingsEntry> {
    return this.buttons;
  }

  getAxisBindings(): ReadonlyArray<AxisBindingsEntry> {
    return this.axes;
  }

  setButtonBindings(entries: ReadonlyArray<ButtonBindingsEntry>): void {
    this.buttons = entries.map((e) => ({ bindings: [...e.bindings], id: e.id }));
  }

  setAxisBindings(entries: ReadonlyArray<AxisBindingsEntry>): void {
    this.axes = entries.map((e) => ({ bindings: [...e.bindings], id: e.id }));
  }
}

function isStringArray(a: unknown): a is Array<string> {
  return Array.isArray(a) && a.every((s) => typeof s === "string");
}

function toTokenRecord<Id extends number, B extends ButtonBinding | AxisBinding>(
  entries: ReadonlyArray<BindingsEntry<Id, B>>,
): Record<string, Array<string>> {
  const out: Record<string, Array<string>> = {};
  for (const entry of entries) {
    out[String(entry.id)] = entry.bindings.map(bindingToken);
  }
  return out;
}

function fromTokenRecord<Id, B>(
  maybe: unknown,
  isId: (n: unknown) => n is Id,
  accept: (token: string) => B | null,
  section: string,
): Array<BindingsEntry<Id, B>> {
  if (maybe === undefined) return [];
  if (!isRecord(maybe)) {
    warn("preferences", `"${section}" is not an object, ignored`);
    return [];
  }
  const out: Array<BindingsEntry<Id, B>> = [];
  for (const [rawId, tokens] of Object.entries(maybe)) {
    const id = Number(rawId);
    if (!isId(id) || !isStringArray(tokens)) {
      warn("preferences", `${section}.${rawId} is malformed, skipped`);
      continue;
    }
    const bindings: Array<B> = [];
    for (const token of tokens) {
      const binding = accept(token);
      if (binding === null) {
        warn("preferences", `${section}.${rawId}: unknown binding "${token}", skipped`);
        continue;
      }
      bindings.push(binding);
    }
    out.push({ bindings, id });
  }
  return out;
}

const acceptButton = (token: string): ButtonBinding | null => {
  const b = parseBindingToken(token);
  return b !== null && isButtonBinding(b) ? b : null;
};

const acceptAxis = (token: string): AxisBinding | null => {
  const b = parseBindingToken(token);
  return b !== null && isAxisBinding(b) ? b : null;
};

/**
 * Stores bindings as tokens in one JSON file:
 * `{ "inputBindings": { "buttons": { "0": ["key:Enter"] }, "axes": { ... } } }`.
 * Other top-level keys in the file are preserved on write.
 */
export class JsonFileBindingPreferences implements BindingPreferences {
  static readonly STORE_KEY = "inputBindings";

  constructor(private readonly path: string) {}

  getButtonBindings(): ReadonlyArray<ButtonBindingsEntry> {
    return fromTokenRecord(this.readSection("buttons"), isButtonId, acceptButton, "buttons");
  }

  getAxisBindings(): ReadonlyArray<AxisBindingsEntry> {
    return fromTokenRecord(this.readSection("axes"), isAxisId, acceptAxis, "axes");
  }

  setButtonBindings(entries: ReadonlyArray<ButtonBindingsEntry>): void {
    this.writeSection("buttons", toTokenRecord(entries));
  }

  setAxisBindings(entries: ReadonlyArray<AxisBindingsEntry>): void {
    this.writeSection("axes", toTokenRecord(entries));
  }

  private readSection(section: "buttons" | "axes"): unknown {
    const bindings = this.readStore()[JsonFileBindingPreferences.STORE_KEY];
    return isRecord(bindings) ? bindings[section] : undefined;
  }

  private writeSection(
    section: "buttons" | "axes",
    tokens: Record<string, Array<string>>,
  ): void {
    const store = this.readStore();
    const existing = store[JsonFileBindingPreferences.STORE_KEY];
    store[JsonFileBindingPreferences.STORE_KEY] = {
      ...(isRecord(existing) ? existing : {}),
      [section]: tokens,
    };
    try {
      writeFileSync(this.path, `${JSON.stringify(store, null, 2)}\n`, "utf8");
    } catch (error) {
      warn("preferences", `could not write ${this.path}`, error);
    }
  }

  private readStore(): Record<string, unknown> {
    let raw: string;
    try {
      raw = readFileSync(this.path, "utf8");
    } catch {
      // Nothing saved yet
      return {};
    }
    try {
      const parsed: unknown = JSON.parse(raw);
      return isRecord(parsed) ? parsed : {};
    } catch (error) {
      warn("preferences", `could not parse ${this.path}, ignoring saved bindings`, error);
      return {};
    }
  }
}

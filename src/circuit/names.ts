import { UnknownIdError } from "../errors.js";

/**
 * Interns identifiers and keywords to small integer ids.
 *
 * Ids are dense and allocated in first-seen order. One table is created per
 * loaded circuit and handed to the scanner, parser and registries.
 */
export class NameTable {
  private readonly strings: string[] = [];
  private readonly ids = new Map<string, number>();

  /** Returns the id of `text`, or undefined if it was never interned. */
  query(text: string): number | undefined {
    return this.ids.get(text);
  }

  lookup(texts: readonly string[]): number[] {
    return texts.map((t) => this.intern(t));
  }

  intern(text: string): number {
    const existing = this.ids.get(text);
    if (existing !== undefined) return existing;
    const id = this.strings.length;
    this.strings.push(text);
    this.ids.set(text, id);
    return id;
  }

  getString(id: number): string {
    const s = Number.isInteger(id) ? this.strings[id] : undefined;
    if (s === undefined) throw new UnknownIdError(id);
    return s;
  }

  get size(): number {
    return this.strings.length;
  }
}

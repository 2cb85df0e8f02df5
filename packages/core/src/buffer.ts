/**
 * Append-only text buffer used by the `append*` operations.
 *
 * The caller owns the buffer; codec functions only append to it and never keep
 * a reference after they return.
 */
export class TextBuffer {
  private readonly _parts: string[] = [];
  private _length = 0;

  constructor(initial = "") {
    if (initial.length > 0) this.append(initial);
  }

  get length(): number {
    return this._length;
  }

  append(text: string): this {
    this._parts.push(text);
    this._length += text.length;
    return this;
  }

  clear(): this {
    this._parts.length = 0;
    this._length = 0;
    return this;
  }

  toString(): string {
    if (this._parts.length > 1) {
      const joined = this._parts.join("");
      this._parts.length = 0;
      this._parts.push(joined);
    }
    return this._parts[0] ?? "";
  }
}

/**
 * Reversible escaping of characters that table services reject in partition and sort keys
 *
 * Invariants:
 * - Strings without illegal characters pass through untouched (no prefix)
 * - Encoded strings carry the `$ENC_` prefix and are never encoded twice
 * - decode(encode(s)) === s for every s that does not itself start with the prefix
 * - Underscores are escaped inside encoded strings so literal token text survives a round trip
 */

export const ENCODED_PREFIX = "$ENC_";

const TOKEN_DELIMITER = "_";

/**
 * Build the character → token map: `/ \ # ?`, the two control ranges, and the underscore
 */
export function buildInvalidCharacterMap(): Map<string, string> {
  const map = new Map<string, string>([
    ["/", "_FS_"],
    ["\\", "_BS_"],
    ["#", "_HT_"],
    ["?", "_QM_"],
  ]);

  for (let i = 0; i < 32; i++) {
    map.set(String.fromCharCode(i), `_C${i}_`);
  }
  for (let i = 127; i < 160; i++) {
    map.set(String.fromCharCode(i), `_C${i}_`);
  }

  return map;
}

/**
 * Encodes and decodes table keys
 */
export class TableKeyEncoder {
  readonly #toToken: Map<string, string>;
  readonly #fromToken: Map<string, string>;
  readonly #escapeUnderscore: string;

  constructor(map: Map<string, string> = buildInvalidCharacterMap()) {
    this.#toToken = map;
    this.#escapeUnderscore = "_US_";
    this.#fromToken = new Map([...map].map(([char, token]) => [token, char]));
    this.#fromToken.set(this.#escapeUnderscore, "_");
  }

  /**
   * Characters that trigger encoding
   */
  get invalidCharacters(): string[] {
    return [...this.#toToken.keys()];
  }

  /**
   * Token used for a character, if it is illegal
   */
  tokenFor(char: string): string | undefined {
    return this.#toToken.get(char);
  }

  /**
   * Does the string contain anything the backend would reject?
   */
  needsEncoding(value: string): boolean {
    for (const char of value) {
      if (this.#toToken.has(char)) return true;
    }
    return false;
  }

  /**
   * Replace illegal characters with tokens and add the prefix. Returns the input when nothing
   * needs replacing or when it is already encoded.
   */
  encode(value: string): string {
    if (value.startsWith(ENCODED_PREFIX)) {
      return value;
    }

    let hasInvalid = false;
    let out = "";
    for (const char of value) {
      const token = this.#toToken.get(char);
      if (token !== undefined) {
        out += token;
        hasInvalid = true;
      } else if (char === TOKEN_DELIMITER) {
        out += this.#escapeUnderscore;
      } else {
        out += char;
      }
    }

    return hasInvalid ? ENCODED_PREFIX + out : value;
  }

  /**
   * Reverse `encode`. Unprefixed input is returned as-is; unrecognised `_..._` spans pass through.
   */
  decode(value: string): string {
    if (!value.startsWith(ENCODED_PREFIX)) {
      return value;
    }

    let out = "";
    for (let i = ENCODED_PREFIX.length; i < value.length; i++) {
      const char = value.charAt(i);
      if (char !== TOKEN_DELIMITER) {
        out += char;
        continue;
      }

      // Greedily take everything up to and including the next delimiter
      let end = i + 1;
      while (end < value.length && value.charAt(end) !== TOKEN_DELIMITER) {
        end++;
      }
      const span = value.slice(i, Math.min(end + 1, value.length));

      const original = this.#fromToken.get(span);
      if (original === undefined) {
        out += char;
        continue;
      }

      out += original;
      i = end;
    }

    return out;
  }
}

/**
 * Shared encoder instance
 */
export const keyEncoder = new TableKeyEncoder();

export function encodeTableKey(value: string): string {
  return keyEncoder.encode(value);
}

export function decodeTableKey(value: string): string {
  return keyEncoder.decode(value);
}

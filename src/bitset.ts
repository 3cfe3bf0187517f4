/**
 * chunkframe — bitset primitives
 *
 * Uint32Array bitsets for predicate evaluation over a table's rows. Each bit
 * j represents row j of the scanned table.
 *
 * Bit layout:
 *   word  = j >>> 5        (Math.floor(j / 32))
 *   shift = j  &  31       (j % 32)
 *   set:   bs[word] |= (1 << shift)
 *   test:  bs[word] &  (1 << shift)
 *
 * All operations are O(N / 32) where N = row count.
 */

// ── Bitset construction ───────────────────────────────────────────────────────

/**
 * Allocate a zeroed bitset large enough to hold `bitCount` bits.
 * Bit j is at word (j >>> 5), shift (j & 31).
 */
export function createBitset(bitCount: number): Uint32Array {
  return new Uint32Array(Math.ceil(bitCount / 32));
}

export function setBit(bs: Uint32Array, j: number): void {
  bs[j >>> 5] |= 1 << (j & 31);
}

export function testBit(bs: Uint32Array, j: number): boolean {
  return (bs[j >>> 5] & (1 << (j & 31))) !== 0;
}

// ── Intersection ─────────────────────────────────────────────────────────────

/**
 * Return a new bitset that is the bitwise AND of all inputs.
 *
 * All inputs should have the same `.length` (built over the same row count).
 * Mismatched lengths are truncated to the shortest input.
 *
 * Returns an empty Uint32Array when `bitsets` is empty.
 */
export function computeIntersection(bitsets: readonly Uint32Array[]): Uint32Array {
  if (bitsets.length === 0) return new Uint32Array(0);

  // Copy the first bitset so we never mutate a caller-owned buffer.
  const out = bitsets[0].slice();
  const len = out.length;

  for (let i = 1; i < bitsets.length; i++) {
    const bs    = bitsets[i];
    const words = Math.min(len, bs.length);
    for (let w = 0; w < words; w++) {
      out[w] = out[w] & bs[w];
    }
    // Zero remaining words if `bs` is shorter than `out`.
    for (let w = words; w < len; w++) {
      out[w] = 0;
    }
  }

  return out;
}

// ── Population count ─────────────────────────────────────────────────────────

/**
 * Count set bits in `bs`, considering only bits 0..(limit-1).
 * If `limit` is omitted, all bits in the array are counted.
 */
export function popcount(bs: Uint32Array, limit?: number): number {
  const effectiveLimit = limit ?? bs.length * 32;
  const fullWords      = effectiveLimit >>> 5;
  const tailBits       = effectiveLimit  &  31;

  let count = 0;

  const bulk = Math.min(fullWords, bs.length);
  for (let w = 0; w < bulk; w++) {
    count += popcountWord(bs[w]);
  }

  if (tailBits > 0 && fullWords < bs.length) {
    // Mask off bits beyond `limit` in the partial last word.
    const mask = (1 << tailBits) - 1;
    count += popcountWord(bs[fullWords] & mask);
  }

  return count;
}

/** Hamming weight of a single unsigned 32-bit word (parallel bit summation). */
function popcountWord(v: number): number {
  v = v - ((v >>> 1) & 0x55555555);
  v = (v & 0x33333333) + ((v >>> 2) & 0x33333333);
  return (((v + (v >>> 4)) & 0x0f0f0f0f) * 0x01010101) >>> 24;
}

// ── Iteration ────────────────────────────────────────────────────────────────

/**
 * Invoke `fn` for each set bit j in `bs`, where j < limit, in ascending order.
 *
 * Zero words are skipped in O(1); within a word, `word & -word` isolates the
 * lowest set bit and `Math.clz32` turns it into a position.
 */
export function forEachSet(
  bs:    Uint32Array,
  limit: number,
  fn:    (j: number) => void,
): void {
  const wordCount = Math.ceil(limit / 32);
  const lastWord  = wordCount - 1;

  for (let w = 0; w < wordCount && w < bs.length; w++) {
    let word: number = bs[w];

    if (w === lastWord) {
      const tail = limit & 31;
      if (tail !== 0) word &= (1 << tail) - 1;
    }

    if (word === 0) continue;

    const base = w << 5;

    while (word !== 0) {
      const lsb = word & -word;
      const pos = 31 - Math.clz32(lsb);
      fn(base + pos);
      word &= word - 1;
    }
  }
}

/** Row indices of all set bits below `limit`, ascending. */
export function collectSet(bs: Uint32Array, limit: number): Uint32Array {
  const out = new Uint32Array(popcount(bs, limit));
  let k = 0;
  forEachSet(bs, limit, (j) => { out[k++] = j; });
  return out;
}

// ── Byte bitmaps ─────────────────────────────────────────────────────────────

/**
 * Expand `length` bits of an LSB-first byte bitmap, starting at bit `offset`,
 * into booleans. This is the layout of bit-packed bool value buffers: value i
 * lives at bit (offset + i) & 7 of byte (offset + i) >>> 3.
 */
export function unpackBits(bytes: Uint8Array, offset: number, length: number): boolean[] {
  const out = new Array<boolean>(length);
  for (let i = 0; i < length; i++) {
    const bit = offset + i;
    out[i] = (bytes[bit >>> 3] & (1 << (bit & 7))) !== 0;
  }
  return out;
}

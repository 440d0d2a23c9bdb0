/**
 * Visual ordering for right-to-left text
 *
 * The Pixoo draws text strictly left to right, so Hebrew or Arabic lines
 * are reordered before they are sent or burned in.
 */

import bidiFactory from 'bidi-js';

const RTL_PATTERN = /[\u0590-\u05FF\u0600-\u06FF\u0750-\u077F\u08A0-\u08FF\uFB1D-\uFDFF\uFE70-\uFEFF]/;

const bidi = bidiFactory();

export function hasRtl(text: string): boolean {
  return RTL_PATTERN.test(text);
}

/**
 * Reorder one line from logical to display order, left-to-right base
 */
export function visualOrder(text: string): string {
  if (!hasRtl(text)) return text;

  const levels = bidi.getEmbeddingLevels(text, 'ltr');
  const mirrored = bidi.getMirroredCharactersMap(text, levels);
  // Indices are UTF-16 code units
  const chars = text.split('').map((char, index) => mirrored.get(index) ?? char);

  for (const [start, end] of bidi.getReorderSegments(text, levels)) {
    const reversed = chars.slice(start, end + 1).reverse();
    chars.splice(start, reversed.length, ...reversed);
  }
  return chars.join('');
}

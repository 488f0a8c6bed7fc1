/**
 * Offset-based text edits, applied bottom-to-top so earlier offsets stay valid.
 */

import { SerializationError } from "./errors.js";

export interface TextEdit {
  start: number;
  end: number;
  text: string;
}

/**
 * Apply edits bottom-to-top. Edits must lie inside the source and must not
 * overlap; either violation is a SerializationError.
 */
export function applyEdits(source: string, edits: TextEdit[]): string {
  const sorted = [...edits].sort((a, b) => a.start - b.start || a.end - b.end);

  for (let i = 0; i < sorted.length; i++) {
    const edit = sorted[i];
    if (edit.start < 0 || edit.end > source.length || edit.start > edit.end) {
      throw new SerializationError(`Edit [${edit.start}, ${edit.end}) is outside the source`);
    }
    if (i > 0 && edit.start < sorted[i - 1].end) {
      throw new SerializationError(`Overlapping edits at offset ${edit.start}`);
    }
  }

  let result = source;
  for (let i = sorted.length - 1; i >= 0; i--) {
    const edit = sorted[i];
    result = result.slice(0, edit.start) + edit.text + result.slice(edit.end);
  }
  return result;
}

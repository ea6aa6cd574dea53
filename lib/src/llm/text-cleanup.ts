/**
 * Completion cleanup
 */

const ANSWER_MARKER = 'Answer:';
const SENTENCE_BREAK = '. ';

/**
 * Clean a raw completion:
 * 1. trim
 * 2. keep only what follows the last "Answer:" marker, if any
 * 3. when the text does not end in . ! or ? and holds more than one sentence,
 *    drop the trailing fragment and close with a period
 *
 * Applying it twice gives the same result as applying it once.
 */
export function cleanResponse(text: string): string {
  let cleaned = text.trim();

  const markerIndex = cleaned.lastIndexOf(ANSWER_MARKER);
  if (markerIndex !== -1) {
    cleaned = cleaned.slice(markerIndex + ANSWER_MARKER.length).trim();
  }

  if (cleaned && !/[.!?]$/.test(cleaned)) {
    const sentences = cleaned.split(SENTENCE_BREAK);
    if (sentences.length > 1) {
      cleaned = sentences.slice(0, -1).join(SENTENCE_BREAK) + '.';
    }
  }

  return cleaned;
}

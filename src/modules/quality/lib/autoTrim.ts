import { countWords, offsetAfterWords } from "../../../lib/text";
import type { GrantSection } from "../../proposals/types";

export const TRIM_NOTICE = "[Section trimmed to fit page limit]";

/** Smallest max_words a section may carry; the notice alone fills it. */
export const TRIM_NOTICE_WORDS = countWords(TRIM_NOTICE);
const SENTENCE_BACKOFF_SPAN = 0.1;

/**
 * Cuts a section down to at most `maxWords` tokens, notice included. Backs
 * off to the last period when one falls within the final tenth of the cut.
 * Returns a new section.
 */
export function trimSection(section: GrantSection, maxWords: number): GrantSection {
  if (maxWords < TRIM_NOTICE_WORDS) {
    throw new RangeError(
      `maxWords must be at least ${TRIM_NOTICE_WORDS} to fit the trim notice, got ${maxWords}`
    );
  }
  const keep = maxWords - TRIM_NOTICE_WORDS;
  let text = section.content.slice(0, offsetAfterWords(section.content, keep));

  const lastPeriod = text.lastIndexOf(".");
  if (lastPeriod >= 0 && lastPeriod >= text.length * (1 - SENTENCE_BACKOFF_SPAN)) {
    text = text.slice(0, lastPeriod + 1);
  }

  text = text.trimEnd();
  const content = text ? `${text}\n\n${TRIM_NOTICE}` : TRIM_NOTICE;
  const wordCount = countWords(content);
  const note = `Auto-trimmed from ${section.word_count} to ${wordCount} words`;

  return {
    ...section,
    content,
    word_count: wordCount,
    refinement_notes: section.refinement_notes
      ? `${section.refinement_notes}; ${note}`
      : note,
  };
}

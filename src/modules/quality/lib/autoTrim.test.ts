import { trimSection, TRIM_NOTICE, TRIM_NOTICE_WORDS } from "./autoTrim";
import type { GrantSection } from "../../proposals/types";

function words(n: number, prefix = "w"): string {
  return Array.from({ length: n }, (_, i) => `${prefix}${i + 1}`).join(" ");
}

function section(content: string, extra: Partial<GrantSection> = {}): GrantSection {
  return {
    name: "Project Pitch",
    content,
    word_count: content.split(/\s+/).filter(Boolean).length,
    iteration: 1,
    ...extra,
  };
}

describe("trimSection", () => {
  it("keeps room for the notice inside the word limit", () => {
    const trimmed = trimSection(section(words(20)), 10);

    expect(trimmed.content).toBe(`w1 w2 w3 w4\n\n${TRIM_NOTICE}`);
    expect(trimmed.word_count).toBe(10);
    expect(trimmed.refinement_notes).toBe("Auto-trimmed from 20 to 10 words");
  });

  it("backs off to a period in the last tenth of the cut", () => {
    const content = `aaaaaaaaaa bbbbbbbbbb cccccccccc dddddddddd. ${words(16, "e")}`;
    const trimmed = trimSection(section(content), 11);

    expect(trimmed.content).toBe(
      `aaaaaaaaaa bbbbbbbbbb cccccccccc dddddddddd.\n\n${TRIM_NOTICE}`
    );
    expect(trimmed.word_count).toBe(10);
  });

  it("ignores a period earlier in the cut", () => {
    const trimmed = trimSection(section(`One. ${words(10)}`), 10);
    expect(trimmed.content).toBe(`One. w1 w2 w3\n\n${TRIM_NOTICE}`);
  });

  it("appends to existing refinement notes", () => {
    const trimmed = trimSection(
      section(words(20), { refinement_notes: "Refined based on critical feedback" }),
      10
    );
    expect(trimmed.refinement_notes).toBe(
      "Refined based on critical feedback; Auto-trimmed from 20 to 10 words"
    );
  });

  it("leaves only the notice when the limit equals its length", () => {
    const trimmed = trimSection(section(words(20)), TRIM_NOTICE_WORDS);
    expect(trimmed.content).toBe(TRIM_NOTICE);
    expect(trimmed.word_count).toBe(6);
  });

  it("refuses a limit shorter than the notice", () => {
    expect(() => trimSection(section(words(20)), 4)).toThrow(RangeError);
  });

  it("does not modify its input", () => {
    const original = section(words(20));
    trimSection(original, 10);
    expect(original.content).toBe(words(20));
    expect(original.word_count).toBe(20);
    expect(original.refinement_notes).toBeUndefined();
  });
});

import { describe, it, expect } from "vitest";
import {
  ExclusionContentValidator,
  htmlToText,
  truncateDescription,
} from "../src/validation";
import { makeItem } from "./helpers/fixtures";

/** Creates a validator with one keyword and one phrase. */
function makeValidator() {
  return new ExclusionContentValidator({
    keywords: ["php", " "],
    phrases: ["Commission Only"],
  });
}

describe("ExclusionContentValidator", () => {
  it("accepts a clean posting", async () => {
    expect(await makeValidator().validate(makeItem())).toEqual({ valid: true });
  });

  it("rejects an excluded keyword in the title", async () => {
    const result = await makeValidator().validate(makeItem({ title: "Senior PHP Developer" }));

    expect(result).toEqual({ valid: false, reason: 'excluded keyword "php" in title' });
  });

  it("matches keywords as whole words only", async () => {
    const result = await makeValidator().validate(
      makeItem({ description: "<p>We test with phpunit-like tools</p>" }),
    );

    expect(result.valid).toBe(true);
  });

  it("rejects an excluded phrase in the HTML description", async () => {
    const result = await makeValidator().validate(
      makeItem({ description: "<p>Pay is <b>commission only</b></p>" }),
    );

    expect(result).toEqual({
      valid: false,
      reason: 'excluded phrase "commission only" in description',
    });
  });

  it("rejects an empty title", async () => {
    expect(await makeValidator().validate(makeItem({ title: "   " }))).toEqual({
      valid: false,
      reason: "empty title",
    });
  });
});

describe("htmlToText", () => {
  it("drops tags and collapses whitespace", () => {
    expect(htmlToText("<p>Hello <b>world</b></p>\n<p>Again</p>")).toBe("Hello world Again");
    expect(htmlToText("")).toBe("");
  });
});

describe("truncateDescription", () => {
  it("cuts long text with a marker", () => {
    const text = "x".repeat(8001);

    expect(truncateDescription(text)).toBe(
      `${"x".repeat(8000)}\n\n[...truncated for length]`,
    );
    expect(truncateDescription("short")).toBe("short");
  });
});

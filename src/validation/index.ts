import * as cheerio from "cheerio";
import type { ContentValidator } from "../ports";
import type { ExclusionConfig } from "../config";
import type { ValidationResult, WorkItem } from "../types";

const MAX_DESCRIPTION_LENGTH = 8000;

export function htmlToText(html: string): string {
  if (!html) return "";
  const $ = cheerio.load(html);
  return $.root().text().replace(/\s+/g, " ").trim();
}

export function truncateDescription(text: string): string {
  if (text.length <= MAX_DESCRIPTION_LENGTH) return text;
  return text.substring(0, MAX_DESCRIPTION_LENGTH) + "\n\n[...truncated for length]";
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

interface KeywordRule {
  keyword: string;
  pattern: RegExp;
}

/**
 * Hard exclusion policy: a posting whose title or description contains an
 * excluded keyword (as a whole word) or phrase is invalid.
 */
export class ExclusionContentValidator implements ContentValidator {
  private readonly keywords: KeywordRule[];
  private readonly phrases: string[];

  constructor(config: ExclusionConfig) {
    this.keywords = config.keywords
      .map((k) => k.trim())
      .filter((k) => k.length > 0)
      .map((keyword) => ({
        keyword,
        pattern: new RegExp(
          `(?<![\\p{L}\\p{N}])${escapeRegExp(keyword)}(?![\\p{L}\\p{N}])`,
          "iu",
        ),
      }));
    this.phrases = config.phrases
      .map((p) => p.trim().toLowerCase())
      .filter((p) => p.length > 0);
  }

  async validate(item: WorkItem): Promise<ValidationResult> {
    const title = item.title.trim();
    if (!title) {
      return { valid: false, reason: "empty title" };
    }

    const fields: Array<[string, string]> = [
      ["title", title],
      ["description", htmlToText(item.description)],
    ];

    for (const [field, text] of fields) {
      for (const { keyword, pattern } of this.keywords) {
        if (pattern.test(text)) {
          return { valid: false, reason: `excluded keyword "${keyword}" in ${field}` };
        }
      }

      const lower = text.toLowerCase();
      for (const phrase of this.phrases) {
        if (lower.includes(phrase)) {
          return { valid: false, reason: `excluded phrase "${phrase}" in ${field}` };
        }
      }
    }

    return { valid: true };
  }
}

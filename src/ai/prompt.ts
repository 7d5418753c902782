import { htmlToText, truncateDescription } from "../validation";
import type { ClassificationResult, WorkItem } from "../types";
import type { RelevanceVerdict } from "./types";

export const CLASSIFIER_SYSTEM_PROMPT = `You are an experienced technical recruiter screening job postings for one candidate.
Given the candidate's profile and a job posting, decide whether the posting is worth the candidate's attention.

You MUST return ONLY a valid JSON object with these exact fields:
{
  "isRelevant": <true|false>,
  "relevanceScore": <number 0.0-1.0>,
  "reasoning": "<1-3 sentences>",
  "matchedSkills": ["<skill from the profile that the posting asks for>", ...]
}

Scoring guide:
- 0.8-1.0: core stack and seniority match, candidate should apply
- 0.6-0.79: solid overlap with some gaps
- 0.3-0.59: partial overlap, probably not worth it
- 0.0-0.29: different role or stack

Rules:
- Judge on technical skills, seniority and the candidate's stated preferences
- Return ONLY the JSON object, no markdown, no explanation outside JSON`;

export const COVER_NOTE_SYSTEM_PROMPT = `You write short, specific cover notes for job applications.
Write 4-6 sentences in the first person, addressed to the hiring team.
Mention two or three concrete matches between the candidate's profile and the posting.
No greetings like "Dear Sir", no placeholders, no markdown. Return only the note text.`;

function postingBlock(item: WorkItem): string[] {
  return [
    `=== JOB POSTING ===`,
    `Title: ${item.title}`,
    `Company: ${item.company}`,
    ``,
    `Description:`,
    truncateDescription(htmlToText(item.description)),
  ];
}

export function buildClassificationPrompt(profile: string, item: WorkItem): string {
  return [
    `=== CANDIDATE PROFILE ===`,
    profile,
    ``,
    ...postingBlock(item),
    ``,
    `Assess how relevant this posting is for the candidate. Return ONLY a JSON object.`,
  ].join("\n");
}

export function buildCoverNotePrompt(
  profile: string,
  item: WorkItem,
  classification: ClassificationResult,
): string {
  return [
    `=== CANDIDATE PROFILE ===`,
    profile,
    ``,
    ...postingBlock(item),
    ``,
    `=== SCREENING NOTES ===`,
    classification.rationale,
    classification.tags.length > 0
      ? `Matched skills: ${classification.tags.join(", ")}`
      : "",
    ``,
    `Write the cover note.`,
  ].join("\n");
}

/** Drops reasoning blocks and markdown fences some models wrap around JSON. */
export function extractJson(raw: string): string {
  let jsonStr = raw.trim();

  jsonStr = jsonStr.replace(/<think>[\s\S]*?<\/think>/gi, "").trim();

  const jsonMatch = jsonStr.match(/```(?:json)?\s*\n?([\s\S]*?)\n?\s*```/);
  if (jsonMatch) {
    jsonStr = jsonMatch[1].trim();
  }

  return jsonStr;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseRelevanceVerdict(raw: string): RelevanceVerdict | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJson(raw));
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;

  const { isRelevant, relevanceScore, reasoning, matchedSkills } = parsed;
  if (typeof isRelevant !== "boolean" || typeof relevanceScore !== "number") {
    return null;
  }
  if (!Number.isFinite(relevanceScore)) return null;

  // Some models answer on a 0-100 scale.
  const normalized = relevanceScore > 1 ? relevanceScore / 100 : relevanceScore;

  return {
    isRelevant,
    relevanceScore: Math.max(0, Math.min(1, normalized)),
    reasoning: typeof reasoning === "string" ? reasoning : "",
    matchedSkills: Array.isArray(matchedSkills)
      ? matchedSkills.filter((s): s is string => typeof s === "string")
      : [],
  };
}

/** Strips fences and surrounding quotes from a generated note. */
export function cleanCoverNote(raw: string): string {
  return raw
    .replace(/<think>[\s\S]*?<\/think>/gi, "")
    .replace(/^```[a-z]*\s*|\s*```$/g, "")
    .trim()
    .replace(/^"([\s\S]*)"$/, "$1")
    .trim();
}

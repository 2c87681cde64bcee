import { readFile } from "fs/promises";
import { logger } from "../logger";
import { ValidationError } from "../errors";
import type { AIClient } from "../ai";
import type { ResumeProfile } from "../types";
import { normalizeEmail, resumeProfileSchema } from "./schema";

export const PARSE_SYSTEM_PROMPT = `You extract structured data from resumes.
Only use what is explicitly stated in the text. Do not infer or invent any details; use null or an empty list when something is absent.

Return ONLY a JSON object with these fields:
{
  "name": string,
  "email": string,
  "phone": string | null,
  "location": string | null,
  "summary": string | null,
  "skills": string[],
  "education": [{"degree": string, "fieldOfStudy": string | null, "institution": string, "startYear": string | null, "endYear": string | null}],
  "experience": [{"jobTitle": string, "company": string, "location": string | null, "startDate": string | null, "endDate": string | null, "description": string | null}],
  "projects": [{"name": string, "description": string | null, "technologies": string[]}],
  "certifications": [{"name": string, "issuer": string | null, "year": string | null}],
  "languages": string[],
  "links": {"linkedin": string | null, "github": string | null, "portfolio": string | null} | null
}`;

export function buildParsePrompt(resumeText: string): string {
  return [
    `Extract the structured resume information from the text below.`,
    ``,
    `--- RESUME TEXT ---`,
    resumeText,
    `--- END RESUME TEXT ---`,
  ].join("\n");
}

export async function loadResumeText(path: string): Promise<string> {
  const text = (await readFile(path, "utf-8")).trim();
  if (!text) {
    throw new ValidationError(`Resume file ${path} is empty`, "resume");
  }
  logger.info(`Resume loaded: ${text.length} chars from ${path}`);
  return text;
}

/**
 * Turns free-form resume text into a profile. When `expectedEmail` is set,
 * the parsed email must match it so the stored row stays keyed correctly.
 */
export async function parseResume(
  client: AIClient,
  resumeText: string,
  expectedEmail?: string,
): Promise<ResumeProfile> {
  const profile = await client.completeJson(
    PARSE_SYSTEM_PROMPT,
    buildParsePrompt(resumeText),
    resumeProfileSchema,
  );

  if (expectedEmail && profile.email !== normalizeEmail(expectedEmail)) {
    throw new ValidationError(
      `Parsed resume email ${profile.email} does not match ${expectedEmail}`,
      "email",
    );
  }

  logger.info(
    `Parsed resume for ${profile.name}: ${profile.experience.length} experience, ${profile.projects.length} projects, ${profile.skills.length} skills`,
  );
  return profile;
}

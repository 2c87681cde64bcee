import { z } from "zod";
import { logger } from "../logger";
import { PermanentOracleError } from "../errors";
import { stripHtml, truncateDescription, type AIClient } from "../ai";
import type { Job, ResumeProfile } from "../types";

export interface ScoreResult {
  score: number;
  rationale: string;
}

export type ScoringInput = Pick<Job, "jobId" | "title" | "company" | "level" | "description">;

/** Rates how well a resume profile fits a job, 0-100. */
export interface ScoringOracle {
  score(profile: ResumeProfile, job: ScoringInput): Promise<ScoreResult>;
}

const SECTION_BREAK = "\n---\n";

// Resume Formatting

export function formatResumeToText(profile: ResumeProfile): string {
  const lines: string[] = [];

  lines.push(`Name: ${profile.name}`);
  lines.push(`Email: ${profile.email}`);
  if (profile.phone) lines.push(`Phone: ${profile.phone}`);
  if (profile.location) lines.push(`Location: ${profile.location}`);
  if (profile.links) {
    const { linkedin, github, portfolio } = profile.links;
    const links = [
      linkedin ? `linkedin: ${linkedin}` : null,
      github ? `github: ${github}` : null,
      portfolio ? `portfolio: ${portfolio}` : null,
    ]
      .filter((entry): entry is string => entry !== null)
      .join(", ");
    if (links) lines.push(`Links: ${links}`);
  }
  lines.push(SECTION_BREAK);

  if (profile.summary) {
    lines.push("Summary:", profile.summary, SECTION_BREAK);
  }

  if (profile.skills.length > 0) {
    lines.push("Skills:", profile.skills.join(", "), SECTION_BREAK);
  }

  if (profile.experience.length > 0) {
    lines.push("Experience:");
    for (const exp of profile.experience) {
      lines.push(`\n* ${exp.jobTitle} at ${exp.company}`);
      if (exp.location) lines.push(`  Location: ${exp.location}`);
      lines.push(`  Dates: ${exp.startDate ?? "?"} - ${exp.endDate ?? "Present"}`);
      if (exp.description) {
        lines.push("  Description:");
        for (const line of exp.description.split("\n")) {
          if (line.trim()) lines.push(`    - ${line.trim()}`);
        }
      }
    }
    lines.push(SECTION_BREAK);
  }

  if (profile.education.length > 0) {
    lines.push("Education:");
    for (const edu of profile.education) {
      const degree = edu.fieldOfStudy ? `${edu.degree}, ${edu.fieldOfStudy}` : edu.degree;
      lines.push(`\n* ${degree} from ${edu.institution}`);
      lines.push(`  Years: ${edu.startYear ?? "?"} - ${edu.endYear ?? "Present"}`);
    }
    lines.push(SECTION_BREAK);
  }

  if (profile.projects.length > 0) {
    lines.push("Projects:");
    for (const project of profile.projects) {
      lines.push(`\n* ${project.name}`);
      if (project.description) lines.push(`  Description: ${project.description}`);
      if (project.technologies.length > 0) {
        lines.push(`  Technologies: ${project.technologies.join(", ")}`);
      }
    }
    lines.push(SECTION_BREAK);
  }

  if (profile.certifications.length > 0) {
    lines.push("Certifications:");
    for (const cert of profile.certifications) {
      let info = cert.name;
      if (cert.issuer) info += ` (${cert.issuer})`;
      if (cert.year) info += ` - ${cert.year}`;
      lines.push(`* ${info}`);
    }
    lines.push(SECTION_BREAK);
  }

  if (profile.languages.length > 0) {
    lines.push("Languages:", profile.languages.join(", "), SECTION_BREAK);
  }

  return lines.join("\n");
}

// Prompting

export const SCORING_SYSTEM_PROMPT = `You are a scoring assistant. You will be given a resume and a job description.
Based only on the information provided, rate the candidate's suitability for the role.

Return ONLY a JSON object:
{
  "score": <integer 0-100>,
  "rationale": "<one or two sentences>"
}

No markdown, no text outside the JSON object.`;

export function buildScoringPrompt(resumeText: string, job: ScoringInput, description: string): string {
  return [
    `--- RESUME ---`,
    resumeText,
    `--- END RESUME ---`,
    ``,
    `--- JOB DESCRIPTION ---`,
    `Job Title: ${job.title ?? "N/A"}`,
    `Company: ${job.company ?? "N/A"}`,
    `Level: ${job.level ?? "N/A"}`,
    ``,
    description,
    `--- END JOB DESCRIPTION ---`,
  ].join("\n");
}

const scoreResponseSchema = z.object({
  score: z.number(),
  rationale: z.string().nullish().transform((v) => v ?? ""),
});

/**
 * Oracle backed by a chat-completions model. The returned score is passed
 * through unclamped; range checks happen when it is applied to a job.
 */
export class AIScoringOracle implements ScoringOracle {
  constructor(private readonly client: AIClient) {}

  async score(profile: ResumeProfile, job: ScoringInput): Promise<ScoreResult> {
    const description = job.description ? stripHtml(job.description) : "";
    if (!description) {
      throw new PermanentOracleError(`Job ${job.jobId} has no description to score`);
    }

    const prompt = buildScoringPrompt(
      formatResumeToText(profile),
      job,
      truncateDescription(description),
    );

    const result = await this.client.completeJson(
      SCORING_SYSTEM_PROMPT,
      prompt,
      scoreResponseSchema,
    );

    logger.info(`AI: Score ${result.score}/100 for ${job.title} @ ${job.company}`);
    return result;
  }
}

import type { Experience, Job, Project, ResumeProfile } from "../types";

export type Section = "summary" | "experience" | "projects" | "skills";

export const PERSONALIZE_SYSTEM_PROMPT = `You are an expert resume writer.
You enhance one section of a resume so it aligns with a target job, using only facts present in the resume.

Rules:
- Rewrite only the section you are given. Never return the full resume.
- Rephrasing and emphasis are allowed. Inventing skills, roles, projects, numbers or dates is not.
- Keep the candidate's stated professional identity and experience level.
- Return ONLY the JSON object described in the prompt. No markdown, no text outside it.`;

export const VALIDATE_SYSTEM_PROMPT = `You are a meticulous resume fact-checker.
You compare an original resume section with a customized version and decide whether the customized version introduces anything not supported by the original resume.

Return ONLY a JSON object:
{
  "is_valid": <true|false>,
  "reason": "<short explanation; name the unsupported claim when invalid>"
}`;

export type JobContext = Pick<Job, "title" | "company" | "level" | "description">;

function jobBlock(job: JobContext): string {
  return [
    `**Target Job:**`,
    `- Title: ${job.title ?? "N/A"}`,
    `- Company: ${job.company ?? "N/A"}`,
    `- Seniority Level: ${job.level ?? "N/A"}`,
    `- Description: ${job.description ?? ""}`,
  ].join("\n");
}

/** The resume as JSON, minus the section being edited. */
export function resumeContext(profile: ResumeProfile, exclude: Section): string {
  const context: Partial<ResumeProfile> = { ...profile };
  delete context[exclude];
  return JSON.stringify(context, null, 2);
}

function intro(profile: ResumeProfile, job: JobContext, section: Section): string {
  return [
    `**Task:** Enhance the "${section}" section of this resume for the target job.`,
    ``,
    jobBlock(job),
    ``,
    `**Full Resume Context (excluding the section being edited):**`,
    resumeContext(profile, section),
    ``,
  ].join("\n");
}

export function summaryPrompt(profile: ResumeProfile, job: JobContext, summary: string): string {
  return [
    intro(profile, job, "summary"),
    `**Original Summary:**`,
    JSON.stringify(summary),
    ``,
    `**Instructions:**`,
    `- Rewrite only the summary to be concise and relevant to the target job.`,
    `- Preserve the candidate's primary role and years of experience exactly.`,
    `- Highlight 2-3 qualifications from the resume that match the job.`,
    ``,
    `**Expected JSON:** {"summary": "..."}`,
  ].join("\n");
}

export function experiencePrompt(profile: ResumeProfile, job: JobContext, item: Experience): string {
  return [
    intro(profile, job, "experience"),
    `**Original Experience Item:**`,
    JSON.stringify(item, null, 2),
    ``,
    `**Instructions:**`,
    `- Enhance the description only. Title, company, location and dates stay unchanged.`,
    `- Show how existing skills were applied and their impact, using the job's keywords where truthful.`,
    ``,
    `**Expected JSON:** {"description": "..."}`,
  ].join("\n");
}

export function projectPrompt(profile: ResumeProfile, job: JobContext, item: Project): string {
  return [
    intro(profile, job, "projects"),
    `**Original Project Item:**`,
    JSON.stringify(item, null, 2),
    ``,
    `**Instructions:**`,
    `- Enhance the description only. Name and technologies stay unchanged.`,
    `- Show how the listed technologies were applied.`,
    ``,
    `**Expected JSON:** {"description": "..."}`,
  ].join("\n");
}

export function skillsPrompt(profile: ResumeProfile, job: JobContext, skills: string[]): string {
  return [
    intro(profile, job, "skills"),
    `**Original Skills List:**`,
    JSON.stringify(skills, null, 2),
    ``,
    `**Instructions:**`,
    `- Only keep skills literally written somewhere in the resume. Never infer new ones.`,
    `- Select the 5 to 15 most relevant to the target job; fewer if fewer genuinely apply.`,
    `- Prefer the specific skill over a general one (AWS over Cloud Computing).`,
    ``,
    `**Expected JSON:** {"skills": ["...", "..."]}`,
  ].join("\n");
}

export function validationPrompt(
  profile: ResumeProfile,
  job: JobContext,
  section: Section,
  original: unknown,
  customized: unknown,
): string {
  return [
    `**Task:** Decide whether the customized "${section}" section is factually supported by the original resume.`,
    ``,
    jobBlock(job),
    ``,
    `**Original Full Resume Context:**`,
    resumeContext(profile, section),
    ``,
    `**Original Section:**`,
    JSON.stringify(original, null, 2),
    ``,
    `**Customized Section:**`,
    JSON.stringify(customized, null, 2),
    ``,
    `**Criteria:**`,
    `1. Facts, numbers, dates, roles and technologies must be supported by the original materials.`,
    `2. Any skill mentioned must appear somewhere in the original resume.`,
    `3. The primary professional identity must not change.`,
    `Rephrasing, reordering and emphasis are acceptable.`,
  ].join("\n");
}

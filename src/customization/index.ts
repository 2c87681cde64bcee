import { z } from "zod";
import { logger } from "../logger";
import { CustomizationRejectedError } from "../errors";
import type { AIClient } from "../ai";
import type {
  CustomizedResumeDraft,
  Experience,
  Job,
  Project,
  ResumeProfile,
} from "../types";
import {
  PERSONALIZE_SYSTEM_PROMPT,
  VALIDATE_SYSTEM_PROMPT,
  experiencePrompt,
  projectPrompt,
  skillsPrompt,
  summaryPrompt,
  validationPrompt,
  type JobContext,
  type Section,
} from "./prompts";
import {
  artifactBaseName,
  createAttemptId,
  removeResumeArtifacts,
  writeResumeArtifacts,
} from "./render";

export type CustomizationInput = Pick<
  Job,
  "jobId" | "title" | "company" | "level" | "description"
>;

/** Produces a job-specific resume and its stored artifact. */
export interface ResumeCustomizer {
  customize(profile: ResumeProfile, job: CustomizationInput): Promise<CustomizedResumeDraft>;
  /** Removes the artifacts of a draft that was never linked to its job. */
  discard(draft: CustomizedResumeDraft): Promise<void>;
}

export interface CustomizerOptions {
  artifactsDir: string;
  writeMarkdown: boolean;
  attemptId?: () => string;
}

const summarySchema = z.object({ summary: z.string().min(1) });
const descriptionSchema = z.object({ description: z.string().min(1) });
const skillsSchema = z.object({ skills: z.array(z.string()).min(1) });
const verdictSchema = z.object({
  is_valid: z.boolean(),
  reason: z.string().nullish().transform((v) => v ?? ""),
});

/**
 * Personalizes summary, experience, projects and skills in that order.
 * Each rewritten section is fact-checked by a second call; the first
 * rejection aborts the whole customization.
 */
export class AIResumeCustomizer implements ResumeCustomizer {
  private readonly attemptId: () => string;

  constructor(
    private readonly client: AIClient,
    private readonly options: CustomizerOptions,
  ) {
    this.attemptId = options.attemptId ?? (() => createAttemptId());
  }

  async customize(
    profile: ResumeProfile,
    job: CustomizationInput,
  ): Promise<CustomizedResumeDraft> {
    const jobContext: JobContext = job;
    let tailored: ResumeProfile = { ...profile };

    if (profile.summary) {
      const summary = await this.personalizeSummary(profile, jobContext, profile.summary);
      await this.validate(job.jobId, profile, jobContext, "summary", profile.summary, summary);
      tailored = { ...tailored, summary };
    }

    if (profile.experience.length > 0) {
      const experience: Experience[] = [];
      for (const item of profile.experience) {
        experience.push(await this.personalizeExperience(profile, jobContext, item));
      }
      await this.validate(job.jobId, profile, jobContext, "experience", profile.experience, experience);
      tailored = { ...tailored, experience };
    }

    if (profile.projects.length > 0) {
      const projects: Project[] = [];
      for (const item of profile.projects) {
        projects.push(await this.personalizeProject(profile, jobContext, item));
      }
      await this.validate(job.jobId, profile, jobContext, "projects", profile.projects, projects);
      tailored = { ...tailored, projects };
    }

    if (profile.skills.length > 0) {
      const skills = await this.personalizeSkills(profile, jobContext, profile.skills);
      await this.validate(job.jobId, profile, jobContext, "skills", profile.skills, skills);
      tailored = { ...tailored, skills };
    }

    // Every attempt gets its own files, so an overlapping run never overwrites a linked one
    const resumeLink = await writeResumeArtifacts(
      this.options.artifactsDir,
      artifactBaseName(job.jobId, this.attemptId()),
      tailored,
      this.options.writeMarkdown,
    );
    logger.info(`Customized resume for ${job.jobId} written to ${resumeLink}`);

    return { ...tailored, resumeLink };
  }

  async discard(draft: CustomizedResumeDraft): Promise<void> {
    await removeResumeArtifacts(draft.resumeLink);
    logger.info(`Removed unlinked resume artifacts at ${draft.resumeLink}`);
  }

  private async personalizeSummary(
    profile: ResumeProfile,
    job: JobContext,
    summary: string,
  ): Promise<string> {
    const result = await this.client.completeJson(
      PERSONALIZE_SYSTEM_PROMPT,
      summaryPrompt(profile, job, summary),
      summarySchema,
    );
    return result.summary;
  }

  // Only the description may change; every other field is carried over
  private async personalizeExperience(
    profile: ResumeProfile,
    job: JobContext,
    item: Experience,
  ): Promise<Experience> {
    if (!item.description) return item;
    const result = await this.client.completeJson(
      PERSONALIZE_SYSTEM_PROMPT,
      experiencePrompt(profile, job, item),
      descriptionSchema,
    );
    return { ...item, description: result.description };
  }

  private async personalizeProject(
    profile: ResumeProfile,
    job: JobContext,
    item: Project,
  ): Promise<Project> {
    if (!item.description) return item;
    const result = await this.client.completeJson(
      PERSONALIZE_SYSTEM_PROMPT,
      projectPrompt(profile, job, item),
      descriptionSchema,
    );
    return { ...item, description: result.description };
  }

  private async personalizeSkills(
    profile: ResumeProfile,
    job: JobContext,
    skills: string[],
  ): Promise<string[]> {
    const result = await this.client.completeJson(
      PERSONALIZE_SYSTEM_PROMPT,
      skillsPrompt(profile, job, skills),
      skillsSchema,
    );
    return result.skills;
  }

  private async validate(
    jobId: string,
    profile: ResumeProfile,
    job: JobContext,
    section: Section,
    original: unknown,
    customized: unknown,
  ): Promise<void> {
    const verdict = await this.client.completeJson(
      VALIDATE_SYSTEM_PROMPT,
      validationPrompt(profile, job, section, original, customized),
      verdictSchema,
    );

    if (!verdict.is_valid) {
      throw new CustomizationRejectedError(jobId, section, verdict.reason || "no reason given");
    }
    logger.debug(`Customization of ${section} for ${jobId} passed validation`);
  }
}

import { z } from "zod";

// Models sometimes answer years as numbers
const nullableString = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => (v === null || v === undefined ? null : String(v)));

const stringList = z
  .array(z.string())
  .nullish()
  .transform((v) => v ?? []);

export const educationSchema = z.object({
  degree: z.string(),
  fieldOfStudy: nullableString,
  institution: z.string(),
  startYear: nullableString,
  endYear: nullableString,
});

export const experienceSchema = z.object({
  jobTitle: z.string(),
  company: z.string(),
  location: nullableString,
  startDate: nullableString,
  endDate: nullableString,
  description: nullableString,
});

export const projectSchema = z.object({
  name: z.string(),
  description: nullableString,
  technologies: stringList,
});

export const certificationSchema = z.object({
  name: z.string(),
  issuer: nullableString,
  year: nullableString,
});

export const linksSchema = z.object({
  linkedin: nullableString,
  github: nullableString,
  portfolio: nullableString,
});

export const educationListSchema = z
  .array(educationSchema)
  .nullish()
  .transform((v) => v ?? []);
export const experienceListSchema = z
  .array(experienceSchema)
  .nullish()
  .transform((v) => v ?? []);
export const projectListSchema = z
  .array(projectSchema)
  .nullish()
  .transform((v) => v ?? []);
export const certificationListSchema = z
  .array(certificationSchema)
  .nullish()
  .transform((v) => v ?? []);
export { stringList };

/** Resumes are keyed by email, compared without case or surrounding space. */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export const resumeProfileSchema = z.object({
  name: z.string().min(1),
  email: z.string().trim().toLowerCase().email(),
  phone: nullableString,
  location: nullableString,
  summary: nullableString,
  skills: stringList,
  education: educationListSchema,
  experience: experienceListSchema,
  projects: projectListSchema,
  certifications: certificationListSchema,
  languages: stringList,
  links: linksSchema.nullish().transform((v) => v ?? null),
});


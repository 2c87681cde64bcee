import { randomBytes } from "crypto";
import { mkdir, rm, writeFile } from "fs/promises";
import { join } from "path";
import PDFDocument from "pdfkit";
import type { ResumeProfile } from "../types";

function dateRange(start: string | null, end: string | null): string {
  return `${start ?? "?"} - ${end ?? "Present"}`;
}

export function renderResumeMarkdown(profile: ResumeProfile): string {
  const out: string[] = [`# ${profile.name}`, ""];

  const contact = [profile.email, profile.phone, profile.location].filter(
    (part): part is string => Boolean(part),
  );
  if (profile.links) {
    const { linkedin, github, portfolio } = profile.links;
    if (linkedin) contact.push(`[LinkedIn](${linkedin})`);
    if (github) contact.push(`[GitHub](${github})`);
    if (portfolio) contact.push(`[Portfolio](${portfolio})`);
  }
  out.push(contact.join(" | "), "");

  if (profile.summary) {
    out.push("## Summary", "", profile.summary, "");
  }

  if (profile.skills.length > 0) {
    out.push("## Skills", "", profile.skills.join(", "), "");
  }

  if (profile.experience.length > 0) {
    out.push("## Experience", "");
    for (const exp of profile.experience) {
      out.push(`### ${exp.jobTitle}, ${exp.company}`);
      const meta = [exp.location, dateRange(exp.startDate, exp.endDate)].filter(
        (part): part is string => Boolean(part),
      );
      out.push(`*${meta.join(" · ")}*`, "");
      if (exp.description) {
        for (const line of exp.description.split("\n")) {
          const bullet = line.trim().replace(/^[-*•]\s*/, "");
          if (bullet) out.push(`- ${bullet}`);
        }
        out.push("");
      }
    }
  }

  if (profile.projects.length > 0) {
    out.push("## Projects", "");
    for (const project of profile.projects) {
      out.push(`### ${project.name}`);
      if (project.technologies.length > 0) {
        out.push(`*${project.technologies.join(", ")}*`);
      }
      out.push("");
      if (project.description) out.push(project.description, "");
    }
  }

  if (profile.education.length > 0) {
    out.push("## Education", "");
    for (const edu of profile.education) {
      const degree = edu.fieldOfStudy ? `${edu.degree}, ${edu.fieldOfStudy}` : edu.degree;
      out.push(`- **${degree}**, ${edu.institution} (${dateRange(edu.startYear, edu.endYear)})`);
    }
    out.push("");
  }

  if (profile.certifications.length > 0) {
    out.push("## Certifications", "");
    for (const cert of profile.certifications) {
      const issuer = cert.issuer ? ` (${cert.issuer})` : "";
      const year = cert.year ? `, ${cert.year}` : "";
      out.push(`- ${cert.name}${issuer}${year}`);
    }
    out.push("");
  }

  if (profile.languages.length > 0) {
    out.push("## Languages", "", profile.languages.join(", "), "");
  }

  return out.join("\n").trimEnd() + "\n";
}

// ─── PDF ────────────────────────────────────────────────────────────────────

type PdfDoc = InstanceType<typeof PDFDocument>;

const MARGIN = 50;

function heading(doc: PdfDoc, title: string): void {
  doc.moveDown(0.6);
  doc.font("Helvetica-Bold").fontSize(12).text(title.toUpperCase());
  const y = doc.y + 1;
  doc
    .moveTo(MARGIN, y)
    .lineTo(doc.page.width - MARGIN, y)
    .lineWidth(0.5)
    .stroke();
  doc.moveDown(0.3);
  doc.font("Helvetica").fontSize(10);
}

function bullets(doc: PdfDoc, text: string): void {
  for (const line of text.split("\n")) {
    const bullet = line.trim().replace(/^[-*•]\s*/, "");
    if (bullet) doc.text(`•  ${bullet}`, { indent: 10 });
  }
}

/** Lays the profile out on A4 with the standard Helvetica faces. */
export function renderResumePdf(profile: ResumeProfile): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({
      size: "A4",
      margin: MARGIN,
      info: { Title: `${profile.name} - Resume`, Author: profile.name },
    });
    const chunks: Buffer[] = [];
    doc.on("data", (chunk: Buffer) => chunks.push(chunk));
    doc.on("end", () => resolve(Buffer.concat(chunks)));
    doc.on("error", reject);

    doc.font("Helvetica-Bold").fontSize(20).text(profile.name, { align: "center" });

    const contact = [profile.email, profile.phone, profile.location].filter(
      (part): part is string => Boolean(part),
    );
    if (profile.links) {
      const { linkedin, github, portfolio } = profile.links;
      for (const link of [linkedin, github, portfolio]) {
        if (link) contact.push(link);
      }
    }
    doc.font("Helvetica").fontSize(9).text(contact.join("  |  "), { align: "center" });

    if (profile.summary) {
      heading(doc, "Summary");
      doc.text(profile.summary);
    }

    if (profile.skills.length > 0) {
      heading(doc, "Skills");
      doc.text(profile.skills.join(", "));
    }

    if (profile.experience.length > 0) {
      heading(doc, "Experience");
      for (const exp of profile.experience) {
        doc.font("Helvetica-Bold").text(`${exp.jobTitle}, ${exp.company}`);
        const meta = [exp.location, dateRange(exp.startDate, exp.endDate)].filter(
          (part): part is string => Boolean(part),
        );
        doc.font("Helvetica-Oblique").text(meta.join(" · "));
        doc.font("Helvetica");
        if (exp.description) bullets(doc, exp.description);
        doc.moveDown(0.4);
      }
    }

    if (profile.projects.length > 0) {
      heading(doc, "Projects");
      for (const project of profile.projects) {
        doc.font("Helvetica-Bold").text(project.name);
        if (project.technologies.length > 0) {
          doc.font("Helvetica-Oblique").text(project.technologies.join(", "));
        }
        doc.font("Helvetica");
        if (project.description) doc.text(project.description);
        doc.moveDown(0.4);
      }
    }

    if (profile.education.length > 0) {
      heading(doc, "Education");
      for (const edu of profile.education) {
        const degree = edu.fieldOfStudy ? `${edu.degree}, ${edu.fieldOfStudy}` : edu.degree;
        doc.text(`${degree}, ${edu.institution} (${dateRange(edu.startYear, edu.endYear)})`);
      }
    }

    if (profile.certifications.length > 0) {
      heading(doc, "Certifications");
      for (const cert of profile.certifications) {
        const issuer = cert.issuer ? ` (${cert.issuer})` : "";
        const year = cert.year ? `, ${cert.year}` : "";
        doc.text(`${cert.name}${issuer}${year}`);
      }
    }

    if (profile.languages.length > 0) {
      heading(doc, "Languages");
      doc.text(profile.languages.join(", "));
    }

    doc.end();
  });
}

// ─── Artifacts ──────────────────────────────────────────────────────────────

function safeSegment(value: string): string {
  return value.replace(/[^A-Za-z0-9_-]/g, "_");
}

/** Compact UTC timestamp plus a random suffix, unique per customization attempt. */
export function createAttemptId(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\..*$/, "");
  return `${stamp}_${randomBytes(3).toString("hex")}`;
}

export function artifactBaseName(jobId: string, attemptId: string): string {
  return `resume_${safeSegment(jobId)}_${safeSegment(attemptId)}`;
}

/**
 * Writes the PDF (and, when asked, a Markdown copy beside it). Returns the
 * PDF path, which becomes the resume_link.
 */
export async function writeResumeArtifacts(
  dir: string,
  baseName: string,
  profile: ResumeProfile,
  writeMarkdown: boolean,
): Promise<string> {
  await mkdir(dir, { recursive: true });
  const pdfPath = join(dir, `${baseName}.pdf`);
  await writeFile(pdfPath, await renderResumePdf(profile));
  if (writeMarkdown) {
    await writeFile(join(dir, `${baseName}.md`), renderResumeMarkdown(profile), "utf-8");
  }
  return pdfPath;
}

export async function removeResumeArtifacts(resumeLink: string): Promise<void> {
  await rm(resumeLink, { force: true });
  if (resumeLink.endsWith(".pdf")) {
    await rm(resumeLink.replace(/\.pdf$/, ".md"), { force: true });
  }
}

import { afterEach, describe, expect, it, vi } from "vitest";
import { AIClient } from "../ai";
import { PermanentOracleError } from "../errors";
import { makeJob, makeProfile } from "../test-utils";
import { AIScoringOracle, formatResumeToText } from "./index";

function stubCompletion(content: string) {
  const fetchMock = vi.fn(
    async (_input: string | URL | Request, _init?: RequestInit) =>
      new Response(JSON.stringify({ choices: [{ message: { content } }] }), { status: 200 }),
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function oracle(): AIScoringOracle {
  return new AIScoringOracle(
    new AIClient(
      { name: "groq", endpoint: "https://ai.test/chat", model: "test-model", apiKey: "test-secret" },
      { maxRetries: 0, backoffStartMs: 0, timeoutMs: 1000 },
    ),
  );
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("formatResumeToText", () => {
  it("lays out the profile section by section", () => {
    const text = formatResumeToText(
      makeProfile({
        phone: "+65 5550 0000",
        summary: null,
        skills: ["TypeScript", "SQL"],
        education: [],
        projects: [],
        languages: [],
        links: { linkedin: "https://linkedin.example/alex", github: null, portfolio: null },
      }),
    );

    expect(text).toBe(
      [
        "Name: Alex Example",
        "Email: alex@example.com",
        "Phone: +65 5550 0000",
        "Location: Singapore",
        "Links: linkedin: https://linkedin.example/alex",
        "\n---\n",
        "Skills:",
        "TypeScript, SQL",
        "\n---\n",
        "Experience:",
        "\n* Software Engineer at Example Logistics",
        "  Location: Singapore",
        "  Dates: Jan 2022 - Present",
        "  Description:",
        "    - Built order-tracking APIs",
        "    - Moved batch jobs to a queue",
        "\n---\n",
      ].join("\n"),
    );
  });

  it("formats certifications with issuer and year", () => {
    const text = formatResumeToText(
      makeProfile({
        certifications: [{ name: "AWS Developer", issuer: "Amazon", year: "2023" }],
      }),
    );

    expect(text).toContain("Certifications:\n* AWS Developer (Amazon) - 2023\n");
  });
});

describe("AIScoringOracle", () => {
  it("sends the resume and job and returns the model's score", async () => {
    const fetchMock = stubCompletion('{"score": 72, "rationale": "Good backend overlap"}');

    await expect(oracle().score(makeProfile(), makeJob())).resolves.toEqual({
      score: 72,
      rationale: "Good backend overlap",
    });

    const body: unknown = JSON.parse(String(fetchMock.mock.calls[0][1]?.body));
    expect(body).toMatchObject({
      messages: [
        { role: "system" },
        {
          role: "user",
          content: expect.stringContaining(
            "--- JOB DESCRIPTION ---\nJob Title: Backend Engineer\nCompany: Acme Robotics\n" +
              "Level: Mid-Senior level\n\nBuild Node.js services backed by PostgreSQL.\n" +
              "--- END JOB DESCRIPTION ---",
          ),
        },
      ],
    });
  });

  it("passes out-of-range scores through unchanged", async () => {
    stubCompletion('{"score": 150}');

    await expect(oracle().score(makeProfile(), makeJob())).resolves.toEqual({
      score: 150,
      rationale: "",
    });
  });

  it("refuses a job without a description", async () => {
    const fetchMock = stubCompletion("{}");

    await expect(oracle().score(makeProfile(), makeJob({ description: "<p> </p>" }))).rejects.toThrow(
      new PermanentOracleError("Job 4000000001 has no description to score"),
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { HashedTermEmbeddingsProvider } from "../../ai/hashed-term-embeddings.provider";
import { MatchingEngine, blendScores, roundTo } from "../../matching/matching.engine";
import { createSkillNormalizer, normalizeSkillSet } from "../../matching/skill-normalizer";
import { ValidationError } from "../../shared/errors";
import { JobRecord, ResumeRecord } from "../../shared/types/domain.types";
import { FakeEmbeddingProvider, createRecordingLogger, silentLogger } from "../helpers/fakes";

const constantProvider = (): FakeEmbeddingProvider => new FakeEmbeddingProvider(() => [1, 1]);

const resume: ResumeRecord = {
  text: "Jordan Example\nSKILLS\nPython, SQL, Docker, JS\nEXPERIENCE\nBuilt REST services in Python with PostgreSQL.",
  sections: {
    skills: "Python, SQL, Docker, JS",
    experience: "Built REST services in Python with PostgreSQL.",
  },
  skills_all: ["Python", "SQL", "Docker", "JS", "PostgreSQL"],
  skills_section: ["Python", "SQL", "Docker", "JS"],
};

const jobs: JobRecord[] = [
  {
    id: "job-1",
    title: "Backend Engineer",
    company: "Northwind",
    skills: ["Python", "SQL", "AWS", "Docker"],
    text: "Build Python APIs on AWS.\nStrong SQL required. Ship with Docker.",
  },
  {
    id: "job-2",
    title: "Frontend Engineer",
    company: "Bluebird",
    skills: ["JavaScript", "TypeScript", "CSS"],
    text: "Build interfaces in JavaScript and TypeScript with modern CSS.",
  },
  {
    id: "job-3",
    title: "Data Engineer",
    company: "Copperline",
    skills: ["Python", "Airflow", "PostgreSQL"],
    text: "Orchestrate Python pipelines with Airflow into PostgreSQL.",
  },
];

const weights = { python: 2.5, sql: 2, aws: 3, docker: 3, airflow: 2 };
const aliases = { js: "javascript", postgres: "postgresql" };

describe("matching engine", () => {
  it("produces the documented partial-match result", async () => {
    const engine = new MatchingEngine(constantProvider(), silentLogger);
    const run = await engine.rank(
      { text: "Python developer", sections: {}, skills_all: ["python"], skills_section: [] },
      [{ id: "j1", title: "Data Engineer", company: "Acme", skills: ["python", "sql"], text: "We need Python and SQL." }],
      { weights: { python: 2, sql: 1 }, blend: 1 },
    );

    assert.deepEqual(run.warnings, []);
    assert.deepEqual(run.results, [
      {
        title: "Data Engineer",
        company: "Acme",
        score: 0.667,
        semantic_score: 1,
        matched_skills: ["python"],
        missing_skills: ["sql"],
        matched_weight: 2,
        total_weight: 3,
        evidence: {
          job: { python: ["We need Python and SQL."] },
          resume: { python: ["Python developer"] },
        },
      },
    ]);
  });

  it("returns a fully defined zero match for degenerate jobs", async () => {
    const provider = constantProvider();
    const engine = new MatchingEngine(provider, silentLogger);
    const run = await engine.rank(resume, [{ id: "empty", title: "Mystery", company: "", skills: [], text: "" }], {
      weights,
      blend: 0.5,
    });

    assert.deepEqual(run.results, [
      {
        title: "Mystery",
        company: "",
        score: 0,
        semantic_score: 0,
        matched_skills: [],
        missing_skills: [],
        matched_weight: 0,
        total_weight: 0,
        evidence: { job: {}, resume: {} },
      },
    ]);
    assert.equal(provider.totalCalls, 0);
  });

  it("keeps result invariants for any blend", async () => {
    const engine = new MatchingEngine(new HashedTermEmbeddingsProvider(128), silentLogger);
    const normalize = createSkillNormalizer(aliases);

    for (const blend of [0, 0.25, 0.5, 0.75, 1]) {
      const run = await engine.rank(resume, jobs, { weights, blend, aliases });
      assert.equal(run.results.length, jobs.length);

      for (const result of run.results) {
        const source = jobs.find((job) => job.title === result.title);
        assert.ok(source);
        assert.deepEqual(
          [...result.matched_skills, ...result.missing_skills].sort(),
          normalizeSkillSet(source.skills, normalize),
        );
        assert.equal(result.matched_skills.filter((skill) => result.missing_skills.includes(skill)).length, 0);
        assert.ok(result.matched_weight <= result.total_weight);
        assert.ok(result.score >= 0 && result.score <= 1);
        assert.ok(result.semantic_score >= 0 && result.semantic_score <= 1);
        for (const side of [result.evidence.job, result.evidence.resume]) {
          assert.deepEqual(Object.keys(side), [...result.matched_skills]);
        }
      }
    }
  });

  it("uses only the semantic score when blend is 0", async () => {
    const engine = new MatchingEngine(new HashedTermEmbeddingsProvider(128), silentLogger);
    const run = await engine.rank(resume, jobs, { weights, blend: 0, aliases });
    for (const result of run.results) {
      assert.equal(result.score, result.semantic_score);
    }
  });

  it("ignores resume text when blend is 1", async () => {
    const engine = new MatchingEngine(new HashedTermEmbeddingsProvider(128), silentLogger);
    const first = await engine.rank(resume, jobs, { weights, blend: 1, aliases });
    const second = await engine.rank(
      { ...resume, text: "Completely different words about gardening and tulips." },
      jobs,
      { weights, blend: 1, aliases },
    );

    const scores = (results: typeof first.results) =>
      results.map((result) => [result.title, result.score]).sort();
    assert.deepEqual(scores(second.results), scores(first.results));
  });

  it("is idempotent for identical input", async () => {
    const engine = new MatchingEngine(new HashedTermEmbeddingsProvider(128), silentLogger);
    const config = { weights, blend: 0.6, aliases, concurrency: 2 };
    const first = await engine.rank(resume, jobs, config);
    const second = await engine.rank(resume, jobs, config);
    assert.equal(JSON.stringify(second), JSON.stringify(first));
  });

  it("breaks score ties by total weight, then by title", async () => {
    const engine = new MatchingEngine(constantProvider(), silentLogger);
    const run = await engine.rank(
      { text: "Go and Python", sections: {}, skills_all: ["go", "python"], skills_section: [] },
      [
        { id: "a", title: "Alpha", company: "One", skills: ["go"], text: "Go services" },
        { id: "z", title: "Zeta", company: "Two", skills: ["python"], text: "Python services" },
        { id: "b", title: "Beta", company: "Three", skills: ["go"], text: "More Go" },
      ],
      { weights: { go: 3, python: 5 }, blend: 1 },
    );

    assert.deepEqual(
      run.results.map((result) => [result.title, result.score, result.total_weight]),
      [
        ["Zeta", 1, 5],
        ["Alpha", 1, 3],
        ["Beta", 1, 3],
      ],
    );
  });

  it("degrades a failing embedding to a zero semantic score", async () => {
    const provider = new FakeEmbeddingProvider(async (text) => {
      if (text === "broken posting") {
        throw new Error("timeout after 15000ms");
      }
      return [1, 0];
    });
    const { logger, entries } = createRecordingLogger();
    const engine = new MatchingEngine(provider, logger);
    const postings: JobRecord[] = ["j1", "j2", "j3", "j4", "j5"].map((id) => ({
      id,
      title: `Role ${id}`,
      company: "Example",
      skills: ["python"],
      text: id === "j3" ? "broken posting" : `Python role ${id}`,
    }));

    const run = await engine.rank(
      { text: "Python developer", sections: {}, skills_all: ["python"], skills_section: [] },
      postings,
      { weights: {}, blend: 0.5 },
    );

    assert.equal(run.results.length, 5);
    const broken = run.results.find((result) => result.title === "Role j3");
    assert.ok(broken);
    assert.equal(broken.semantic_score, 0);
    assert.equal(broken.score, 0.5);
    for (const result of run.results.filter((entry) => entry.title !== "Role j3")) {
      assert.equal(result.semantic_score, 1);
      assert.equal(result.score, 1);
    }
    assert.deepEqual(run.warnings, [
      {
        code: "embedding_unavailable",
        jobId: "j3",
        message: 'Embedding provider "fake" failed: timeout after 15000ms',
      },
    ]);
    assert.equal(run.results[4].title, "Role j3");
    assert.equal(entries.filter((entry) => entry.level === "warn").length, 1);
  });

  it("accepts skill sets and leaves inputs untouched", async () => {
    const engine = new MatchingEngine(constantProvider(), silentLogger);
    const snapshot = JSON.stringify({ resume, jobs });
    const run = await engine.rank(
      { ...resume, skills_all: new Set(["python", "sql"]) },
      [{ ...jobs[0], skills: new Set(["SQL", "python"]) }],
      { weights, blend: 1, aliases },
    );

    assert.deepEqual(run.results[0].matched_skills, ["python", "sql"]);
    assert.equal(JSON.stringify({ resume, jobs }), snapshot);
  });

  it("validates records before scoring", async () => {
    const provider = constantProvider();
    const engine = new MatchingEngine(provider, silentLogger);

    await assert.rejects(
      engine.rank(resume, [jobs[0], { ...jobs[1], id: "" }], { weights, blend: 0.5 }),
      (error: unknown) => {
        assert.ok(error instanceof ValidationError);
        assert.equal(error.target, "jobs[1]");
        assert.deepEqual(error.issues, ["id: String must contain at least 1 character(s)"]);
        return true;
      },
    );
    await assert.rejects(engine.rank(resume, jobs, { weights, blend: 1.5 }), (error: unknown) => {
      assert.ok(error instanceof ValidationError);
      assert.equal(error.target, "blend");
      return true;
    });
    await assert.rejects(engine.rank(resume, jobs, { weights: { python: -1 }, blend: 0.5 }), (error: unknown) => {
      assert.ok(error instanceof ValidationError);
      assert.equal(error.target, "weights");
      return true;
    });
    assert.equal(provider.totalCalls, 0);
  });

  it("blends and rounds scores", () => {
    assert.equal(blendScores(1, 0, 0.7), 0.7);
    assert.equal(blendScores(0, 1, 0), 1);
    assert.equal(roundTo(2 / 3, 3), 0.667);
    assert.equal(roundTo(7.125001, 2), 7.13);
  });
});

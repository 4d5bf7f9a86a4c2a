import assert from "node:assert/strict";
import { describe, it } from "node:test";
import {
  buildSkillVariants,
  cleanSkill,
  createSkillNormalizer,
  normalizeSkillSet,
} from "../../matching/skill-normalizer";

const aliases = {
  js: "JavaScript",
  "ci cd": "CI/CD",
  cicd: "CI/CD",
  torch: "PyTorch",
  pytorch: "PyTorch",
  sklearn: "scikit-learn",
};

describe("skill normalizer", () => {
  const normalize = createSkillNormalizer(aliases);

  it("lower-cases and trims unknown skills", () => {
    assert.equal(normalize("  Python "), "python");
    assert.equal(normalize("Machine   Learning"), "machine learning");
    assert.equal(normalize("Node.JS"), "node.js");
  });

  it("strips edge punctuation but keeps language suffixes", () => {
    assert.equal(normalize("(Docker),"), "docker");
    assert.equal(normalize("C++"), "c++");
    assert.equal(normalize("C#"), "c#");
    assert.equal(normalize("C"), "c");
    assert.equal(normalize(".NET"), ".net");
  });

  it("resolves aliases on the cleaned and the compact form", () => {
    assert.equal(normalize(" JS "), "javascript");
    assert.equal(normalize("torch"), "pytorch");
    assert.equal(normalize("ci-cd"), "ci/cd");
    assert.equal(normalize("CI/CD"), "ci/cd");
    assert.equal(normalize("Java Script"), "javascript");
  });

  it("never fails on blank input", () => {
    assert.equal(normalize("   "), "");
    assert.equal(cleanSkill("--"), "");
  });

  it("produces sorted distinct canonical sets", () => {
    assert.deepEqual(normalizeSkillSet(["Python", "python ", " JS", "", "sql"], normalize), [
      "javascript",
      "python",
      "sql",
    ]);
    assert.deepEqual(normalizeSkillSet(new Set(["b", "a"]), normalize), ["a", "b"]);
  });

  it("inverts the alias map for text search", () => {
    const variants = buildSkillVariants(aliases, normalize);
    assert.deepEqual(variants.get("pytorch"), ["torch"]);
    assert.deepEqual(variants.get("scikit-learn"), ["sklearn"]);
    assert.deepEqual(variants.get("ci/cd"), ["ci cd", "cicd"]);
    assert.equal(variants.has("python"), false);
  });
});

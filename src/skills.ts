import fs from "fs-extra";
import path from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// Same place from src/ and from dist/
const SKILLS_FILE = path.resolve(__dirname, "..", "data", "skills.json");

export const DEFAULT_SYSTEM = "CoC6";

let cachedSystems: Map<string, readonly string[]> | null = null;

function readSkillFile(): Map<string, readonly string[]> {
  const raw: unknown = fs.readJsonSync(SKILLS_FILE);
  const systems = new Map<string, readonly string[]>();
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new Error(`${SKILLS_FILE} must hold an object of skill lists`);
  }
  for (const [system, skills] of Object.entries(raw)) {
    if (!Array.isArray(skills) || !skills.every((s): s is string => typeof s === "string")) {
      throw new Error(`${SKILLS_FILE}: "${system}" must be a list of skill names`);
    }
    systems.set(system, Object.freeze([...skills]));
  }
  return systems;
}

function loadSystems(): Map<string, readonly string[]> {
  cachedSystems ??= readSkillFile();
  return cachedSystems;
}

export function isKnownSystem(system: string): boolean {
  return loadSystems().has(system);
}

export function knownSystems(): string[] {
  return Array.from(loadSystems().keys());
}

/**
 * Standard skills of a rule system. Unknown systems get the default list.
 */
export function standardSkills(system: string): readonly string[] {
  const systems = loadSystems();
  return systems.get(system) ?? systems.get(DEFAULT_SYSTEM) ?? [];
}

/**
 * Levenshtein distance between two strings, by code point
 */
export function editDistance(a: string, b: string): number {
  const s = [...a];
  const t = [...b];
  let previous = Array.from({ length: t.length + 1 }, (_, j) => j);

  for (let i = 1; i <= s.length; i++) {
    const current = [i];
    for (let j = 1; j <= t.length; j++) {
      const cost = s[i - 1] === t[j - 1] ? 0 : 1;
      current.push(Math.min(
        previous[j] + 1,
        current[j - 1] + 1,
        previous[j - 1] + cost
      ));
    }
    previous = current;
  }

  return previous[t.length];
}

/**
 * Closest skill within `maxDistance` edits. Ties keep the earlier skill.
 */
export function findSimilarSkill(name: string, skills: readonly string[], maxDistance = 2): string | undefined {
  let best: string | undefined;
  let bestScore = Infinity;
  for (const skill of skills) {
    const score = editDistance(name, skill);
    if (score <= maxDistance && score < bestScore) {
      best = skill;
      bestScore = score;
    }
  }
  return best;
}

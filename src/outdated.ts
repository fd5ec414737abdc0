import { CONFIG } from "./config.js";
import { activationEnv } from "./environment.js";
import { normalizePackageName } from "./manifest.js";
import { runOrThrow } from "./process-runner.js";
import type {
  Environment,
  OutdatedEntry,
  OutdatedReport,
  Requirement,
} from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Sortie de `pip list --outdated --format=json`
export function parsePipOutdated(output: string): OutdatedEntry[] {
  let data: unknown;
  try {
    data = JSON.parse(output.trim() || "[]");
  } catch (error) {
    throw new Error(
      `Sortie de pip illisible : ${(error as Error).message}`
    );
  }

  if (!Array.isArray(data)) {
    throw new Error("Sortie de pip inattendue : un tableau JSON était attendu");
  }

  const entries: OutdatedEntry[] = [];
  for (const item of data) {
    if (
      isRecord(item) &&
      typeof item.name === "string" &&
      typeof item.version === "string" &&
      typeof item.latest_version === "string"
    ) {
      entries.push({
        name: item.name,
        current: item.version,
        latest: item.latest_version,
      });
    }
  }
  return entries;
}

export async function listOutdated(env: Environment): Promise<OutdatedEntry[]> {
  const { stdout } = await runOrThrow(
    env.python,
    ["-m", "pip", "list", "--outdated", "--format=json", "--disable-pip-version-check"],
    { env: activationEnv(env) }
  );
  return parsePipOutdated(stdout);
}

export function selectOutdated(
  entries: OutdatedEntry[],
  requirements: Requirement[]
): OutdatedEntry[] {
  const wanted = new Set(requirements.map((req) => normalizePackageName(req.name)));
  const installer = normalizePackageName(CONFIG.installerPackage);

  return entries.filter((entry) => {
    const name = normalizePackageName(entry.name);
    return name !== installer && wanted.has(name);
  });
}

export function buildReport(entries: OutdatedEntry[]): OutdatedReport {
  const report: OutdatedReport = {};
  [...entries]
    .sort((a, b) => a.name.localeCompare(b.name))
    .forEach((entry) => {
      report[entry.name] = { current: entry.current, latest: entry.latest };
    });
  return report;
}

import { readFile } from "fs/promises";
import { ManifestError } from "./errors.js";
import type { Manifest, Requirement } from "./types.js";

const REQUIREMENT_PATTERN = /^([A-Za-z0-9][A-Za-z0-9._-]*)\s*==\s*([^\s;]+)$/;

// Forme normalisée des noms de packages (PEP 503)
export function normalizePackageName(name: string): string {
  return name.trim().toLowerCase().replace(/[-_.]+/g, "-");
}

export function parseManifest(content: string): Manifest {
  const requirements: Requirement[] = [];
  const invalidLines: Manifest["invalidLines"] = [];

  content.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.replace(/#.*$/, "").trim();
    if (!line) return;

    const match = line.match(REQUIREMENT_PATTERN);
    if (!match) {
      invalidLines.push({ line: index + 1, content: rawLine.trim() });
      return;
    }

    requirements.push({ name: match[1], version: match[2] });
  });

  return { requirements, invalidLines };
}

export async function readManifest(path: string): Promise<Manifest> {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (error) {
    throw new ManifestError(
      path,
      `lecture impossible (${(error as Error).message})`
    );
  }
  return parseManifest(content);
}

import { writeFile, mkdir, rm } from "fs/promises";
import { dirname } from "path";
import type { OutdatedReport } from "./types.js";

// Le rapport n'existe que s'il y a au moins un package obsolète
export async function writeOutdatedReport(
  outputPath: string,
  report: OutdatedReport
): Promise<string | null> {
  if (Object.keys(report).length === 0) {
    // Efface aussi le rapport d'une exécution précédente
    await rm(outputPath, { force: true });
    return null;
  }

  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, JSON.stringify(report, null, 2) + "\n", "utf8");
  return outputPath;
}

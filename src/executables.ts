import { access, stat } from "fs/promises";
import { constants } from "fs";
import { delimiter, join } from "path";
import pc from "picocolors";
import { CONFIG, type EnvironmentKind } from "./config.js";
import { MissingExecutableError } from "./errors.js";
import type { Toolchain } from "./types.js";

function isWindows(): boolean {
  return process.platform === "win32";
}

async function isExecutableFile(filePath: string): Promise<boolean> {
  try {
    const stats = await stat(filePath);
    if (!stats.isFile()) return false;
    await access(filePath, isWindows() ? constants.F_OK : constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

// Équivalent de `which` : premier candidat trouvé dans le PATH
export async function findExecutable(
  candidates: readonly string[],
  searchPath: string = process.env.PATH ?? ""
): Promise<string | null> {
  const directories = searchPath.split(delimiter).filter(Boolean);
  const extensions = isWindows()
    ? ["", ...(process.env.PATHEXT ?? ".EXE;.CMD;.BAT").split(";")]
    : [""];

  for (const candidate of candidates) {
    for (const directory of directories) {
      for (const extension of extensions) {
        const fullPath = join(directory, candidate + extension);
        if (await isExecutableFile(fullPath)) {
          return fullPath;
        }
      }
    }
  }

  return null;
}

export async function requireExecutable(
  tool: string,
  candidates: readonly string[],
  searchPath?: string
): Promise<string> {
  const found = await findExecutable(candidates, searchPath);
  if (!found) {
    throw new MissingExecutableError(tool, candidates);
  }
  console.log(pc.dim(`🔎 ${tool} : ${found}`));
  return found;
}

export async function discoverToolchain(
  kind: EnvironmentKind,
  searchPath?: string
): Promise<Toolchain> {
  const python = await requireExecutable(
    "python",
    CONFIG.executables.python,
    searchPath
  );
  const pip = await requireExecutable("pip", CONFIG.executables.pip, searchPath);
  const conda =
    kind === "conda"
      ? await requireExecutable("conda", CONFIG.executables.conda, searchPath)
      : null;

  return { python, pip, conda };
}

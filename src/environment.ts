import { mkdir, rm, stat } from "fs/promises";
import { delimiter, dirname, join, resolve } from "path";
import pc from "picocolors";
import type { EnvironmentKind } from "./config.js";
import { CommandError } from "./errors.js";
import { runOrThrow } from "./process-runner.js";
import type { Environment, Toolchain } from "./types.js";

export interface CreateOptions {
  pythonVersion?: string;
}

// Windows : Scripts/ pour un venv ; python.exe à la racine pour conda,
// avec Scripts/ et Library/bin/ dans le PATH
export function resolveEnvironment(
  kind: EnvironmentKind,
  root: string,
  platform: NodeJS.Platform = process.platform
): Environment {
  const absoluteRoot = resolve(root);

  if (platform === "win32") {
    if (kind === "venv") {
      const scripts = join(absoluteRoot, "Scripts");
      return {
        kind,
        root: absoluteRoot,
        binDir: scripts,
        pathDirs: [scripts],
        python: join(scripts, "python.exe"),
      };
    }
    return {
      kind,
      root: absoluteRoot,
      binDir: absoluteRoot,
      pathDirs: [
        absoluteRoot,
        join(absoluteRoot, "Scripts"),
        join(absoluteRoot, "Library", "bin"),
      ],
      python: join(absoluteRoot, "python.exe"),
    };
  }

  const binDir = join(absoluteRoot, "bin");
  return {
    kind,
    root: absoluteRoot,
    binDir,
    pathDirs: [binDir],
    python: join(binDir, "python"),
  };
}

export async function environmentExists(root: string): Promise<boolean> {
  try {
    return (await stat(root)).isDirectory();
  } catch {
    return false;
  }
}

export async function removeEnvironment(
  env: Environment,
  toolchain: Toolchain
): Promise<boolean> {
  if (!(await environmentExists(env.root))) return false;

  // conda refuse un préfixe sans conda-meta/ (venv, création interrompue...)
  if (
    env.kind === "conda" &&
    toolchain.conda &&
    (await environmentExists(join(env.root, "conda-meta")))
  ) {
    try {
      await runOrThrow(toolchain.conda, [
        "env",
        "remove",
        "--prefix",
        env.root,
        "-y",
      ]);
    } catch (error) {
      if (!(error instanceof CommandError)) throw error;
      console.warn(
        pc.yellow(
          `⚠️  conda n'a pas pu supprimer l'environnement, suppression du dossier (code ${error.code})`
        )
      );
    }
  }

  // conda laisse parfois des fichiers derrière lui
  await rm(env.root, { recursive: true, force: true });
  console.log(pc.dim(`🗑️  Environnement supprimé : ${env.root}`));
  return true;
}

// Version majeure.mineure de l'interpréteur (ex. "3.12")
export async function detectPythonVersion(python: string): Promise<string> {
  const { stdout, stderr } = await runOrThrow(python, ["--version"]);
  const match = `${stdout} ${stderr}`.match(/Python\s+(\d+)\.(\d+)/);
  if (!match) {
    throw new Error(`Version de Python illisible : ${(stdout || stderr).trim()}`);
  }
  return `${match[1]}.${match[2]}`;
}

export async function createEnvironment(
  kind: EnvironmentKind,
  root: string,
  toolchain: Toolchain,
  options: CreateOptions = {}
): Promise<Environment> {
  const env = resolveEnvironment(kind, root);

  // Toujours repartir d'un environnement neuf
  await removeEnvironment(env, toolchain);
  await mkdir(dirname(env.root), { recursive: true });

  if (kind === "conda") {
    if (!toolchain.conda) {
      throw new Error("conda est requis pour créer un environnement conda");
    }
    const pythonVersion =
      options.pythonVersion ?? (await detectPythonVersion(toolchain.python));
    await runOrThrow(toolchain.conda, [
      "create",
      "--prefix",
      env.root,
      `python=${pythonVersion}`,
      "pip",
      "-y",
    ]);
  } else {
    await runOrThrow(toolchain.python, ["-m", "venv", env.root]);
  }

  console.log(pc.green(`✅ Environnement ${kind} créé : ${env.root}`));
  return env;
}

// Variables d'environnement d'un shell « activé », sans toucher à process.env
export function activationEnv(
  env: Environment,
  base: NodeJS.ProcessEnv = process.env
): NodeJS.ProcessEnv {
  const activated: NodeJS.ProcessEnv = { ...base };
  delete activated.PYTHONHOME;

  const prefix = env.pathDirs.join(delimiter);
  activated.PATH = base.PATH ? `${prefix}${delimiter}${base.PATH}` : prefix;

  if (env.kind === "venv") {
    activated.VIRTUAL_ENV = env.root;
  } else {
    activated.CONDA_PREFIX = env.root;
    activated.CONDA_DEFAULT_ENV = env.root;
  }

  return activated;
}

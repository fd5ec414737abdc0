import { dirname, resolve } from "path";
import { activationEnv } from "./environment.js";
import { runOrThrow } from "./process-runner.js";
import type { Environment } from "./types.js";

export async function upgradePip(env: Environment): Promise<void> {
  await runOrThrow(
    env.python,
    ["-m", "pip", "install", "--upgrade", "pip"],
    { env: activationEnv(env) }
  );
}

// pip est lancé depuis le dossier du manifeste, pour les chemins relatifs (-r, -e)
export async function installRequirements(
  env: Environment,
  manifestPath: string
): Promise<void> {
  const absoluteManifest = resolve(manifestPath);
  await runOrThrow(
    env.python,
    ["-m", "pip", "install", "-r", absoluteManifest],
    { cwd: dirname(absoluteManifest), env: activationEnv(env) }
  );
}

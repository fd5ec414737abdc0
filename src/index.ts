#!/usr/bin/env node

import { realpathSync } from "fs";
import { pathToFileURL } from "url";
import { program } from "commander";
import * as clack from "@clack/prompts";
import pc from "picocolors";
import { runSetup } from "./setup.js";
import { CONFIG, type Config, type EnvironmentKind } from "./config.js";

interface CliOptions {
  envPath: string;
  conda?: boolean;
  requirements: string;
  output: string;
  pythonVersion?: string;
  pipUpgrade: boolean;
  remove?: boolean;
  interactive: boolean;
}

function isEnvironmentKind(value: unknown): value is EnvironmentKind {
  return value === "venv" || value === "conda";
}

export function toConfig(options: CliOptions): Config {
  return {
    envPath: options.envPath,
    kind: options.conda ? "conda" : "venv",
    requirementsFile: options.requirements,
    outputFile: options.output,
    pythonVersion: options.pythonVersion,
    upgradePip: options.pipUpgrade !== false,
    removeOnly: options.remove === true,
    interactive: options.interactive !== false && Boolean(process.stdout.isTTY),
  };
}

program
  .name("py-env-setup")
  .description(
    "Prépare un environnement Python, installe les dépendances et signale les packages obsolètes"
  )
  .version("1.0.0")
  .option(
    "-e, --env-path <path>",
    "Racine de l'environnement",
    CONFIG.defaultEnvPath
  )
  .option("--conda", "Créer un environnement conda au lieu d'un venv")
  .option(
    "-r, --requirements <path>",
    "Manifeste des dépendances (name==version)",
    CONFIG.defaultRequirements
  )
  .option(
    "-o, --output <path>",
    "Fichier JSON des dépendances obsolètes",
    CONFIG.defaultReport
  )
  .option(
    "--python-version <version>",
    "Version de Python pour l'environnement conda"
  )
  .option("--no-pip-upgrade", "Ne pas mettre à jour pip avant l'installation")
  .option("--remove", "Supprimer l'environnement puis quitter")
  .option("--no-interactive", "Mode non-interactif")
  .action(async (options: CliOptions) => {
    clack.intro(pc.bgBlue(pc.white(" 🐍 Environnement Python ")));

    try {
      let config = toConfig(options);

      if (config.interactive) {
        config = await runInteractiveMode(config);
      }

      await runSetup(config);

      clack.outro(pc.green("✅ Terminé avec succès !"));
    } catch (error) {
      clack.cancel(pc.red(`❌ Erreur: ${(error as Error).message}`));
      process.exit(1);
    }
  });

async function runInteractiveMode(initialConfig: Config): Promise<Config> {
  const config = { ...initialConfig };

  // Type d'environnement
  const kind = await clack.select({
    message: "Quel type d'environnement voulez-vous créer ?",
    initialValue: config.kind,
    options: [
      { value: "venv", label: "venv", hint: "python -m venv" },
      { value: "conda", label: "conda", hint: "conda create --prefix" },
    ],
  });

  if (clack.isCancel(kind)) {
    clack.cancel("Opération annulée");
    process.exit(0);
  }

  if (isEnvironmentKind(kind)) {
    config.kind = kind;
  }

  // Emplacement de l'environnement
  const envPath = await clack.text({
    message: "Où créer l'environnement ?",
    placeholder: CONFIG.defaultEnvPath,
    initialValue: config.envPath,
    validate: (value) => {
      if (!value.trim()) {
        return "Le chemin ne peut pas être vide";
      }
    },
  });

  if (clack.isCancel(envPath)) {
    clack.cancel("Opération annulée");
    process.exit(0);
  }

  config.envPath = envPath;

  // Confirmation
  const shouldContinue = await clack.confirm({
    message: config.removeOnly
      ? `Supprimer l'environnement ${config.kind} "${config.envPath}" ?`
      : `Créer l'environnement ${config.kind} "${config.envPath}" et installer ${config.requirementsFile} ?
Un environnement existant à cet emplacement sera supprimé.`,
    initialValue: true,
  });

  if (clack.isCancel(shouldContinue) || !shouldContinue) {
    clack.cancel("Opération annulée");
    process.exit(0);
  }

  return config;
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isMainModule()) {
  program.parseAsync().catch((error: unknown) => {
    console.error(pc.red(String(error)));
    process.exit(1);
  });
}

export { program };

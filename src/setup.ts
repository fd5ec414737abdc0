import * as clack from "@clack/prompts";
import pc from "picocolors";
import type { Config } from "./config.js";
import { discoverToolchain } from "./executables.js";
import {
  createEnvironment,
  removeEnvironment,
  resolveEnvironment,
} from "./environment.js";
import { readManifest } from "./manifest.js";
import { installRequirements, upgradePip } from "./installer.js";
import { buildReport, listOutdated, selectOutdated } from "./outdated.js";
import { writeOutdatedReport } from "./reports.js";
import type { OutdatedReport } from "./types.js";

export interface SetupResult {
  envRoot: string;
  installed: number;
  report: OutdatedReport;
  reportPath: string | null;
}

export async function runSetup(config: Config): Promise<SetupResult | null> {
  const spinner = clack.spinner();

  try {
    spinner.start("🔧 Recherche de python et pip...");

    // Échec immédiat si un exécutable manque, avant toute création
    const toolchain = await discoverToolchain(config.kind);

    if (config.removeOnly) {
      spinner.message("🗑️  Suppression de l'environnement...");
      const removed = await removeEnvironment(
        resolveEnvironment(config.kind, config.envPath),
        toolchain
      );
      spinner.stop(
        removed
          ? "✅ Environnement supprimé"
          : "ℹ️  Aucun environnement à supprimer"
      );
      return null;
    }

    spinner.message(`📄 Lecture de ${config.requirementsFile}...`);
    const manifest = await readManifest(config.requirementsFile);

    manifest.invalidLines.forEach(({ line, content }) => {
      console.warn(
        pc.yellow(`⚠️  Ligne ${line} ignorée (format name==version attendu) : ${content}`)
      );
    });

    spinner.message(`🐍 Création de l'environnement ${config.kind}...`);
    const env = await createEnvironment(config.kind, config.envPath, toolchain, {
      pythonVersion: config.pythonVersion,
    });

    if (config.upgradePip) {
      spinner.message("⬆️  Mise à jour de pip...");
      await upgradePip(env);
    }

    spinner.message(
      `📦 Installation de ${manifest.requirements.length} dépendance(s)...`
    );
    await installRequirements(env, config.requirementsFile);

    spinner.message("🔍 Recherche des packages obsolètes...");
    const outdated = selectOutdated(
      await listOutdated(env),
      manifest.requirements
    );
    const report = buildReport(outdated);
    const reportPath = await writeOutdatedReport(config.outputFile, report);

    spinner.stop("✅ Environnement prêt !");

    console.log("");
    console.log(
      pc.green(`📦 ${manifest.requirements.length} dépendance(s) installée(s)`)
    );
    console.log(pc.blue(`🐍 Environnement : ${env.root}`));

    if (reportPath) {
      console.log("");
      console.log(
        pc.yellow(`🐌 ${outdated.length} package(s) obsolète(s) :`)
      );
      Object.entries(report).forEach(([name, { current, latest }]) => {
        console.log(pc.yellow(`   • ${name} : ${current} → ${latest}`));
      });
      console.log(pc.blue(`📄 Rapport : ${reportPath}`));
    } else {
      console.log("");
      console.log(pc.green("🎉 Toutes les dépendances sont à jour."));
    }

    console.log("");
    console.log(pc.dim("💡 Pour activer l'environnement :"));
    console.log(
      pc.dim(
        config.kind === "conda"
          ? `   conda activate "${env.root}"`
          : `   source "${env.binDir}/activate"`
      )
    );

    return {
      envRoot: env.root,
      installed: manifest.requirements.length,
      report,
      reportPath,
    };
  } catch (error) {
    spinner.stop("❌ Erreur lors de la préparation de l'environnement");
    throw error;
  }
}

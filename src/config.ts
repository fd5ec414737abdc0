export const CONFIG = {
  defaultEnvPath: ".venv",
  defaultRequirements: "requirements.txt",
  defaultReport: "outdated_dependencies.json",

  // Noms recherchés dans le PATH, par ordre de préférence
  executables: {
    python: ["python3", "python"],
    pip: ["pip3", "pip"],
    conda: ["conda"],
  },

  // Exclu du rapport : c'est l'installeur lui-même
  installerPackage: "pip",

  commandTimeoutMs: 10 * 60 * 1000,
} as const;

export type EnvironmentKind = "venv" | "conda";

export type Config = {
  envPath: string;
  kind: EnvironmentKind;
  requirementsFile: string;
  outputFile: string;
  pythonVersion?: string;
  upgradePip: boolean;
  removeOnly: boolean;
  interactive: boolean;
};

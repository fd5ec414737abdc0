export class MissingExecutableError extends Error {
  constructor(
    readonly tool: string,
    readonly candidates: readonly string[]
  ) {
    super(
      `${tool} introuvable dans le PATH (recherché : ${candidates.join(", ")})`
    );
    this.name = "MissingExecutableError";
  }
}

export class CommandError extends Error {
  constructor(
    readonly command: string,
    readonly args: readonly string[],
    readonly code: number,
    readonly stderr: string,
    readonly signal: NodeJS.Signals | null = null
  ) {
    const commandLine = [command, ...args].join(" ");
    const detail = stderr.trim().split("\n").slice(-5).join("\n");
    const outcome = signal
      ? `a été interrompue (signal ${signal}, délai dépassé ?)`
      : `a échoué (code ${code})`;
    super(`La commande "${commandLine}" ${outcome}${detail ? `\n${detail}` : ""}`);
    this.name = "CommandError";
  }
}

export class ManifestError extends Error {
  constructor(readonly path: string, message: string) {
    super(`${path} : ${message}`);
    this.name = "ManifestError";
  }
}

import type { EnvironmentKind } from "./config.js";

export interface Requirement {
  name: string;
  version: string;
}

export interface Manifest {
  requirements: Requirement[];
  invalidLines: { line: number; content: string }[];
}

export interface Toolchain {
  python: string;
  pip: string;
  conda: string | null;
}

export interface Environment {
  kind: EnvironmentKind;
  root: string;
  binDir: string;
  pathDirs: string[];
  python: string;
}

export interface CommandResult {
  code: number;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

export interface OutdatedEntry {
  name: string;
  current: string;
  latest: string;
}

export type OutdatedReport = Record<string, { current: string; latest: string }>;

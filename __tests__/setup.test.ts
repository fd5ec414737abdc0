import { existsSync } from "fs";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const { runOrThrowMock, discoverToolchainMock } = vi.hoisted(() => ({
  runOrThrowMock: vi.fn(),
  discoverToolchainMock: vi.fn(),
}));

vi.mock("@clack/prompts", () => ({
  spinner: () => ({ start: vi.fn(), message: vi.fn(), stop: vi.fn() }),
}));

vi.mock("../src/process-runner.js", () => ({
  runOrThrow: (...args: unknown[]) => runOrThrowMock(...args),
}));

vi.mock("../src/executables.js", () => ({
  discoverToolchain: (...args: unknown[]) => discoverToolchainMock(...args),
}));

import { runSetup } from "../src/setup.js";
import type { Config } from "../src/config.js";
import { CommandError, MissingExecutableError } from "../src/errors.js";

const ok = (stdout = "") => ({ code: 0, stdout, stderr: "" });

function pipEntry(name: string, version: string, latest: string) {
  return { name, version, latest_version: latest, latest_filetype: "wheel" };
}

describe("runSetup", () => {
  let dir: string;
  let config: Config;
  let pipOutdated: ReturnType<typeof pipEntry>[];

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});

    dir = await mkdtemp(join(tmpdir(), "setup-"));
    await writeFile(
      join(dir, "requirements.txt"),
      "requests==2.0.0\nflask==1.0.0\n",
      "utf8"
    );

    config = {
      envPath: join(dir, ".venv"),
      kind: "venv",
      requirementsFile: join(dir, "requirements.txt"),
      outputFile: join(dir, "reports", "outdated.json"),
      upgradePip: true,
      removeOnly: false,
      interactive: false,
    };
    pipOutdated = [];

    discoverToolchainMock.mockReset();
    discoverToolchainMock.mockResolvedValue({
      python: "/usr/bin/python3",
      pip: "/usr/bin/pip3",
      conda: null,
    });

    runOrThrowMock.mockReset();
    runOrThrowMock.mockImplementation(async (_command: string, args: string[]) => {
      if (args[1] === "venv") {
        await mkdir(args[2], { recursive: true });
        return ok();
      }
      if (args.includes("list")) {
        return ok(JSON.stringify(pipOutdated));
      }
      return ok();
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("reports exactly the outdated manifest packages, without pip", async () => {
    pipOutdated = [
      pipEntry("requests", "2.0.0", "2.31.0"),
      pipEntry("Flask", "1.0.0", "3.0.0"),
      pipEntry("pip", "23.0", "24.0"),
      pipEntry("certifi", "2023.1.1", "2024.2.2"),
    ];

    const result = await runSetup(config);

    const written = JSON.parse(await readFile(config.outputFile, "utf8"));
    expect(written).toEqual({
      Flask: { current: "1.0.0", latest: "3.0.0" },
      requests: { current: "2.0.0", latest: "2.31.0" },
    });
    expect(result?.reportPath).toBe(config.outputFile);
    expect(result?.installed).toBe(2);
  });

  it("leaves no report when everything is up to date", async () => {
    pipOutdated = [pipEntry("pip", "23.0", "24.0")];

    const result = await runSetup(config);

    expect(result?.reportPath).toBeNull();
    expect(existsSync(config.outputFile)).toBe(false);
  });

  it("runs pip inside the environment from the manifest directory", async () => {
    await runSetup(config);

    const python = join(config.envPath, "bin", "python");
    expect(runOrThrowMock).toHaveBeenCalledWith(
      python,
      ["-m", "pip", "install", "--upgrade", "pip"],
      expect.objectContaining({ env: expect.objectContaining({ VIRTUAL_ENV: config.envPath }) })
    );
    expect(runOrThrowMock).toHaveBeenCalledWith(
      python,
      ["-m", "pip", "install", "-r", config.requirementsFile],
      expect.objectContaining({ cwd: dir })
    );
  });

  it("skips the pip upgrade when disabled", async () => {
    await runSetup({ ...config, upgradePip: false });

    const upgrades = runOrThrowMock.mock.calls.filter((call) =>
      call[1].includes("--upgrade")
    );
    expect(upgrades).toEqual([]);
  });

  it("recreates an existing environment", async () => {
    await mkdir(config.envPath);
    await writeFile(join(config.envPath, "stale.txt"), "old", "utf8");

    await runSetup(config);

    expect(existsSync(config.envPath)).toBe(true);
    expect(existsSync(join(config.envPath, "stale.txt"))).toBe(false);
  });

  it("stops before creating anything when a tool is missing", async () => {
    discoverToolchainMock.mockRejectedValue(
      new MissingExecutableError("python", ["python3", "python"])
    );

    await expect(runSetup(config)).rejects.toBeInstanceOf(MissingExecutableError);
    expect(runOrThrowMock).not.toHaveBeenCalled();
    expect(existsSync(config.envPath)).toBe(false);
  });

  it("propagates a failing install and writes no report", async () => {
    runOrThrowMock.mockImplementation(async (command: string, args: string[]) => {
      if (args.includes("-r")) {
        throw new CommandError(command, args, 1, "No matching distribution");
      }
      return ok();
    });

    await expect(runSetup(config)).rejects.toBeInstanceOf(CommandError);
    expect(existsSync(config.outputFile)).toBe(false);
  });

  it("leaves the parent process environment untouched", async () => {
    const before = { ...process.env };
    const cwd = process.cwd();

    await runSetup(config);

    expect(process.env).toEqual(before);
    expect(process.cwd()).toBe(cwd);
  });

  it("only removes the environment in remove mode", async () => {
    await mkdir(config.envPath);

    const result = await runSetup({ ...config, removeOnly: true });

    expect(result).toBeNull();
    expect(existsSync(config.envPath)).toBe(false);
    expect(runOrThrowMock).not.toHaveBeenCalled();
  });
});

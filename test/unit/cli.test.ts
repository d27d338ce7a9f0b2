import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { parseArgs } from "../../src/cli/args.js";
import type { JsonReport } from "../../src/report/json.js";
import { EXIT_CONFIG, EXIT_OK, runCli, type CliIO } from "../../src/cli/main.js";
import { ConfigError } from "../../src/utils/errors.js";
import { FIXED_NOW, SAMPLE_FILES, createRepo, fakeProvider, fakeRunner } from "../fixtures/repo.js";

describe("parseArgs", () => {
  it("reads the root and defaults", () => {
    expect(parseArgs(["./src"])).toEqual({
      root: "./src",
      languages: undefined,
      format: "markdown",
      output: undefined,
      config: undefined,
      ai: true,
      static: true,
      concurrency: undefined,
      help: false,
    });
  });

  it("reads every option in both spellings", () => {
    const args = parseArgs([
      "--root=repo",
      "--language",
      "python,cpp",
      "--format=json",
      "--output",
      "out.json",
      "--config",
      "cfg.yml",
      "--concurrency",
      "3",
      "--no-ai",
      "--no-static",
    ]);

    expect(args).toMatchObject({
      root: "repo",
      languages: "python,cpp",
      format: "json",
      output: "out.json",
      config: "cfg.yml",
      concurrency: 3,
      ai: false,
      static: false,
    });
  });

  const invalid: Array<[string[], string]> = [
    [[], "Missing source root"],
    [["repo", "--format"], "Missing value for --format"],
    [["repo", "--verbose"], "Unknown option: --verbose"],
    [["repo", "other"], "Unexpected argument: other"],
    [["repo", "--concurrency", "0"], '--concurrency must be a positive integer, got "0"'],
    [["repo", "--format", "pdf"], 'Unknown report format "pdf"'],
  ];

  it.each(invalid)("rejects %j", (argv, message) => {
    expect(() => parseArgs(argv)).toThrow(ConfigError);
    expect(() => parseArgs(argv)).toThrow(message);
  });

  it("allows --help without a root", () => {
    expect(parseArgs(["--help"]).help).toBe(true);
  });
});

describe("runCli", () => {
  let root: string;
  let stdout: string;
  let stderr: string;
  const io: CliIO = {
    stdout: (text) => {
      stdout += text;
    },
    stderr: (text) => {
      stderr += text;
    },
  };

  beforeEach(async () => {
    root = await createRepo(SAMPLE_FILES);
    stdout = "";
    stderr = "";
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  const stubs = () => ({
    env: {},
    provider: fakeProvider(),
    runner: fakeRunner(),
    now: FIXED_NOW,
  });

  it("prints the report to stdout and exits 0", async () => {
    const code = await runCli([root, "--format", "json", "--language", "python"], io, stubs());

    expect(code).toBe(EXIT_OK);
    expect(stderr).toBe("");
    const report: JsonReport = JSON.parse(stdout);
    expect(report.metadata.units_processed).toBe(1);
    expect(report.units[0].path).toBe("app.py");
  });

  it("writes the report to a file", async () => {
    const output = join(root, "report.md");
    const code = await runCli([root, "--output", output], io, stubs());

    expect(code).toBe(EXIT_OK);
    expect(stdout).toBe("");
    const text = await readFile(output, "utf-8");
    expect(text.startsWith("# Code Review Report\n")).toBe(true);
  });

  it("exits 2 with a message on setup errors", async () => {
    const code = await runCli([join(root, "missing")], io, stubs());

    expect(code).toBe(EXIT_CONFIG);
    expect(stderr).toBe(`Error: Source root not found: ${join(root, "missing")}\n`);
    expect(stdout).toBe("");
  });

  it("exits 2 on bad arguments", async () => {
    expect(await runCli([], io)).toBe(EXIT_CONFIG);
    expect(stderr).toBe("Error: Missing source root\n");
  });

  it("prints usage for --help", async () => {
    expect(await runCli(["--help"], io)).toBe(EXIT_OK);
    expect(stdout.startsWith("Usage: codereview <root> [options]\n")).toBe(true);
  });
});

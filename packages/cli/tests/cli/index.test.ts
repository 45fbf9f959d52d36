import { describe, expect, it, vi, beforeAll, afterAll, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { attributionConfigSchema } from "@unitcov/sdk";
import { createProgram, formatErrorForOutput, program, runCli } from "../../src/cli/index";
import type { AttributeDeps } from "../../src/cli/commands/attribute";
import { RecordError } from "../../src/lcov/record";

const REPORT = [
  "SF:lib/common/widgets.c",
  "FN:1,widget_new",
  "FNDA:1,widget_new",
  "end_of_record",
  "SF:lib/broken.c",
  "FN:oops",
  "end_of_record",
  "",
].join("\n");

function makeDeps(): AttributeDeps {
  return {
    readReport: vi.fn(() => Promise.resolve(REPORT)),
    loadConfig: vi.fn(() => Promise.resolve(attributionConfigSchema.parse({}))),
    discoverTested: vi.fn(() => Promise.resolve(new Set<string>())),
    discoverRestricted: vi.fn(() => Promise.resolve(new Set<string>())),
    discoverCallGraphs: vi.fn(() => Promise.resolve([])),
    loadCallGraph: vi.fn(),
    write: vi.fn(),
    explain: vi.fn(),
  };
}

let dir: string;
let reportPath: string;

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), "unitcov-cli-"));
  reportPath = join(dir, "coverage.info");
  await writeFile(reportPath, REPORT);
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("cli", () => {
  it("takes a single optional report argument", () => {
    expect(program.registeredArguments.map((arg) => arg.name())).toEqual(["report"]);
    expect(program.registeredArguments[0].required).toBe(false);
  });

  it("exposes the expected options", () => {
    const flags = program.options.map((option) => option.long);
    expect(flags).toEqual(expect.arrayContaining(["--root", "--config", "--explain", "--json"]));
  });
});

describe("runCli", () => {
  it("prints usage and succeeds without a report argument", async () => {
    // Arrange
    const deps = makeDeps();
    const stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);

    // Act
    const status = await runCli(["node", "unitcov"], createProgram(deps));

    // Assert
    expect(status).toBe(0);
    expect(stdout).toHaveBeenCalledWith("usage: unitcov <coverage_file.info>\n");
    expect(deps.loadConfig).not.toHaveBeenCalled();
    expect(process.exitCode).toBeUndefined();
  });

  it("prints usage and succeeds when the report does not exist", async () => {
    const deps = makeDeps();
    const stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);

    const status = await runCli(
      ["node", "unitcov", join(dir, "missing.info")],
      createProgram(deps),
    );

    expect(status).toBe(0);
    expect(stdout).toHaveBeenCalledWith("usage: unitcov <coverage_file.info>\n");
    expect(deps.loadConfig).not.toHaveBeenCalled();
    expect(process.exitCode).toBeUndefined();
  });

  it("prints usage when the report path is a directory", async () => {
    const deps = makeDeps();
    const stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);

    const status = await runCli(["node", "unitcov", dir], createProgram(deps));

    expect(status).toBe(0);
    expect(stdout).toHaveBeenCalledWith("usage: unitcov <coverage_file.info>\n");
    expect(deps.readReport).not.toHaveBeenCalled();
  });

  it("fails with status 1 and keeps the records already written", async () => {
    // Arrange
    const deps = makeDeps();
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});

    // Act
    const status = await runCli(
      ["node", "unitcov", reportPath, "--root", dir],
      createProgram(deps),
    );

    // Assert
    expect(status).toBe(1);
    expect(deps.readReport).toHaveBeenCalledWith(reportPath);
    expect(deps.write).toHaveBeenCalledTimes(1);
    expect(deps.write).toHaveBeenCalledWith(
      "SF:lib/common/widgets.c\nFN:1,widget_new\nFNDA:1,widget_new\nend_of_record\n",
    );
    expect(stderr).toHaveBeenCalledWith('lib/broken.c: Malformed coverage line "FN:oops"');
    expect(process.exitCode).toBeUndefined();
  });

  it("reports a fatal error as JSON on stdout with --json", async () => {
    const deps = makeDeps();
    const stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});

    const status = await runCli(
      ["node", "unitcov", reportPath, "--root", dir, "--json"],
      createProgram(deps),
    );

    expect(status).toBe(1);
    expect(stdout).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(stdout.mock.calls[0][0]))).toEqual({
      error: "RecordError",
      message: 'Malformed coverage line "FN:oops"',
      sourceFile: "lib/broken.c",
      line: "FN:oops",
    });
    expect(stderr).not.toHaveBeenCalled();
  });
});

describe("formatErrorForOutput", () => {
  it("serializes a UnitcovError as JSON", () => {
    const output = formatErrorForOutput(new RecordError('Malformed coverage line "FN:x"', "FN:x"), true);

    expect(JSON.parse(output)).toEqual({
      error: "RecordError",
      message: 'Malformed coverage line "FN:x"',
      line: "FN:x",
    });
  });

  it("prefixes the plain message with the record's source file", () => {
    const err = new RecordError("Coverage record has no SF line").inRecord("lib/a.c");

    expect(formatErrorForOutput(err, false)).toBe("lib/a.c: Coverage record has no SF line");
  });

  it("wraps unknown errors as UnknownError", () => {
    expect(formatErrorForOutput(new Error("boom"), true)).toBe(
      JSON.stringify({ error: "UnknownError", message: "boom" }),
    );
  });

  it("returns the plain message without JSON", () => {
    expect(formatErrorForOutput(new Error("boom"), false)).toBe("boom");
    expect(formatErrorForOutput("text", false)).toBe("text");
  });
});

#!/usr/bin/env node

import { Command } from "commander";
import { initProject } from "./commands/init.js";
import { addEntrypoint, listEntrypoints, setDefaultEntrypoint } from "./commands/entry.js";
import { validateProject } from "./commands/validate.js";
import { buildPackage } from "./commands/build.js";
import { inspectPackage } from "./commands/inspect.js";
import { publishPackage, selectBumpLevel } from "./commands/publish.js";
import type { Diagnostic } from "./commands/diagnostics.js";
import { EXIT, type ExitCode } from "./commands/exit-codes.js";

type Format = "human" | "jsonl";

const program = new Command();

program
  .name("bvpack")
  .description("Build, validate and publish packaged Python projects")
  .version("0.1.0");

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function emitDiagnostics(diagnostics: readonly Diagnostic[], format: Format): void {
  for (const d of diagnostics) {
    if (format === "jsonl") {
      process.stdout.write(JSON.stringify(d) + "\n");
    } else if (d.level === "error") {
      console.error(d.message);
    } else {
      console.error(`${d.level}: ${d.message}`);
    }
  }
}

function fail(res: { errors: Diagnostic[]; warnings?: Diagnostic[]; exitCode: ExitCode }, format: Format): never {
  emitDiagnostics(res.warnings ?? [], format);
  emitDiagnostics(res.errors, format);
  process.exit(res.exitCode);
}

function ok(format: Format, record: Record<string, unknown>, human: string): void {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "info", code: "OK", ...record }) + "\n");
  } else {
    console.log(human);
  }
}

program
  .command("init")
  .description("Create bvproject.yaml and a starter project in the current directory")
  .option("--name <name>", "Project name (default: directory name)")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (opts: { name?: string; format: Format }) => {
    const res = await initProject({ name: opts.name });
    if (!res.ok) fail(res, opts.format);
    ok(opts.format, { configPath: res.configPath, created: res.created }, `Initialised ${res.configPath}`);
  });

const entry = program.command("entry").description("Manage entrypoints");

entry
  .command("add")
  .description("Add an entrypoint")
  .argument("<name>", "Entrypoint name")
  .argument("<command>", "Target in module:function form")
  .option("--workdir <path>", "Working directory, relative to the project root")
  .option("--default", "Make this the default entrypoint")
  .option("--config <path>", "Path to bvproject.yaml", "bvproject.yaml")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(
    async (
      name: string,
      command: string,
      opts: { workdir?: string; default?: boolean; config: string; format: Format },
    ) => {
      const res = await addEntrypoint({
        configPath: opts.config,
        name,
        command,
        workdir: opts.workdir,
        setDefault: opts.default,
      });
      if (!res.ok) fail(res, opts.format);
      ok(opts.format, { entrypoint: res.entrypoint, default: res.defaultName }, `Added entrypoint '${name}'`);
    },
  );

entry
  .command("list")
  .description("List entrypoints in manifest order")
  .option("--config <path>", "Path to bvproject.yaml", "bvproject.yaml")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (opts: { config: string; format: Format }) => {
    const res = await listEntrypoints({ configPath: opts.config });
    if (!res.ok) fail(res, opts.format);
    for (const e of res.entrypoints) {
      if (opts.format === "jsonl") {
        process.stdout.write(JSON.stringify(e) + "\n");
      } else {
        console.log(`${e.default ? "*" : " "} ${e.name}  ${e.command}${e.workdir ? `  (${e.workdir})` : ""}`);
      }
    }
  });

entry
  .command("set-default")
  .description("Mark an entrypoint as the default")
  .argument("<name>", "Entrypoint name")
  .option("--config <path>", "Path to bvproject.yaml", "bvproject.yaml")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (name: string, opts: { config: string; format: Format }) => {
    const res = await setDefaultEntrypoint({ configPath: opts.config, name });
    if (!res.ok) fail(res, opts.format);
    ok(opts.format, { default: res.defaultName }, `Default entrypoint: ${res.defaultName}`);
  });

program
  .command("validate")
  .description("Validate bvproject.yaml, its version and every entrypoint")
  .option("--config <path>", "Path to bvproject.yaml", "bvproject.yaml")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (opts: { config: string; format: Format }) => {
    const res = await validateProject({ configPath: opts.config });
    if (!res.ok) fail(res, opts.format);
    emitDiagnostics(res.warnings, opts.format);
    ok(opts.format, { name: res.config.name, version: res.config.rawVersion }, "OK");
  });

program
  .command("build")
  .description("Build a package without changing the version")
  .option("--config <path>", "Path to bvproject.yaml", "bvproject.yaml")
  .option("--output <path>", "Package path (default: <dist_dir>/<name>-<version>.<ext>)")
  .option("--include <path>", "Extra file or directory to include (repeatable)", collect, [])
  .option("--lock-file <path>", "Use this lock file instead of running pip freeze")
  .option("--env <name>", "Settings layer config/<name>.yaml")
  .option("--dry-run", "Report the package path without writing")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(
    async (opts: {
      config: string;
      output?: string;
      include: string[];
      lockFile?: string;
      env?: string;
      dryRun?: boolean;
      format: Format;
    }) => {
      const res = await buildPackage({
        configPath: opts.config,
        output: opts.output,
        include: opts.include,
        lockFile: opts.lockFile,
        env: opts.env,
        dryRun: opts.dryRun,
      });
      if (!res.ok) fail(res, opts.format);
      emitDiagnostics(res.warnings, opts.format);
      ok(
        opts.format,
        { artifactPath: res.artifactPath, written: res.written, sha256: res.sha256 },
        res.written ? `Built ${res.artifactPath}` : `Would build ${res.artifactPath}`,
      );
    },
  );

program
  .command("inspect")
  .description("Check a package against the package contract")
  .argument("<package>", "Package file")
  .option("--expect-name <name>", "Required project name")
  .option("--expect-version <version>", "Required version")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (pkg: string, opts: { expectName?: string; expectVersion?: string; format: Format }) => {
    const res = await inspectPackage({ packagePath: pkg, expectName: opts.expectName, expectVersion: opts.expectVersion });
    if (!res.ok) fail(res, opts.format);
    const { name, version, entrypoints, files } = res.contents;
    ok(
      opts.format,
      { name, version: version.toString(), entrypoints: entrypoints.map((e) => e.name), files: files.length },
      `${name} ${version.toString()}: ${files.length} files, entrypoints ${entrypoints.map((e) => e.name).join(", ")}`,
    );
  });

program
  .command("publish")
  .description("Bump the version, build and place the package under <output-dir>/<name>/<version>/")
  .option("--config <path>", "Path to bvproject.yaml", "bvproject.yaml")
  .option("--package <path>", "Publish an existing package instead of building")
  .option("--output-dir <path>", "Publish root (default: publish_dir setting)")
  .option("--include <path>", "Extra file or directory to include (repeatable)", collect, [])
  .option("--major", "Bump the major version")
  .option("--minor", "Bump the minor version")
  .option("--patch", "Bump the patch version (default)")
  .option("--move", "Remove the built package after placing it")
  .option("--overwrite", "Replace an already published package")
  .option("--lock-file <path>", "Use this lock file instead of running pip freeze")
  .option("--env <name>", "Settings layer config/<name>.yaml")
  .option("--dry-run", "Report the destination without changing anything")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(
    async (opts: {
      config: string;
      package?: string;
      outputDir?: string;
      include: string[];
      major?: boolean;
      minor?: boolean;
      patch?: boolean;
      move?: boolean;
      overwrite?: boolean;
      lockFile?: string;
      env?: string;
      dryRun?: boolean;
      format: Format;
    }) => {
      const bump = selectBumpLevel({ major: opts.major, minor: opts.minor, patch: opts.patch });
      if (!bump.ok) fail(bump, opts.format);

      const res = await publishPackage({
        configPath: opts.config,
        packagePath: opts.package,
        outputDir: opts.outputDir,
        include: opts.include,
        bump: bump.level,
        move: opts.move,
        overwrite: opts.overwrite,
        lockFile: opts.lockFile,
        env: opts.env,
        dryRun: opts.dryRun,
      });
      if (!res.ok) fail(res, opts.format);
      ok(
        opts.format,
        { destination: res.destination, name: res.name, version: res.version, previousVersion: res.previousVersion, dryRun: res.dryRun },
        res.dryRun
          ? `Would publish ${res.name} ${res.version} to ${res.destination}`
          : `Published ${res.name} ${res.version} to ${res.destination}`,
      );
    },
  );

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.FAILURE);
});

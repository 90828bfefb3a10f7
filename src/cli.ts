#!/usr/bin/env node
// src/cli.ts
import { Command } from "commander";
import { writeFile } from "node:fs/promises";

import { DEFAULT_IMPORTER_CONFIG, readImporterConfig, type ImporterConfig } from "./s6/config.js";
import { loadPark, S6Importer } from "./s6/importer.js";
import type { WarnFn } from "./s6/log.js";
import {
  DirectoryObjectRepository,
  InMemoryObjectRepository,
  type ObjectRepository,
} from "./s6/objectRepository.js";
import { stringifySummary, summarizeParkFile, summarizeWorld } from "./s6/summary.js";

type CommonOpts = {
  output?: string;
  config?: string;
  allowBadChecksum: boolean;
  verbose: boolean;
};

type ImportOpts = CommonOpts & {
  skipObjectCheck: boolean;
  objects?: string;
};

async function resolveConfig(opts: CommonOpts & { skipObjectCheck?: boolean }): Promise<ImporterConfig> {
  const base: ImporterConfig = opts.config
    ? await readImporterConfig(opts.config)
    : { ...DEFAULT_IMPORTER_CONFIG };
  if (opts.allowBadChecksum) base.validateChecksum = false;
  if (opts.skipObjectCheck) base.skipObjectCheck = true;
  return base;
}

function verboseLog(enabled: boolean): WarnFn {
  return enabled ? (m) => process.stderr.write(m + "\n") : () => {};
}

async function emit(text: string, output: string | undefined): Promise<void> {
  if (output) await writeFile(output, text, "utf8");
  else process.stdout.write(text);
}

const program = new Command();

program
  .name("parkimport")
  .description("Inspect and import legacy .sc6 scenarios and .sv6 saved games")
  .version("0.1.0");

program
  .command("info")
  .description("Read the header and object table of a park without importing it")
  .argument("<input>", "Path to .sc6/.sv6 file")
  .option("-o, --output <path>", "Write JSON to a file (default: stdout)")
  .option("--config <path>", "Importer config JSON")
  .option("--allow-bad-checksum", "Load files whose checksum does not match", false)
  .option("--verbose", "Log progress to stderr", false)
  .action(async (input: string, opts: CommonOpts) => {
    const config = await resolveConfig(opts);
    const warnings: string[] = [];
    const importer = new S6Importer(new InMemoryObjectRepository(), {
      config,
      warn: (m) => warnings.push(m),
      verbose: verboseLog(opts.verbose),
    });
    importer.load(input);
    for (const w of warnings) console.warn(w);

    const parsed = importer.parsedFile;
    if (parsed === undefined) throw new Error(`Nothing loaded from ${input}`);
    await emit(stringifySummary(summarizeParkFile(parsed)), opts.output);
  });

program
  .command("import")
  .description("Import a park into a fresh world and print a JSON summary")
  .argument("<input>", "Path to .sc6/.sv6 file")
  .option("-o, --output <path>", "Write JSON to a file (default: stdout)")
  .option("--config <path>", "Importer config JSON")
  .option("--objects <dir>", "Directory of object .DAT files the park may refer to")
  .option("--allow-bad-checksum", "Load files whose checksum does not match", false)
  .option("--skip-object-check", "Do not require the park's objects to be available", false)
  .option("--verbose", "Log progress and repairs to stderr", false)
  .action(async (input: string, opts: ImportOpts) => {
    const config = await resolveConfig(opts);
    const objects: ObjectRepository = opts.objects
      ? new DirectoryObjectRepository(opts.objects)
      : new InMemoryObjectRepository();

    const warnings: string[] = [];
    const { world, result } = loadPark(input, {
      objects,
      config,
      warn: (m) => warnings.push(m),
      verbose: verboseLog(opts.verbose),
    });
    for (const w of warnings) console.warn(w);

    await emit(stringifySummary(summarizeWorld(world, result)), opts.output);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(msg + "\n");
  process.exitCode = 1;
});

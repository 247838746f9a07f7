#!/usr/bin/env node
import path from "node:path";
import { config as loadDotenv } from "dotenv";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { FACTOR_STATISTICS, type FactorStatistic } from "@ui-rescale/shared";
import {
  deriveDirectoryFactors,
  scaleDirectoryByFactor,
  scaleDirectoryByResolution
} from "../pipeline";
import { searchTextFiles } from "../search/textSearch";
import { errorMessage } from "../errors";
import { parseReferences, runCommand } from "./runtime";

loadDotenv();

function setExitCode(code: number) {
  process.exitCode = code;
}

yargs(hideBin(process.argv))
  .scriptName("ui-rescale")
  .option("ext", {
    type: "string",
    describe: "File extension to process (defaults to scaling.extension in config)"
  })
  .command<{ input: string; output: string; factor: number; ext?: string }>(
    "scale",
    "Multiply every eligible layout value by one factor",
    builder => builder
      .option("input", { type: "string", demandOption: true, describe: "Directory of files to rescale" })
      .option("output", { type: "string", demandOption: true, describe: "Directory for rescaled files" })
      .option("factor", { type: "number", demandOption: true, describe: "Scaling factor, > 0" }),
    async args => {
      setExitCode(await runCommand("scale", async ({ config, logger }) => {
        const summary = await scaleDirectoryByFactor({
          inputDir: path.resolve(args.input),
          outputDir: path.resolve(args.output),
          extension: args.ext ?? config.scaling.extension,
          concurrency: config.dispatch.concurrency,
          factor: args.factor,
          logger
        });
        return summary.failed === 0;
      }));
    }
  )
  .command<{ original: string; reference: string[]; ext?: string }>(
    "derive",
    "Derive per-attribute scaling factors from hand-scaled reference sets",
    builder => builder
      .option("original", { type: "string", demandOption: true, describe: "Directory of unscaled files" })
      .option("reference", {
        type: "string",
        array: true,
        demandOption: true,
        describe: "LABEL=DIRECTORY of a scaled set, repeatable (e.g. 4K=./gui_4k)"
      }),
    async args => {
      setExitCode(await runCommand("derive", async ({ config, logger, openStore }) => {
        const references = parseReferences(args.reference);
        const summary = await deriveDirectoryFactors({
          originalDir: path.resolve(args.original),
          references,
          extension: args.ext ?? config.scaling.extension,
          concurrency: config.dispatch.concurrency,
          store: openStore(),
          logger
        });
        return summary.failed === 0;
      }));
    }
  )
  .command<{ input: string; output: string; resolution: string; statistic?: FactorStatistic; ext?: string }>(
    "apply",
    "Rescale files with the stored factors of one resolution",
    builder => builder
      .option("input", { type: "string", demandOption: true, describe: "Directory of files to rescale" })
      .option("output", { type: "string", demandOption: true, describe: "Directory for rescaled files" })
      .option("resolution", { type: "string", demandOption: true, describe: "Stored resolution label" })
      .option("statistic", {
        choices: FACTOR_STATISTICS,
        describe: "Which stored statistic to apply (defaults to scaling.statistic in config)"
      }),
    async args => {
      setExitCode(await runCommand("apply", async ({ config, logger, openStore }) => {
        const summary = await scaleDirectoryByResolution({
          inputDir: path.resolve(args.input),
          outputDir: path.resolve(args.output),
          extension: args.ext ?? config.scaling.extension,
          concurrency: config.dispatch.concurrency,
          resolution: args.resolution,
          statistic: args.statistic ?? config.scaling.statistic,
          store: openStore(),
          logger
        });
        return summary.failed === 0;
      }));
    }
  )
  .command<{ input: string; query: string; out: string; ext?: string }>(
    "search",
    "Case-insensitive text search across files",
    builder => builder
      .option("input", { type: "string", demandOption: true, describe: "Directory to search" })
      .option("query", { type: "string", demandOption: true, describe: "Literal text to look for" })
      .option("out", { type: "string", demandOption: true, describe: "Results file (or directory)" }),
    async args => {
      setExitCode(await runCommand("search", async ({ config, logger }) => {
        await searchTextFiles({
          inputDir: path.resolve(args.input),
          extension: args.ext ?? config.scaling.extension,
          query: args.query,
          outputFile: path.resolve(args.out),
          logger
        });
        return true;
      }));
    }
  )
  .command<{ resolution?: string }>(
    "factors",
    "Print stored scaling factors as JSON",
    builder => builder.option("resolution", { type: "string", describe: "Only this resolution label" }),
    async args => {
      setExitCode(await runCommand("factors", async ({ openStore }) => {
        const rows = openStore().listFactors(args.resolution);
        process.stdout.write(`${JSON.stringify(rows, null, 2)}\n`);
        return true;
      }));
    }
  )
  .demandCommand()
  .help()
  .strict()
  .parseAsync()
  .catch((error: unknown) => {
    console.error(errorMessage(error));
    setExitCode(1);
  });

#!/usr/bin/env node

import readline from "readline";
import path from "path";
import { Command } from "commander";
import { collectDefine, describeError, parseDefines } from "./args";
import { generate, planGeneration } from "../core/runner";
import { watchTemplate } from "../core/watcher";
import { generateMatrix, loadMatrixFile } from "../core/matrix";
import { checkTemplate } from "../core/check-template";
import { initTemplate } from "../core/init-template";
import type { AskFn } from "../core/prompt";
import { defaultLogger, type Logger } from "../util/logger";
import type { OptionValue } from "../schema";

interface GlobalCliOptions {
  quiet?: boolean;
  debug?: boolean;
}

interface DefineCliOptions {
  define: string[];
  manifest?: string;
}

interface GenerateCliOptions extends DefineCliOptions {
  force?: boolean;
  dryRun?: boolean;
  silent?: boolean;
  watch?: boolean;
}

interface MatrixCliOptions {
  matrix: string;
  manifest?: string;
  force?: boolean;
}

interface CheckCliOptions {
  manifest?: string;
}

interface InitCliOptions {
  force?: boolean;
}

/**
 * Create a logger with the appropriate level from CLI flags.
 */
function createCliLogger(opts: GlobalCliOptions): Logger {
  if (opts.quiet) {
    defaultLogger.setLevel("silent");
  } else if (opts.debug) {
    defaultLogger.setLevel("debug");
  }
  return defaultLogger.child("[cli]");
}

function formatDefault(value: OptionValue | undefined): string {
  if (value === undefined) return "";
  if (typeof value === "boolean") return value ? " [Y/n]" : " [y/N]";
  return ` [${value}]`;
}

const askQuestion: AskFn = (question) => {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const choices = question.choices ? ` (${question.choices.join("/")})` : "";
  const retry = question.attempt > 1 ? "(invalid, try again) " : "";
  const text = `${retry}${question.message}${choices}${formatDefault(question.default)}: `;

  return new Promise((resolve) => {
    rl.question(text, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
};

async function handleGenerateCommand(
  template: string,
  out: string,
  opts: GenerateCliOptions,
  globals: GlobalCliOptions,
) {
  const logger = createCliLogger(globals);
  const defines = parseDefines(opts.define);
  const interactive = Boolean(process.stdin.isTTY) && !opts.silent;

  logger.debug(
    `generate (template=${template}, out=${out}, manifest=${opts.manifest ?? "auto"}, watch=${opts.watch ? "yes" : "no"})`,
  );

  if (opts.watch) {
    // Watch mode – runs until the process is stopped
    watchTemplate({
      templateDir: template,
      outDir: out,
      defines,
      manifestPath: opts.manifest,
    });
    return;
  }

  await generate({
    templateDir: template,
    outDir: out,
    defines,
    manifestPath: opts.manifest,
    force: opts.force,
    dryRun: opts.dryRun,
    ask: interactive ? askQuestion : undefined,
  });
}

async function handleInspectCommand(
  template: string,
  opts: DefineCliOptions,
  globals: GlobalCliOptions,
) {
  createCliLogger(globals);
  const plan = await planGeneration({
    templateDir: template,
    defines: parseDefines(opts.define),
    manifestPath: opts.manifest,
  });

  const report = {
    values: Object.fromEntries(plan.values),
    excluded: plan.excluded,
    entries: plan.entries.map((e) => (e.type === "dir" ? `${e.path}/` : e.path)),
  };
  process.stdout.write(JSON.stringify(report, null, 2) + "\n");
}

async function handleCheckCommand(
  template: string,
  opts: CheckCliOptions,
  globals: GlobalCliOptions,
) {
  const logger = createCliLogger(globals);
  const diagnostics = await checkTemplate(template, { manifestPath: opts.manifest });

  for (const d of diagnostics) {
    const where = d.file ? `${d.file}${d.line ? `:${d.line}:${d.column ?? 1}` : ""}: ` : "";
    const line = `${where}${d.message} (${d.code})`;
    if (d.severity === "error") logger.error(line);
    else logger.warn(line);
  }

  const errors = diagnostics.filter((d) => d.severity === "error").length;
  logger.info(`${errors} error(s), ${diagnostics.length - errors} warning(s)`);
  if (errors > 0) process.exitCode = 1;
}

async function handleMatrixCommand(
  template: string,
  outRoot: string,
  opts: MatrixCliOptions,
  globals: GlobalCliOptions,
) {
  const logger = createCliLogger(globals);
  const outcomes = await generateMatrix({
    templateDir: template,
    outRoot,
    matrix: loadMatrixFile(path.resolve(opts.matrix)),
    manifestPath: opts.manifest,
    force: opts.force,
  });

  const failed = outcomes.filter((o) => !o.ok);
  logger.info(`${outcomes.length - failed.length}/${outcomes.length} matrix entries generated`);
  if (failed.length > 0) process.exitCode = 1;
}

async function handleInitCommand(dir: string | undefined, opts: InitCliOptions, globals: GlobalCliOptions) {
  const logger = createCliLogger(globals);
  const result = await initTemplate(dir ?? ".", { force: opts.force });
  logger.info(`Done. Template: ${result.templateDir}`);
}

async function main() {
  const program = new Command();

  program
    .name("tforge")
    .description("template-forge – render project templates from typed options")
    .option("--quiet", "Silence logs")
    .option("--debug", "Enable debug logging");

  program
    .command("generate")
    .description("Generate a project from a template")
    .argument("<template>", "Template directory")
    .argument("<out>", "Output directory")
    .option("-D, --define <key=value>", "Set an option value (repeatable)", collectDefine, [])
    .option("--manifest <path>", "Explicit manifest file")
    .option("--force", "Replace a non-empty output directory")
    .option("--dry-run", "Render and list the output without writing")
    .option("--silent", "Never prompt; use defines and defaults only")
    .option("-w, --watch", "Regenerate whenever the template changes")
    .action(async (template: string, out: string, opts: GenerateCliOptions, cmd: Command) => {
      await handleGenerateCommand(template, out, opts, cmd.parent?.opts<GlobalCliOptions>() ?? {});
    });

  program
    .command("inspect")
    .description("Print resolved values, exclusions and output paths as JSON")
    .argument("<template>", "Template directory")
    .option("-D, --define <key=value>", "Set an option value (repeatable)", collectDefine, [])
    .option("--manifest <path>", "Explicit manifest file")
    .action(async (template: string, opts: DefineCliOptions, cmd: Command) => {
      await handleInspectCommand(template, opts, cmd.parent?.opts<GlobalCliOptions>() ?? {});
    });

  program
    .command("check")
    .description("Statically check a template's manifest and files")
    .argument("<template>", "Template directory")
    .option("--manifest <path>", "Explicit manifest file")
    .action(async (template: string, opts: CheckCliOptions, cmd: Command) => {
      await handleCheckCommand(template, opts, cmd.parent?.opts<GlobalCliOptions>() ?? {});
    });

  program
    .command("matrix")
    .description("Generate one project per entry of a TOML matrix file")
    .argument("<template>", "Template directory")
    .argument("<out-root>", "Directory receiving one sub-directory per entry")
    .requiredOption("--matrix <file>", "Matrix file (TOML)")
    .option("--manifest <path>", "Explicit manifest file")
    .option("--force", "Replace existing entry directories")
    .action(async (template: string, outRoot: string, opts: MatrixCliOptions, cmd: Command) => {
      await handleMatrixCommand(template, outRoot, opts, cmd.parent?.opts<GlobalCliOptions>() ?? {});
    });

  program
    .command("init")
    .description("Write a starter template")
    .argument("[dir]", "Target directory (default: current directory)")
    .option("--force", "Overwrite existing starter files")
    .action(async (dir: string | undefined, opts: InitCliOptions, cmd: Command) => {
      await handleInitCommand(dir, opts, cmd.parent?.opts<GlobalCliOptions>() ?? {});
    });

  await program.parseAsync(process.argv);
}

// Run and handle errors
main().catch((err) => {
  defaultLogger.error(describeError(err));
  process.exit(1);
});

#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from "commander";
import pk from "../package.json";
import {
  AllFailedError,
  NoInputFilesError,
  ProfileError,
} from "./common/errors";
import {
  DisassemblySource,
  FileFailure,
  ReportMode,
  RunResult,
} from "./common/types";
import { DEFAULT_EXTENSIONS, findFiles } from "./discovery/files";
import { profile } from "./profile";
import { render, warning } from "./reporter/report";
import { CompilerSource, DEFAULT_COMPILER } from "./source/compiler";

export type CliOptions = {
  showAsm?: boolean;
  json?: boolean;
  compiler: string;
  ext: string[];
  jobs?: number;
  listFailures?: boolean;
};

export interface Output {
  out(text: string): void;
  err(text: string): void;
}

const consoleOutput: Output = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

export function parseExtensions(value: string): string[] {
  const list = value
    .split(",")
    .map((e) => e.trim())
    .filter((e) => e.length)
    .map((e) => (e.startsWith(".") ? e : `.${e}`));
  if (!list.length) {
    throw new InvalidArgumentError("Expected at least one extension.");
  }
  return list;
}

export function parseJobs(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}

export function createProgram() {
  return new Command()
    .name("opcode-freq")
    .version(pk.version)
    .description(
      "Counts opcode frequencies in the disassembly of compiled scripts",
    )
    .argument("<patterns...>", "files, globs or directories")
    .option("--show-asm", "Show disassembly of every file before the table")
    .option("--json", "Output results as JSON")
    .addOption(
      new Option(
        "-c, --compiler <path>",
        "Compiler invoked as <path> --text <file>",
      )
        .default(DEFAULT_COMPILER)
        .env("OPCODE_FREQ_COMPILER"),
    )
    .addOption(
      new Option("-e, --ext <list>", "Comma separated file extensions")
        .default(DEFAULT_EXTENSIONS, DEFAULT_EXTENSIONS.join(","))
        .env("OPCODE_FREQ_EXT")
        .argParser(parseExtensions),
    )
    .addOption(
      new Option("-j, --jobs <n>", "Compiler invocations run at once")
        .env("OPCODE_FREQ_JOBS")
        .argParser(parseJobs),
    )
    .option("--list-failures", "Print the reason each failed file failed");
}

export function modeOf(opts: CliOptions): ReportMode {
  if (opts.json) {
    return "json";
  }
  if (opts.showAsm) {
    return "verbose";
  }
  return "table";
}

function listFailures(failures: FileFailure[], output: Output) {
  for (const { file, reason } of failures) {
    output.err(`Error compiling ${file}: ${reason}`);
  }
}

export async function run(
  patterns: string[],
  opts: CliOptions,
  output: Output = consoleOutput,
  source: DisassemblySource = new CompilerSource({ compiler: opts.compiler }),
) {
  const files = await findFiles(patterns, opts.ext);
  if (!files.length) {
    throw new NoInputFilesError(patterns, opts.ext);
  }

  let result: RunResult;
  try {
    result = await profile(files, source, { jobs: opts.jobs });
  } catch (e) {
    if (e instanceof AllFailedError && opts.listFailures) {
      listFailures(e.failures, output);
    }
    throw e;
  }
  output.out(render(result, modeOf(opts)));

  const warn = warning(result);
  if (warn !== undefined) {
    output.err(`\n${warn}`);
  }
  if (opts.listFailures) {
    listFailures(result.failed, output);
  }
}

async function main() {
  const program = createProgram();
  program.parse();

  const patterns = program.args;
  const opts = program.opts<CliOptions>();

  try {
    await run(patterns, opts);
  } catch (e) {
    if (e instanceof ProfileError) {
      console.error(e.message);
    } else {
      const message = e instanceof Error ? e.message : String(e);
      console.error(`opcode-freq: ${message}`);
    }
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}

import os from "os";
import { Aggregator } from "./aggregator/aggregator";
import { AllFailedError } from "./common/errors";
import { Disassembly, DisassemblySource, RunResult } from "./common/types";

export interface ProfileOptions {
  jobs?: number;
}

export function defaultJobs() {
  return Math.max(1, os.availableParallelism());
}

async function disassembleAll(
  files: string[],
  source: DisassemblySource,
  jobs: number,
) {
  const outcomes: Disassembly[] = new Array(files.length);
  let next = 0;

  async function worker() {
    while (next < files.length) {
      const i = next++;
      outcomes[i] = await source.disassemble(files[i]);
    }
  }

  const workers: Promise<void>[] = [];
  for (let i = 0; i < Math.min(jobs, files.length); ++i) {
    workers.push(worker());
  }
  await Promise.all(workers);
  return outcomes;
}

export async function profile(
  files: string[],
  source: DisassemblySource,
  options: ProfileOptions = {},
): Promise<RunResult> {
  const jobs = Math.max(1, Math.floor(options.jobs ?? defaultJobs()));
  const outcomes = await disassembleAll(files, source, jobs);

  // merged in input order, whatever order the workers finished in
  const aggregator = new Aggregator();
  outcomes.forEach((outcome, i) => aggregator.accept(files[i], outcome));

  const result = aggregator.result();
  if (result.succeeded === 0) {
    throw new AllFailedError(result.failed);
  }
  return result;
}

export { Aggregator, merge, total } from "./aggregator/aggregator";
export { extract, decode } from "./parser/parser";
export { render, rank, percent, structured, warning } from "./reporter/report";
export { CompilerSource, runProcess } from "./source/compiler";
export { findFiles } from "./discovery/files";
export * from "./common/types";
export * from "./common/errors";

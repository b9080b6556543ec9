import { spawn } from "child_process";
import { Disassembly, DisassemblySource } from "../common/types";
import { decode } from "../parser/parser";

export interface ProcessOutput {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: Buffer;
  stderr: Buffer;
}

export type Runner = (
  command: string,
  args: string[],
) => Promise<ProcessOutput>;

export function runProcess(
  command: string,
  args: string[],
): Promise<ProcessOutput> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
    child.on("error", reject);
    child.on("close", (code, signal) => {
      resolve({
        code,
        signal,
        stdout: Buffer.concat(stdout),
        stderr: Buffer.concat(stderr),
      });
    });
  });
}

export interface CompilerOptions {
  compiler: string;
  args?: string[];
  run?: Runner;
}

export const DEFAULT_COMPILER = "./luau-compile";
export const DEFAULT_COMPILER_ARGS = ["--text"];

function reasonOf(output: ProcessOutput) {
  const message = decode(output.stderr).trim();
  if (message.length) {
    return message;
  }
  if (output.signal !== null) {
    return `terminated by ${output.signal}`;
  }
  return `exited with code ${output.code}`;
}

export class CompilerSource implements DisassemblySource {
  private compiler: string;
  private args: string[];
  private run: Runner;

  constructor(options: CompilerOptions) {
    this.compiler = options.compiler;
    this.args = options.args ?? DEFAULT_COMPILER_ARGS;
    this.run = options.run ?? runProcess;
  }

  async disassemble(file: string): Promise<Disassembly> {
    let output: ProcessOutput;
    try {
      output = await this.run(this.compiler, [...this.args, file]);
    } catch (e) {
      return {
        ok: false,
        reason: e instanceof Error ? e.message : String(e),
      };
    }

    if (output.code !== 0) {
      return { ok: false, reason: reasonOf(output) };
    }
    return { ok: true, text: decode(output.stdout) };
  }
}

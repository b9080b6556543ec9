export type OpcodeName = string;
export type OpcodeCounts = Record<OpcodeName, number>;

export type Disassembly =
  | {
      ok: true;
      text: string;
    }
  | {
      ok: false;
      reason: string;
    };

export interface DisassemblySource {
  disassemble(file: string): Promise<Disassembly>;
}

export interface FileFailure {
  file: string;
  reason: string;
}

export interface Listing {
  file: string;
  text: string;
}

export interface RunResult {
  succeeded: number;
  failed: FileFailure[];
  aggregate: OpcodeCounts;
  perFile: Map<string, OpcodeCounts>;
  listing: Listing[];
}

export type ReportMode = "table" | "verbose" | "json";

import {
  Disassembly,
  FileFailure,
  Listing,
  OpcodeCounts,
  RunResult,
} from "../common/types";
import { extract } from "../parser/parser";

export function merge(into: OpcodeCounts, addition: OpcodeCounts) {
  for (const [name, count] of Object.entries(addition)) {
    into[name] = (into[name] ?? 0) + count;
  }
  return into;
}

export function total(counts: OpcodeCounts) {
  let sum = 0;
  for (const count of Object.values(counts)) {
    sum += count;
  }
  return sum;
}

export class Aggregator {
  private aggregate: OpcodeCounts = {};
  private perFile = new Map<string, OpcodeCounts>();
  private listing: Listing[] = [];
  private failed: FileFailure[] = [];
  private seen = new Set<string>();

  accept(file: string, disassembly: Disassembly) {
    if (this.seen.has(file)) {
      throw new Error(`File already aggregated: ${file}`);
    }
    this.seen.add(file);

    if (!disassembly.ok) {
      this.failed.push({ file, reason: disassembly.reason });
      return;
    }

    const counts = extract(disassembly.text);
    this.perFile.set(file, counts);
    this.listing.push({ file, text: disassembly.text });
    merge(this.aggregate, counts);
  }

  result(): RunResult {
    return {
      succeeded: this.perFile.size,
      failed: [...this.failed],
      aggregate: { ...this.aggregate },
      perFile: new Map(this.perFile),
      listing: [...this.listing],
    };
  }
}

import { total } from "../aggregator/aggregator";
import { OpcodeCounts, ReportMode, RunResult } from "../common/types";

const TABLE_TITLE = "OPCODE FREQUENCY TABLE (AGGREGATE)";
const VERBOSE_TITLE = "=== AGGREGATE OPCODE FREQUENCY TABLE ===";
const LISTING_TITLE = "=== FULL BYTECODE DISASSEMBLY (all files) ===";
const RULE = "=".repeat(42);

export interface StructuredReport {
  file_count: number;
  aggregate: OpcodeCounts;
  total_opcodes: number;
  per_file: Record<string, OpcodeCounts>;
}

export function rank(counts: OpcodeCounts): [string, number][] {
  return Object.entries(counts).sort(([xn, xc], [yn, yc]) => {
    if (xc !== yc) {
      return yc - xc;
    }
    if (xn === yn) {
      return 0;
    }
    return xn < yn ? -1 : 1;
  });
}

export function percent(count: number, sum: number) {
  const value = sum > 0 ? (count / sum) * 100 : 0;
  return value.toFixed(1);
}

function ranked(counts: OpcodeCounts): OpcodeCounts {
  return Object.fromEntries(rank(counts));
}

export function showRow(name: string, count: number, sum: number) {
  const pct = percent(count, sum).padStart(6);
  return `${name.padEnd(20)} ${String(count).padStart(5)}  ${pct}%`;
}

export function showTable(
  counts: OpcodeCounts,
  fileCount: number,
  title = TABLE_TITLE,
) {
  const sum = total(counts);
  const rows = rank(counts).map(([name, count]) => showRow(name, count, sum));
  return [
    title,
    RULE,
    `  Analyzed ${fileCount} files`,
    "",
    ...rows,
    "",
    `${"TOTAL".padEnd(20)} ${String(sum).padStart(5)}`,
  ].join("\n");
}

export function showListing(result: RunResult) {
  return result.listing.map((e) => `=== ${e.file} ===\n${e.text}`).join("");
}

export function structured(result: RunResult): StructuredReport {
  const perFile: Record<string, OpcodeCounts> = {};
  for (const [file, counts] of result.perFile) {
    perFile[file] = ranked(counts);
  }
  return {
    file_count: result.succeeded,
    aggregate: ranked(result.aggregate),
    total_opcodes: total(result.aggregate),
    per_file: perFile,
  };
}

export function render(result: RunResult, mode: ReportMode) {
  if (mode === "json") {
    return JSON.stringify(structured(result), null, 2);
  }
  if (mode === "verbose") {
    return [
      LISTING_TITLE,
      showListing(result),
      "",
      showTable(result.aggregate, result.succeeded, VERBOSE_TITLE),
    ].join("\n");
  }
  return showTable(result.aggregate, result.succeeded);
}

export function warning(result: RunResult): string | undefined {
  if (!result.failed.length) {
    return;
  }
  return `Warning: ${result.failed.length} file(s) failed to compile`;
}

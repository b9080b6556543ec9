import { OpcodeCounts } from "../common/types";

const LABEL = /^L\d+:\s*/;
const OPCODE = /^([A-Z][A-Z0-9_]*)\b/;

const decoder = new TextDecoder("utf-8");

export function decode(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

function split(text: string) {
  return text.split(/\r\n|\r|\n/);
}

export function opcodeOf(line: string): string | undefined {
  const rest = line.replace(LABEL, "");
  if (!rest.length) {
    return;
  }
  // indented instructions still count
  const match = rest.replace(/^[ \t]+/, "").match(OPCODE);
  return match?.[1];
}

export function extract(text: string): OpcodeCounts {
  const counts: OpcodeCounts = {};
  for (const line of split(text)) {
    const name = opcodeOf(line);
    if (name === undefined) {
      continue;
    }
    counts[name] = (counts[name] ?? 0) + 1;
  }
  return counts;
}

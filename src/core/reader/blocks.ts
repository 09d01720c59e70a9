export type SourceLine = { text: string; line: number };

/** A run of non-blank lines; blocks are separated by one or more blank lines. */
export type Block = SourceLine[];

export function splitBlocks(src: string): Block[] {
  const blocks: Block[] = [];
  let current: Block = [];

  const lines = src.replace(/\r\n?/g, "\n").split("\n");
  lines.forEach((raw, i) => {
    const text = raw.trim();
    if (text === "") {
      if (current.length > 0) blocks.push(current);
      current = [];
      return;
    }
    current.push({ text, line: i + 1 });
  });
  if (current.length > 0) blocks.push(current);

  return blocks;
}

export type Sentence = { text: string; line: number; terminated: boolean };

/**
 * Split lines into period-terminated sentences. Line breaks count as spaces,
 * so a sentence may wrap; several may share one line. A period only ends a
 * sentence when followed by whitespace or the end of the lines.
 */
export function splitSentences(lines: SourceLine[]): Sentence[] {
  const out: Sentence[] = [];
  let buf = "";
  let start = 0;

  for (const { text, line } of lines) {
    for (let i = 0; i < text.length; i++) {
      const c = text[i];
      if (buf === "" && /\s/.test(c)) continue;
      if (buf === "") start = line;
      if (c === "." && (i + 1 === text.length || /\s/.test(text[i + 1]))) {
        out.push({ text: buf.trim().replace(/\s+/g, " "), line: start, terminated: true });
        buf = "";
        continue;
      }
      buf += c;
    }
    if (buf !== "") buf += " ";
  }

  if (buf.trim() !== "") {
    out.push({ text: buf.trim().replace(/\s+/g, " "), line: start, terminated: false });
  }
  return out;
}

export type LineDifference = {
  line: number;
  expected: string;
  actual: string;
};

export type OutputComparison = {
  matched: boolean;
  exactMatch: boolean;
  lineDifferences: LineDifference[];
  matchPercentage: number;
};

const MISSING_LINE = "<missing>";

/** CRLF/CR to LF, trailing whitespace dropped per line, trailing blank lines dropped. */
export function normalizeOutput(text: string): string {
  const lines = text
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((line) => line.trimEnd());
  while (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines.join("\n");
}

function toLines(normalized: string): string[] {
  return normalized === "" ? [] : normalized.split("\n");
}

export function compareOutput(actual: string, expected: string): OutputComparison {
  const a = normalizeOutput(actual);
  const e = normalizeOutput(expected);
  const actualLines = toLines(a);
  const expectedLines = toLines(e);
  const total = Math.max(actualLines.length, expectedLines.length);

  const lineDifferences: LineDifference[] = [];
  for (let i = 0; i < total; i++) {
    const actualLine = actualLines[i] ?? MISSING_LINE;
    const expectedLine = expectedLines[i] ?? MISSING_LINE;
    if (actualLine !== expectedLine) {
      lineDifferences.push({ line: i + 1, expected: expectedLine, actual: actualLine });
    }
  }

  const matchPercentage =
    total === 0 ? 100 : Math.round((1 - lineDifferences.length / total) * 10000) / 100;

  return {
    matched: a === e,
    exactMatch: actual === expected,
    lineDifferences,
    matchPercentage,
  };
}

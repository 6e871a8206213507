/**
 * Reader for the plain-text sample exposition format.
 *
 * Only sample lines are interpreted:
 *   http_requests_total{code="200",method="GET"} 1027 1395066363000
 * Comment lines (# HELP, # TYPE, ...) and blank lines are skipped.
 */

import type { LabelSet } from "@scrape-supervisor/shared";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ParsedSample {
  /** Sample labels, including `__name__` */
  labels: LabelSet;
  value: number;
  /** Timestamp exposed by the target, if any */
  timestampMs?: number;
}

export class ParseError extends Error {
  readonly line: number;

  constructor(line: number, message: string) {
    super(`line ${line}: ${message}`);
    this.name = "ParseError";
    this.line = line;
  }
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

const METRIC_NAME_RE = /^[a-zA-Z_:][a-zA-Z0-9_:]*/;
const LABEL_NAME_RE = /^[a-zA-Z_][a-zA-Z0-9_]*/;

const ESCAPES: Record<string, string> = { "\\": "\\", '"': '"', n: "\n" };

function parseValue(token: string): number | undefined {
  switch (token) {
    case "NaN":
      return NaN;
    case "+Inf":
    case "Inf":
      return Infinity;
    case "-Inf":
      return -Infinity;
  }
  const value = Number(token);
  return Number.isNaN(value) ? undefined : value;
}

/** Parse `{name="value",...}` starting at `pos`; returns labels and the end offset */
function parseLabels(
  line: string,
  pos: number,
  lineNo: number,
): { labels: LabelSet; end: number } {
  const labels: LabelSet = {};
  let i = pos + 1; // skip "{"

  while (true) {
    while (line[i] === " ") i++;
    if (line[i] === "}") return { labels, end: i + 1 };

    const name = LABEL_NAME_RE.exec(line.slice(i))?.[0];
    if (!name) throw new ParseError(lineNo, "invalid label name");
    i += name.length;

    if (line[i] !== "=" || line[i + 1] !== '"') {
      throw new ParseError(lineNo, `expected ="..." after label ${name}`);
    }
    i += 2;

    let value = "";
    while (i < line.length && line[i] !== '"') {
      if (line[i] === "\\") {
        const escaped = ESCAPES[line[i + 1]];
        if (escaped === undefined) throw new ParseError(lineNo, "invalid escape sequence");
        value += escaped;
        i += 2;
      } else {
        value += line[i];
        i++;
      }
    }
    if (i >= line.length) throw new ParseError(lineNo, "unterminated label value");
    i++; // closing quote

    if (name in labels) throw new ParseError(lineNo, `duplicate label ${name}`);
    labels[name] = value;

    while (line[i] === " ") i++;
    if (line[i] === ",") {
      i++;
    } else if (line[i] !== "}") {
      throw new ParseError(lineNo, "expected , or } in label set");
    }
  }
}

/** Parse exposition text into samples. Throws ParseError on malformed lines. */
export function parseSamples(text: string): ParsedSample[] {
  const samples: ParsedSample[] = [];
  const lines = text.split("\n");

  for (let idx = 0; idx < lines.length; idx++) {
    const lineNo = idx + 1;
    const line = lines[idx].trim();
    if (!line || line.startsWith("#")) continue;

    const name = METRIC_NAME_RE.exec(line)?.[0];
    if (!name) throw new ParseError(lineNo, "invalid metric name");

    let labels: LabelSet = {};
    let rest = line.slice(name.length);
    if (rest.startsWith("{")) {
      const parsed = parseLabels(line, name.length, lineNo);
      labels = parsed.labels;
      rest = line.slice(parsed.end);
    }

    const tokens = rest.trim().split(/\s+/).filter(Boolean);
    if (tokens.length < 1 || tokens.length > 2) {
      throw new ParseError(lineNo, "expected a value and an optional timestamp");
    }

    const value = parseValue(tokens[0]);
    if (value === undefined) throw new ParseError(lineNo, `invalid value "${tokens[0]}"`);

    const sample: ParsedSample = { labels: { ...labels, __name__: name }, value };
    if (tokens.length === 2) {
      const ts = Number(tokens[1]);
      if (!Number.isInteger(ts)) throw new ParseError(lineNo, `invalid timestamp "${tokens[1]}"`);
      sample.timestampMs = ts;
    }
    samples.push(sample);
  }

  return samples;
}

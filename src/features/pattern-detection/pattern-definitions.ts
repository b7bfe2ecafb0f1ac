import type { PatternKind } from '@domain/types/pattern.js';
import {
  countMatches,
  normalizeSpace,
  splitPair,
  splitSentences,
  cleanOutput,
  type RawPair,
} from './pair-parsing.js';

/**
 * Structural scan of a query under one pattern kind.
 * Items keep document order; the extractor decides which is the live query.
 */
export interface PatternScan {
  /** Task preamble preceding the first item */
  context: string;
  items: RawPair[];
  /** Live query found by an explicit marker (e.g. "Problem:"), if any */
  query: string | null;
}

const EXAMPLE_MARKER = /\bexample\s*\d+\s*:/gi;
const QUERY_MARKER = /\b(?:problem|solve|query|question|test)\s*:/i;
const INPUT_LABEL = /\binput\s*:/gi;
const NUMBERED_LINE = /^[ \t]*\d+[.)][ \t]+(.+)$/gm;
const IS_TO = /^(.*?)\s+is\s+to\s+(.*)$/i;
const AS_SEPARATOR = /\s+as\s+/i;
const IF_THEN = /^(.*?)\bif\s+(.+?)\s*,?\s*\bthen\b\s*(.*)$/i;

// ---------------------------------------------------------------------------
// detect: structural strength per kind
// ---------------------------------------------------------------------------

/**
 * Lexical strength of a pattern kind in the text: the number of structural
 * markers or parsable items the kind recognises. No model calls.
 */
export function detectStrength(kind: PatternKind, text: string): number {
  switch (kind) {
    case 'explicit-examples':
      return countMatches(EXAMPLE_MARKER, text);
    case 'input-output-pairs':
      return countMatches(INPUT_LABEL, text);
    case 'numbered-sequence':
      return numberedLines(text).filter((line) => splitPair(line.body) !== null).length;
    case 'analogy':
      return scanAnalogies(text).items.length;
    case 'rule-chain':
      return scanRules(text).items.length;
    default: {
      const _exhaustive: never = kind;
      throw new Error(`Unknown pattern kind: ${String(_exhaustive)}`);
    }
  }
}

// ---------------------------------------------------------------------------
// extract: item scan per kind
// ---------------------------------------------------------------------------

export function scanPattern(kind: PatternKind, text: string): PatternScan {
  switch (kind) {
    case 'explicit-examples':
      return scanExplicitExamples(text);
    case 'input-output-pairs':
      return scanInputOutputPairs(text);
    case 'numbered-sequence':
      return scanNumberedSequence(text);
    case 'analogy':
      return scanAnalogies(text);
    case 'rule-chain':
      return scanRules(text);
    default: {
      const _exhaustive: never = kind;
      throw new Error(`Unknown pattern kind: ${String(_exhaustive)}`);
    }
  }
}

/** A body that is not a pair becomes an item with no output. */
function toItem(body: string): RawPair {
  return splitPair(body) ?? { input: normalizeSpace(body), output: null };
}

/** The input side of a query fragment such as "5,10,15 → ?", else the whole fragment. */
function toQuery(fragment: string): string | null {
  const pair = splitPair(fragment);
  const query = pair ? pair.input : normalizeSpace(fragment);
  return query || null;
}

function scanExplicitExamples(text: string): PatternScan {
  const markers = [...text.matchAll(EXAMPLE_MARKER)];
  const first = markers[0];
  if (!first) return { context: '', items: [], query: null };

  const items: RawPair[] = [];
  let query: string | null = null;

  for (const [i, marker] of markers.entries()) {
    const start = (marker.index ?? 0) + marker[0].length;
    const next = markers[i + 1];
    let body = text.slice(start, next ? next.index : text.length);

    if (!next) {
      const queryMarker = QUERY_MARKER.exec(body);
      if (queryMarker) {
        query = toQuery(body.slice(queryMarker.index + queryMarker[0].length));
        body = body.slice(0, queryMarker.index);
      }
    }
    items.push(toItem(body));
  }

  return { context: normalizeSpace(text.slice(0, first.index ?? 0)), items, query };
}

function scanInputOutputPairs(text: string): PatternScan {
  const labels = [...text.matchAll(INPUT_LABEL)];
  const first = labels[0];
  if (!first) return { context: '', items: [], query: null };

  const items = labels.map((label, i) => {
    const next = labels[i + 1];
    return toItem(text.slice(label.index ?? 0, next ? next.index : text.length));
  });

  return { context: normalizeSpace(text.slice(0, first.index ?? 0)), items, query: null };
}

interface NumberedLine {
  index: number;
  end: number;
  body: string;
}

function numberedLines(text: string): NumberedLine[] {
  return [...text.matchAll(NUMBERED_LINE)].map((m) => ({
    index: m.index ?? 0,
    end: (m.index ?? 0) + m[0].length,
    body: m[1] ?? '',
  }));
}

function scanNumberedSequence(text: string): PatternScan {
  const lines = numberedLines(text);
  const first = lines[0];
  const last = lines.at(-1);
  if (!first || !last) return { context: '', items: [], query: null };

  const items = lines.map((line) => toItem(line.body));
  const trailing = text.slice(last.end).trim();

  return {
    context: normalizeSpace(text.slice(0, first.index)),
    items,
    query: trailing ? toQuery(trailing) : null,
  };
}

/**
 * Analogies come as "a is to b as c is to d" statements or "a : b :: c : d"
 * statements. A preamble ending in ':' before the first clause is context.
 */
function scanAnalogies(text: string): PatternScan {
  const items: RawPair[] = [];
  let context = '';

  for (const sentence of splitSentences(text)) {
    if (sentence.includes('::')) {
      for (const half of sentence.split('::')) {
        const parts = half.split(':');
        const output = parts.at(-1) ?? '';
        const input = parts.at(-2);
        if (input === undefined) continue;
        if (items.length === 0 && parts.length > 2) {
          context = normalizeSpace(parts.slice(0, -2).join(':'));
        }
        items.push({ input: normalizeSpace(input), output: cleanOutput(output) });
      }
      continue;
    }

    // Only "a is to b as c is to d" counts; a lone "is to" is ordinary prose
    const clauses = sentence.split(AS_SEPARATOR).map((clause) => IS_TO.exec(clause));
    if (clauses.length < 2 || clauses.some((match) => match === null)) continue;

    for (const match of clauses) {
      if (!match) continue;
      let lhs = match[1] ?? '';
      const colon = lhs.lastIndexOf(':');
      if (colon >= 0) {
        if (items.length === 0) context = normalizeSpace(lhs.slice(0, colon));
        lhs = lhs.slice(colon + 1);
      }
      items.push({ input: normalizeSpace(lhs), output: cleanOutput(match[2] ?? '') });
    }
  }

  return { context, items, query: null };
}

/**
 * Rule chains are "if X then Y" sentences that end in a live query: either a
 * final rule with an empty consequence ("if X then ?") or a trailing question
 * that is not a rule. Without that query the sentences are prose and the scan
 * finds no items.
 */
function scanRules(text: string): PatternScan {
  const items: RawPair[] = [];
  const preamble: string[] = [];
  let query: string | null = null;

  for (const sentence of splitSentences(text)) {
    const match = IF_THEN.exec(sentence);
    if (match) {
      const lead = normalizeSpace(match[1] ?? '');
      if (items.length === 0 && lead) preamble.push(lead);
      items.push({ input: normalizeSpace(match[2] ?? ''), output: cleanOutput(match[3] ?? '') });
      query = null;
    } else if (items.length === 0) {
      preamble.push(sentence);
    } else if (sentence.endsWith('?')) {
      query = normalizeSpace(sentence);
    }
  }

  const endsInQuery = query !== null || items.at(-1)?.output === null;
  if (!endsInQuery) return { context: '', items: [], query: null };

  return { context: preamble.join('. '), items, query };
}

// slp-json.ts - Deterministic JSON rendering of replays and query results

import { annotate } from './slp-labels';
import type { LabelTable } from './slp-labels';
import { replayNode, evaluate } from './slp-query';
import type { QueryNode } from './slp-query';
import type { Replay } from './slp-builder';

interface JsonOptions {
  /** Render labelled codes as `"<code>:<LABEL>"`. */
  names?: LabelTable | null;
  /** Leave out `frames`. */
  short?: boolean;
}

interface QueryOutputOptions {
  names?: LabelTable | null;
  /** Unwrap single-element sequences and drop the `{ path: ... }` wrapper. */
  quiet?: boolean;
}

/**
 * Shortest decimal that reads back as the same 32-bit float.
 */
function formatF32(value: number): string {
  if (!Number.isFinite(value)) {
    return 'null';
  }
  if (Object.is(value, -0)) {
    return '-0';
  }
  for (let precision = 1; precision <= 9; precision++) {
    const candidate = Number(value.toPrecision(precision));
    if (Math.fround(candidate) === value) {
      return String(candidate);
    }
  }
  return String(value);
}

function renderNode(node: QueryNode, names: LabelTable | null, out: string[]): void {
  switch (node.kind) {
    case 'absent':
      out.push('null');
      return;
    case 'bool':
      out.push(node.value ? 'true' : 'false');
      return;
    case 'string':
      out.push(JSON.stringify(node.value));
      return;
    case 'float':
      out.push(formatF32(node.value));
      return;
    case 'int':
      if (names !== null && node.label !== undefined) {
        out.push(JSON.stringify(annotate(names, node.label, node.value)));
      } else {
        out.push(String(node.value));
      }
      return;
    case 'sequence':
      out.push('[');
      for (let i = 0; i < node.length; i++) {
        if (i > 0) out.push(',');
        renderNode(node.at(i), names, out);
      }
      out.push(']');
      return;
    case 'record':
      out.push('{');
      node.fields.forEach((field, i) => {
        if (i > 0) out.push(',');
        out.push(JSON.stringify(field), ':');
        const child = node.get(field);
        if (child === undefined) {
          out.push('null');
        } else {
          renderNode(child, names, out);
        }
      });
      out.push('}');
      return;
  }
}

function renderJson(node: QueryNode, names: LabelTable | null = null): string {
  const out: string[] = [];
  renderNode(node, names, out);
  return out.join('');
}

/**
 * Whole replay as one JSON document: `hash`, `start`, `end`, `metadata`,
 * `frames`.
 */
function encodeJson(replay: Replay, options: JsonOptions = {}): string {
  return renderJson(replayNode(replay, { short: options.short }), options.names ?? null);
}

/** Single-element sequences collapse to their element, at every depth. */
function unwrap(node: QueryNode): QueryNode {
  if (node.kind !== 'sequence') {
    return node;
  }
  if (node.length === 1) {
    return unwrap(node.at(0));
  }
  const items: QueryNode[] = [];
  for (let i = 0; i < node.length; i++) {
    items.push(unwrap(node.at(i)));
  }
  return { kind: 'sequence', length: items.length, at: (index: number) => items[index] };
}

function formatQueryResult(path: string, result: QueryNode, options: QueryOutputOptions = {}): string {
  const names = options.names ?? null;
  if (options.quiet) {
    return renderJson(unwrap(result), names);
  }
  return `{${JSON.stringify(path)}:${renderJson(result, names)}}`;
}

/**
 * Evaluates `path` on the replay and renders the result.
 */
function queryJson(replay: Replay, path: string, options: QueryOutputOptions = {}): string {
  return formatQueryResult(path, evaluate(replayNode(replay), path), options);
}

export { formatF32, renderJson, encodeJson, formatQueryResult, queryJson };

export type { JsonOptions, QueryOutputOptions };

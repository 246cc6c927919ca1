// slp-labels.ts - Names for enumerated codes (action states, characters, ...)

import defaultLabels from './labels.json';
import type { LabelCategory } from './slp-layout';

type LabelData = Readonly<Record<string, Readonly<Record<string, string>>>>;

interface LabelTable {
  lookup(category: LabelCategory, code: number): string | undefined;
}

class JsonLabelTable implements LabelTable {
  constructor(private data: LabelData) {}

  lookup(category: LabelCategory, code: number): string | undefined {
    const names = this.data[category];
    return names === undefined ? undefined : names[String(code)];
  }
}

const DEFAULT_LABELS: LabelTable = new JsonLabelTable(defaultLabels);

/**
 * `"<code>:<LABEL>"` when the table knows the code, the bare code otherwise.
 */
function annotate(table: LabelTable, category: LabelCategory, code: number): string | number {
  const label = table.lookup(category, code);
  return label === undefined ? code : `${code}:${label}`;
}

export { JsonLabelTable, DEFAULT_LABELS, annotate };

export type { LabelTable, LabelData };

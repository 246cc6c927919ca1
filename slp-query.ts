// slp-query.ts - Generic node view of a Replay and the path query engine

import { SlpError } from './slp-errors';
import {
  START_LAYOUT,
  PLAYER_LAYOUT,
  PRE_LAYOUT,
  POST_LAYOUT,
  ITEM_LAYOUT,
  FRAME_START_LAYOUT,
  FRAME_END_LAYOUT,
  END_LAYOUT,
  formatVersion,
} from './slp-layout';
import type { FieldValue, Layout, LabelCategory } from './slp-layout';
import type { GameStart, GameEnd } from './slp-events';
import type { Replay, Frame, FrameData, Metadata, PlayerMetadata } from './slp-builder';

/**
 * Read-only tree every part of a Replay converts into, on demand, for
 * queries and rendering. Children are built when first asked for.
 */
type QueryNode =
  | { readonly kind: 'record'; readonly fields: readonly string[]; get(name: string): QueryNode | undefined }
  | { readonly kind: 'sequence'; readonly length: number; at(index: number): QueryNode }
  | { readonly kind: 'int'; readonly value: number; readonly label?: LabelCategory }
  | { readonly kind: 'float'; readonly value: number }
  | { readonly kind: 'bool'; readonly value: boolean }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'absent' };

type RecordNode = Extract<QueryNode, { kind: 'record' }>;
type SequenceNode = Extract<QueryNode, { kind: 'sequence' }>;

type Entry = readonly [string, () => QueryNode];

const ABSENT: QueryNode = Object.freeze({ kind: 'absent' });

// ============================================================================
// Node construction
// ============================================================================

function recordNode(entries: readonly Entry[]): RecordNode {
  const fields = entries.map(([name]) => name);
  return {
    kind: 'record',
    fields,
    get(name: string): QueryNode | undefined {
      const entry = entries.find(([field]) => field === name);
      return entry === undefined ? undefined : entry[1]();
    },
  };
}

function sequenceNode<T>(items: readonly T[], convert: (item: T) => QueryNode): SequenceNode {
  return {
    kind: 'sequence',
    length: items.length,
    at: (index: number) => convert(items[index]),
  };
}

function sequenceOf(nodes: readonly QueryNode[]): SequenceNode {
  return sequenceNode(nodes, node => node);
}

const intNode = (value: number, label?: LabelCategory): QueryNode =>
  label === undefined ? { kind: 'int', value } : { kind: 'int', value, label };
const stringNode = (value: string): QueryNode => ({ kind: 'string', value });
const optional = <T>(value: T | null, convert: (value: T) => QueryNode): QueryNode =>
  value === null ? ABSENT : convert(value);

function fieldEntries(layout: Layout, struct: Readonly<Record<string, FieldValue>>): Entry[] {
  return Object.entries(layout).map(([name, spec]): Entry => [
    name,
    () => {
      const value = struct[name];
      if (value === null || value === undefined) return ABSENT;
      if (typeof value === 'boolean') return { kind: 'bool', value };
      if (typeof value === 'string') return stringNode(value);
      return spec.type === 'f32' ? { kind: 'float', value } : intNode(value, spec.label);
    },
  ]);
}

function structNode(layout: Layout, struct: Readonly<Record<string, FieldValue>> | null): QueryNode {
  return struct === null ? ABSENT : recordNode(fieldEntries(layout, struct));
}

function startNode(start: GameStart): QueryNode {
  return recordNode([
    ['version', () => stringNode(formatVersion(start.version))],
    ...fieldEntries(START_LAYOUT, start.game),
    [
      'players',
      () =>
        sequenceNode(start.players, player =>
          recordNode([['port', () => intNode(player.port)], ...fieldEntries(PLAYER_LAYOUT, player)])
        ),
    ],
  ]);
}

function endNode(end: GameEnd | null): QueryNode {
  return end === null ? ABSENT : structNode(END_LAYOUT, end.fields);
}

function playerMetadataNode(player: PlayerMetadata): QueryNode {
  return recordNode([
    ['port', () => intNode(player.port)],
    ['frameCount', () => intNode(player.frameCount)],
    [
      'characters',
      () =>
        sequenceNode(player.characters, entry =>
          recordNode([
            ['character', () => intNode(entry.character, 'character')],
            ['frames', () => intNode(entry.frames)],
          ])
        ),
    ],
    [
      'netplay',
      () =>
        optional(player.netplay, netplay =>
          recordNode([
            ['name', () => stringNode(netplay.name)],
            ['code', () => stringNode(netplay.code)],
          ])
        ),
    ],
  ]);
}

function metadataNode(metadata: Metadata): QueryNode {
  return recordNode([
    ['startAt', () => optional(metadata.startAt, stringNode)],
    ['playedOn', () => optional(metadata.playedOn, stringNode)],
    ['consoleNick', () => optional(metadata.consoleNick, stringNode)],
    ['firstFrame', () => optional(metadata.firstFrame, value => intNode(value))],
    ['lastFrame', () => optional(metadata.lastFrame, value => intNode(value))],
    ['frameCount', () => intNode(metadata.frameCount)],
    ['rollbacks', () => intNode(metadata.rollbacks)],
    ['players', () => sequenceNode(metadata.players, playerMetadataNode)],
  ]);
}

function frameDataNode(data: FrameData): QueryNode {
  return recordNode([
    ['pre', () => structNode(PRE_LAYOUT, data.pre)],
    ['post', () => structNode(POST_LAYOUT, data.post)],
  ]);
}

function frameNode(frame: Frame): QueryNode {
  return recordNode([
    ['index', () => intNode(frame.index)],
    ['start', () => structNode(FRAME_START_LAYOUT, frame.start)],
    ['end', () => structNode(FRAME_END_LAYOUT, frame.end)],
    [
      'ports',
      () =>
        sequenceNode(frame.ports, port =>
          recordNode([
            ['port', () => intNode(port.port)],
            ['leader', () => frameDataNode(port.leader)],
            ['follower', () => optional(port.follower, frameDataNode)],
          ])
        ),
    ],
    ['items', () => sequenceNode(frame.items, item => structNode(ITEM_LAYOUT, item))],
  ]);
}

interface ReplayNodeOptions {
  /** Leave `frames` out of the tree. */
  short?: boolean;
}

/**
 * Root node: `start`, `end`, `metadata`, then `frames` unless short.
 */
function replayNode(replay: Replay, options: ReplayNodeOptions = {}): RecordNode {
  const entries: Entry[] = [
    ['hash', () => optional(replay.hash, stringNode)],
    ['start', () => startNode(replay.start)],
    ['end', () => endNode(replay.end)],
    ['metadata', () => metadataNode(replay.metadata)],
  ];
  if (!options.short) {
    entries.push(['frames', () => sequenceNode(replay.frames, frameNode)]);
  }
  return recordNode(entries);
}

// ============================================================================
// Path parsing
// ============================================================================

type Step =
  | { readonly kind: 'field'; readonly name: string }
  | { readonly kind: 'index'; readonly index: number }
  | { readonly kind: 'fan' };

interface Component {
  /** Source text, used to name the failing segment in errors. */
  readonly text: string;
  readonly steps: readonly Step[];
}

const NAME = /^[A-Za-z_][A-Za-z0-9_]*/;
const INDEX = /^\[(-?\d+)?\]/;

function parseComponent(text: string): Component {
  const steps: Step[] = [];
  let rest = text;
  const name = NAME.exec(rest);
  if (name) {
    steps.push({ kind: 'field', name: name[0] });
    rest = rest.slice(name[0].length);
  }
  while (rest.length > 0) {
    const index = INDEX.exec(rest);
    if (!index) {
      throw new SlpError('InvalidQuery', `cannot parse '${rest}'`, { segment: text });
    }
    steps.push(index[1] === undefined ? { kind: 'fan' } : { kind: 'index', index: Number(index[1]) });
    rest = rest.slice(index[0].length);
  }
  if (steps.length === 0) {
    throw new SlpError('InvalidQuery', 'empty path component', { segment: text });
  }
  return { text, steps };
}

/**
 * `path := component ('.' component)*`, `component := name? ('[' int? ']')*`.
 * The empty path selects the root.
 */
function parseQuery(path: string): Component[] {
  const trimmed = path.trim();
  if (trimmed === '') {
    return [];
  }
  return trimmed.split('.').map(parseComponent);
}

// ============================================================================
// Evaluation
// ============================================================================

interface PendingStep {
  readonly step: Step;
  readonly segment: string;
}

function walk(node: QueryNode, steps: readonly PendingStep[], position: number): QueryNode {
  if (position === steps.length || node.kind === 'absent') {
    return node;
  }
  const { step, segment } = steps[position];

  switch (step.kind) {
    case 'field': {
      if (node.kind !== 'record') {
        throw new SlpError('NoSuchField', `'${step.name}' on a ${node.kind}`, { segment });
      }
      const child = node.get(step.name);
      if (child === undefined) {
        throw new SlpError('NoSuchField', `no field '${step.name}'`, { segment });
      }
      return walk(child, steps, position + 1);
    }
    case 'index': {
      if (node.kind !== 'sequence') {
        throw new SlpError('NotASequence', `cannot index a ${node.kind}`, { segment });
      }
      const index = step.index < 0 ? node.length + step.index : step.index;
      if (index < 0 || index >= node.length) {
        throw new SlpError('IndexOutOfRange', `index ${step.index} of ${node.length} element(s)`, { segment });
      }
      return walk(node.at(index), steps, position + 1);
    }
    case 'fan': {
      if (node.kind !== 'sequence') {
        throw new SlpError('NotASequence', `cannot fan out over a ${node.kind}`, { segment });
      }
      const results: QueryNode[] = [];
      for (let i = 0; i < node.length; i++) {
        results.push(walk(node.at(i), steps, position + 1));
      }
      return sequenceOf(results);
    }
  }
}

/**
 * Evaluates a path against a node tree. `[]` fans the rest of the path over
 * every element; anything applied to an absent value stays absent.
 */
function evaluate(root: QueryNode, path: string): QueryNode {
  const steps = parseQuery(path).flatMap(component =>
    component.steps.map(step => ({ step, segment: component.text }))
  );
  return walk(root, steps, 0);
}

function queryReplay(replay: Replay, path: string): QueryNode {
  return evaluate(replayNode(replay), path);
}

export {
  ABSENT,
  recordNode,
  sequenceNode,
  sequenceOf,
  structNode,
  startNode,
  endNode,
  metadataNode,
  frameNode,
  replayNode,
  parseQuery,
  evaluate,
  queryReplay,
};

export type { QueryNode, RecordNode, SequenceNode, Step, Component, ReplayNodeOptions };

// slp-layout.ts - Versioned field layouts shared by every codec

import * as iconv from 'iconv-lite';
import { SlpError } from './slp-errors';

/**
 * Replay format version: major, minor, revision.
 */
type FormatVersion = readonly [number, number, number];

const V0_1: FormatVersion = [0, 1, 0];
const V0_2: FormatVersion = [0, 2, 0];
const V1_0: FormatVersion = [1, 0, 0];
const V1_2: FormatVersion = [1, 2, 0];
const V1_3: FormatVersion = [1, 3, 0];
const V1_4: FormatVersion = [1, 4, 0];
const V1_5: FormatVersion = [1, 5, 0];
const V2_0: FormatVersion = [2, 0, 0];
const V2_1: FormatVersion = [2, 1, 0];
const V2_2: FormatVersion = [2, 2, 0];
const V3_0: FormatVersion = [3, 0, 0];
const V3_2: FormatVersion = [3, 2, 0];
const V3_5: FormatVersion = [3, 5, 0];
const V3_6: FormatVersion = [3, 6, 0];
const V3_7: FormatVersion = [3, 7, 0];
const V3_8: FormatVersion = [3, 8, 0];
const V3_9: FormatVersion = [3, 9, 0];
const V3_10: FormatVersion = [3, 10, 0];
const V3_11: FormatVersion = [3, 11, 0];
const V3_12: FormatVersion = [3, 12, 0];
const V3_14: FormatVersion = [3, 14, 0];
const V3_15: FormatVersion = [3, 15, 0];

function compareVersions(a: FormatVersion, b: FormatVersion): number {
  for (let i = 0; i < 3; i++) {
    if (a[i] !== b[i]) {
      return a[i] - b[i];
    }
  }
  return 0;
}

function atLeast(version: FormatVersion, since: FormatVersion | undefined): boolean {
  return since === undefined || compareVersions(version, since) >= 0;
}

function formatVersion(version: FormatVersion): string {
  return version.join('.');
}

function parseVersion(text: string): FormatVersion {
  const match = /^(\d+)\.(\d+)\.(\d+)$/.exec(text.trim());
  if (!match) {
    throw new Error(`Invalid format version: '${text}'`);
  }
  return [Number(match[1]), Number(match[2]), Number(match[3])];
}

/**
 * Primitive Types
 */
type PrimitiveType =
  | 'u8'
  | 'i8'
  | 'u16'
  | 'i16'
  | 'u32'
  | 'i32'
  | 'f32'
  | 'bool'
  | 'flags40'
  | 'sjis';

/**
 * Categories understood by the label table
 */
type LabelCategory =
  | 'actionState'
  | 'character'
  | 'externalCharacter'
  | 'stage'
  | 'item'
  | 'endMethod'
  | 'hurtboxState';

/**
 * One fixed-offset field. Offsets count from the event's command byte, so
 * they match the published format tables.
 */
interface FieldSpec {
  readonly type: PrimitiveType;
  readonly offset: number;
  /** Version that introduced the field. */
  readonly since?: FormatVersion;
  /** Distance between per-player repetitions. */
  readonly stride?: number;
  /** Byte length, for `sjis`. */
  readonly size?: number;
  readonly label?: LabelCategory;
}

type Layout = Readonly<Record<string, FieldSpec>>;

type FieldValue = number | boolean | string | null;

type ScalarOf<S extends FieldSpec> =
  S['type'] extends 'bool' ? boolean :
  S['type'] extends 'sjis' ? string :
  number;

type ValueOf<S extends FieldSpec> =
  S extends { readonly since: FormatVersion } ? ScalarOf<S> | null : ScalarOf<S>;

/**
 * Plain struct decoded from a layout; version-gated fields may be `null`.
 */
type StructOf<L extends Layout> = { readonly [K in keyof L]: ValueOf<L[K]> };

// ============================================================================
// Layouts
// ============================================================================

const PORT_HEADER_LAYOUT = {
  frame: { type: 'i32', offset: 0x01 },
  port: { type: 'u8', offset: 0x05 },
  isFollower: { type: 'bool', offset: 0x06 },
} as const satisfies Layout;

const FRAME_HEADER_LAYOUT = {
  frame: { type: 'i32', offset: 0x01 },
} as const satisfies Layout;

const START_LAYOUT = {
  bitfield1: { type: 'u8', offset: 0x05 },
  bitfield2: { type: 'u8', offset: 0x06 },
  bitfield3: { type: 'u8', offset: 0x07 },
  bitfield4: { type: 'u8', offset: 0x08 },
  isRainingBombs: { type: 'bool', offset: 0x0b },
  isTeams: { type: 'bool', offset: 0x0d },
  itemSpawnFrequency: { type: 'i8', offset: 0x10 },
  selfDestructScore: { type: 'i8', offset: 0x11 },
  stage: { type: 'u16', offset: 0x13, label: 'stage' },
  timer: { type: 'u32', offset: 0x15 },
  itemSpawnBitfield1: { type: 'u8', offset: 0x28 },
  itemSpawnBitfield2: { type: 'u8', offset: 0x29 },
  itemSpawnBitfield3: { type: 'u8', offset: 0x2a },
  itemSpawnBitfield4: { type: 'u8', offset: 0x2b },
  itemSpawnBitfield5: { type: 'u8', offset: 0x2c },
  damageRatio: { type: 'f32', offset: 0x35 },
  randomSeed: { type: 'u32', offset: 0x13d },
  isPal: { type: 'bool', offset: 0x1a1, since: V1_5 },
  isFrozenPs: { type: 'bool', offset: 0x1a2, since: V2_0 },
  sceneMinor: { type: 'u8', offset: 0x1a3, since: V3_7 },
  sceneMajor: { type: 'u8', offset: 0x1a4, since: V3_7 },
  language: { type: 'u8', offset: 0x2bd, since: V3_12 },
  matchId: { type: 'sjis', offset: 0x2be, size: 51, since: V3_14 },
  gameNumber: { type: 'u32', offset: 0x2f1, since: V3_14 },
  tiebreakerNumber: { type: 'u32', offset: 0x2f5, since: V3_14 },
} as const satisfies Layout;

const PLAYER_LAYOUT = {
  character: { type: 'u8', offset: 0x65, stride: 0x24, label: 'externalCharacter' },
  type: { type: 'u8', offset: 0x66, stride: 0x24 },
  stocks: { type: 'u8', offset: 0x67, stride: 0x24 },
  costume: { type: 'u8', offset: 0x68, stride: 0x24 },
  teamShade: { type: 'u8', offset: 0x6c, stride: 0x24 },
  handicap: { type: 'u8', offset: 0x6d, stride: 0x24 },
  teamId: { type: 'u8', offset: 0x6e, stride: 0x24 },
  bitfield: { type: 'u8', offset: 0x71, stride: 0x24 },
  cpuLevel: { type: 'u8', offset: 0x74, stride: 0x24 },
  offenseRatio: { type: 'f32', offset: 0x7d, stride: 0x24 },
  defenseRatio: { type: 'f32', offset: 0x81, stride: 0x24 },
  modelScale: { type: 'f32', offset: 0x85, stride: 0x24 },
  ucfDashBack: { type: 'u32', offset: 0x141, stride: 0x08, since: V1_0 },
  ucfShieldDrop: { type: 'u32', offset: 0x145, stride: 0x08, since: V1_0 },
  nameTag: { type: 'sjis', offset: 0x161, stride: 0x10, size: 16, since: V1_3 },
  displayName: { type: 'sjis', offset: 0x1a5, stride: 0x1f, size: 31, since: V3_9 },
  connectCode: { type: 'sjis', offset: 0x221, stride: 0x0a, size: 10, since: V3_9 },
  slippiUid: { type: 'sjis', offset: 0x249, stride: 0x1d, size: 29, since: V3_11 },
} as const satisfies Layout;

const PRE_LAYOUT = {
  randomSeed: { type: 'u32', offset: 0x07 },
  state: { type: 'u16', offset: 0x0b, label: 'actionState' },
  positionX: { type: 'f32', offset: 0x0d },
  positionY: { type: 'f32', offset: 0x11 },
  direction: { type: 'f32', offset: 0x15 },
  joystickX: { type: 'f32', offset: 0x19 },
  joystickY: { type: 'f32', offset: 0x1d },
  cstickX: { type: 'f32', offset: 0x21 },
  cstickY: { type: 'f32', offset: 0x25 },
  triggersLogical: { type: 'f32', offset: 0x29 },
  buttonsLogical: { type: 'u32', offset: 0x2d },
  buttonsPhysical: { type: 'u16', offset: 0x31 },
  triggersPhysicalL: { type: 'f32', offset: 0x33 },
  triggersPhysicalR: { type: 'f32', offset: 0x37 },
  rawAnalogX: { type: 'i8', offset: 0x3b, since: V1_2 },
  percent: { type: 'f32', offset: 0x3c, since: V1_4 },
  rawAnalogY: { type: 'i8', offset: 0x40, since: V3_15 },
} as const satisfies Layout;

const POST_LAYOUT = {
  character: { type: 'u8', offset: 0x07, label: 'character' },
  state: { type: 'u16', offset: 0x08, label: 'actionState' },
  positionX: { type: 'f32', offset: 0x0a },
  positionY: { type: 'f32', offset: 0x0e },
  direction: { type: 'f32', offset: 0x12 },
  percent: { type: 'f32', offset: 0x16 },
  shield: { type: 'f32', offset: 0x1a },
  lastAttackLanded: { type: 'u8', offset: 0x1e },
  comboCount: { type: 'u8', offset: 0x1f },
  lastHitBy: { type: 'u8', offset: 0x20 },
  stocks: { type: 'u8', offset: 0x21 },
  stateAge: { type: 'f32', offset: 0x22, since: V0_2 },
  flags: { type: 'flags40', offset: 0x26, since: V2_0 },
  miscAs: { type: 'f32', offset: 0x2b, since: V2_0 },
  airborne: { type: 'bool', offset: 0x2f, since: V2_0 },
  ground: { type: 'u16', offset: 0x30, since: V2_0 },
  jumps: { type: 'u8', offset: 0x32, since: V2_0 },
  lCancel: { type: 'u8', offset: 0x33, since: V2_0 },
  hurtboxState: { type: 'u8', offset: 0x34, since: V2_1, label: 'hurtboxState' },
  velocityAirX: { type: 'f32', offset: 0x35, since: V3_5 },
  velocityY: { type: 'f32', offset: 0x39, since: V3_5 },
  knockbackX: { type: 'f32', offset: 0x3d, since: V3_5 },
  knockbackY: { type: 'f32', offset: 0x41, since: V3_5 },
  velocityGroundX: { type: 'f32', offset: 0x45, since: V3_5 },
  hitlag: { type: 'f32', offset: 0x49, since: V3_8 },
  animationIndex: { type: 'u32', offset: 0x4d, since: V3_11 },
} as const satisfies Layout;

const ITEM_LAYOUT = {
  type: { type: 'u16', offset: 0x05, label: 'item' },
  state: { type: 'u8', offset: 0x07 },
  direction: { type: 'f32', offset: 0x08 },
  velocityX: { type: 'f32', offset: 0x0c },
  velocityY: { type: 'f32', offset: 0x10 },
  positionX: { type: 'f32', offset: 0x14 },
  positionY: { type: 'f32', offset: 0x18 },
  damage: { type: 'u16', offset: 0x1c },
  timer: { type: 'f32', offset: 0x1e },
  id: { type: 'u32', offset: 0x22 },
  misc: { type: 'u32', offset: 0x26, since: V3_2 },
  owner: { type: 'i8', offset: 0x2a, since: V3_6 },
} as const satisfies Layout;

const FRAME_START_LAYOUT = {
  randomSeed: { type: 'u32', offset: 0x05 },
  sceneFrameCounter: { type: 'u32', offset: 0x09, since: V3_10 },
} as const satisfies Layout;

const FRAME_END_LAYOUT = {
  latestFinalizedFrame: { type: 'i32', offset: 0x05, since: V3_7 },
} as const satisfies Layout;

const END_LAYOUT = {
  method: { type: 'u8', offset: 0x01, label: 'endMethod' },
  lrasInitiator: { type: 'i8', offset: 0x02, since: V2_0 },
} as const satisfies Layout;

// ============================================================================
// Field codec
// ============================================================================

function fieldWidth(spec: FieldSpec): number {
  switch (spec.type) {
    case 'u8':
    case 'i8':
    case 'bool':
      return 1;
    case 'u16':
    case 'i16':
      return 2;
    case 'u32':
    case 'i32':
    case 'f32':
      return 4;
    case 'flags40':
      return 5;
    case 'sjis':
      return spec.size ?? 0;
  }
}

function fieldOffset(spec: FieldSpec, index: number): number {
  return spec.offset + (spec.stride ?? 0) * index;
}

/**
 * Smallest event length (command byte included) that holds every field the
 * given version carries, for `slots` repetitions of strided fields.
 */
function requiredLength(layout: Layout, version: FormatVersion, slots: number = 1): number {
  let length = 1;
  for (const spec of Object.values(layout)) {
    if (atLeast(version, spec.since)) {
      length = Math.max(length, fieldOffset(spec, slots - 1) + fieldWidth(spec));
    }
  }
  return length;
}

function readField(view: DataView, spec: FieldSpec, index: number): number | boolean | string {
  const at = fieldOffset(spec, index);
  switch (spec.type) {
    case 'u8':
      return view.getUint8(at);
    case 'i8':
      return view.getInt8(at);
    case 'u16':
      return view.getUint16(at);
    case 'i16':
      return view.getInt16(at);
    case 'u32':
      return view.getUint32(at);
    case 'i32':
      return view.getInt32(at);
    case 'f32':
      return view.getFloat32(at);
    case 'bool':
      return view.getUint8(at) !== 0;
    case 'flags40':
      return view.getUint8(at) * 0x1_0000_0000 + view.getUint32(at + 1);
    case 'sjis': {
      const raw = new Uint8Array(view.buffer, view.byteOffset + at, fieldWidth(spec));
      const end = raw.indexOf(0);
      return iconv.decode(Buffer.from(end === -1 ? raw : raw.subarray(0, end)), 'Shift_JIS');
    }
  }
}

function writeField(view: DataView, spec: FieldSpec, index: number, value: number | boolean | string): void {
  const at = fieldOffset(spec, index);
  if (spec.type === 'sjis') {
    if (typeof value !== 'string') {
      throw new Error(`Expected string for sjis field, got ${typeof value}`);
    }
    const encoded = iconv.encode(value, 'Shift_JIS');
    const target = new Uint8Array(view.buffer, view.byteOffset + at, fieldWidth(spec));
    target.fill(0);
    // keep the terminating NUL
    target.set(encoded.subarray(0, Math.max(0, target.length - 1)));
    return;
  }
  if (spec.type === 'bool') {
    view.setUint8(at, value === true ? 1 : 0);
    return;
  }
  if (typeof value !== 'number') {
    throw new Error(`Expected number for ${spec.type} field, got ${typeof value}`);
  }
  switch (spec.type) {
    case 'u8':
      view.setUint8(at, value);
      break;
    case 'i8':
      view.setInt8(at, value);
      break;
    case 'u16':
      view.setUint16(at, value);
      break;
    case 'i16':
      view.setInt16(at, value);
      break;
    case 'u32':
      view.setUint32(at, value);
      break;
    case 'i32':
      view.setInt32(at, value);
      break;
    case 'f32':
      view.setFloat32(at, value);
      break;
    case 'flags40':
      view.setUint8(at, Math.floor(value / 0x1_0000_0000) & 0xff);
      view.setUint32(at + 1, value % 0x1_0000_0000);
      break;
  }
}

function matchesSpec(spec: FieldSpec, value: FieldValue | undefined): boolean {
  if (value === undefined) return false;
  if (value === null) return spec.since !== undefined;
  switch (spec.type) {
    case 'bool':
      return typeof value === 'boolean';
    case 'sjis':
      return typeof value === 'string';
    default:
      return typeof value === 'number';
  }
}

function conformsTo<L extends Layout>(
  layout: L,
  values: Record<string, FieldValue>
): values is Record<string, FieldValue> & StructOf<L> {
  return Object.entries<FieldSpec>(layout).every(([name, spec]) => matchesSpec(spec, values[name]));
}

/**
 * Builds a frozen struct from per-field values. Fields newer than `version`
 * are `null`; `read` is asked for the rest.
 */
function buildStruct<L extends Layout>(
  layout: L,
  version: FormatVersion,
  read: (name: string, spec: FieldSpec) => FieldValue
): StructOf<L> {
  const values: Record<string, FieldValue> = {};
  for (const [name, spec] of Object.entries<FieldSpec>(layout)) {
    values[name] = atLeast(version, spec.since) ? read(name, spec) : null;
  }
  if (!conformsTo(layout, values)) {
    throw new SlpError('InvariantViolation', 'struct does not match its layout');
  }
  Object.freeze(values);
  return values;
}

/**
 * Applies a layout to one event buffer. Fields newer than `version` decode
 * to `null`. The caller checks the buffer against `requiredLength` first.
 */
function decodeStruct<L extends Layout>(
  layout: L,
  view: DataView,
  version: FormatVersion,
  index: number = 0
): StructOf<L> {
  return buildStruct(layout, version, (_name, spec) => readField(view, spec, index));
}

function encodeStruct(
  layout: Layout,
  struct: Readonly<Record<string, FieldValue>>,
  view: DataView,
  version: FormatVersion,
  index: number = 0
): void {
  for (const [name, spec] of Object.entries(layout)) {
    if (!atLeast(version, spec.since)) {
      continue;
    }
    const value = struct[name];
    if (value === null || value === undefined) {
      throw new Error(`Field '${name}' is required by version ${formatVersion(version)}`);
    }
    writeField(view, spec, index, value);
  }
}

/**
 * Fields of a layout that a given version carries, in declaration order.
 */
function presentFields(layout: Layout, version: FormatVersion): [string, FieldSpec][] {
  return Object.entries(layout).filter(([, spec]) => atLeast(version, spec.since));
}

export {
  V0_1,
  V0_2,
  V1_0,
  V1_2,
  V1_3,
  V1_4,
  V1_5,
  V2_0,
  V2_1,
  V2_2,
  V3_0,
  V3_2,
  V3_5,
  V3_6,
  V3_7,
  V3_8,
  V3_9,
  V3_10,
  V3_11,
  V3_12,
  V3_14,
  V3_15,
  PORT_HEADER_LAYOUT,
  FRAME_HEADER_LAYOUT,
  START_LAYOUT,
  PLAYER_LAYOUT,
  PRE_LAYOUT,
  POST_LAYOUT,
  ITEM_LAYOUT,
  FRAME_START_LAYOUT,
  FRAME_END_LAYOUT,
  END_LAYOUT,
  compareVersions,
  atLeast,
  formatVersion,
  parseVersion,
  fieldWidth,
  requiredLength,
  readField,
  writeField,
  buildStruct,
  decodeStruct,
  encodeStruct,
  presentFields,
};

export type {
  FormatVersion,
  PrimitiveType,
  LabelCategory,
  FieldSpec,
  Layout,
  FieldValue,
  StructOf,
};

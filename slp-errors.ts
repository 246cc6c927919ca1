// slp-errors.ts - Error taxonomy for decoding and querying replays

type SlpErrorCode =
  | 'MalformedHeader'
  | 'UnknownEventCode'
  | 'TruncatedStream'
  | 'MalformedEvent'
  | 'FrameOrder'
  | 'InvariantViolation'
  | 'NoSuchField'
  | 'IndexOutOfRange'
  | 'NotASequence'
  | 'InvalidQuery';

interface SlpErrorContext {
  offset?: number;
  eventCode?: number;
  segment?: string;
  frame?: number;
}

function hex(value: number): string {
  return `0x${value.toString(16)}`;
}

function describeContext(context: SlpErrorContext): string {
  const parts: string[] = [];
  if (context.offset !== undefined) parts.push(`offset ${hex(context.offset)}`);
  if (context.eventCode !== undefined) parts.push(`event ${hex(context.eventCode)}`);
  if (context.frame !== undefined) parts.push(`frame ${context.frame}`);
  if (context.segment !== undefined) parts.push(`segment '${context.segment}'`);
  return parts.length > 0 ? ` (${parts.join(', ')})` : '';
}

/**
 * Every failure raised by the decoder, builder and query engine.
 *
 * Decode-time errors that the stream can recover from are collected on
 * `Replay.errors` instead of being thrown.
 */
class SlpError extends Error {
  readonly code: SlpErrorCode;
  readonly context: SlpErrorContext;

  constructor(code: SlpErrorCode, message: string, context: SlpErrorContext = {}) {
    super(`${code}: ${message}${describeContext(context)}`);
    this.name = 'SlpError';
    this.code = code;
    this.context = context;
  }
}

function isSlpError(err: unknown, code?: SlpErrorCode): err is SlpError {
  return err instanceof SlpError && (code === undefined || err.code === code);
}

export { SlpError, isSlpError, hex };

export type { SlpErrorCode, SlpErrorContext };

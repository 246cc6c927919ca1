#!/usr/bin/env node

// slp-cli.ts

import * as fs from 'fs';
import { SlpDecoder, SlpEncoder, decodeReplay, contentHash } from './slp';
import { isSlpError } from './slp-errors';
import { formatVersion } from './slp-layout';
import { encodeJson, queryJson } from './slp-json';
import { encodeColumnar, readColumnar } from './slp-columnar';
import { DirectoryArchiveWriter, TarArchiveWriter, readArchive } from './slp-archive';
import type { ArchiveWriter, Compression } from './slp-archive';
import { DEFAULT_LABELS } from './slp-labels';
import type { LabelTable } from './slp-labels';
import type { Replay } from './slp-builder';

// ============================================================================
// CLI Configuration
// ============================================================================

const FORMATS = ['json', 'arrow', 'slp', 'null'] as const;
const CONTAINERS = ['tar', 'dir'] as const;

type OutputFormat = (typeof FORMATS)[number];
type ContainerKind = (typeof CONTAINERS)[number];

interface CliOptions {
  input?: string;
  output?: string;
  format?: OutputFormat;
  queries?: string[];
  quiet?: boolean;
  names?: boolean;
  short?: boolean;
  container?: ContainerKind;
  compression?: Compression;
  noVerify?: boolean;
  verbose?: boolean;
}

interface ParsedArgs {
  command: string;
  options: CliOptions;
}

class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

// ============================================================================
// Command Handlers
// ============================================================================

class SlpCli {
  private options: CliOptions;

  constructor(options: CliOptions) {
    this.options = {
      format: 'json',
      queries: [],
      quiet: false,
      names: false,
      short: false,
      container: 'tar',
      compression: null,
      noVerify: false,
      verbose: false,
      ...options,
    };
  }

  private get labels(): LabelTable | null {
    return this.options.names ? DEFAULT_LABELS : null;
  }

  private readInputFile(): Uint8Array {
    const input = this.options.input;
    if (!input) {
      return this.error('--input is required');
    }
    if (!fs.existsSync(input)) {
      return this.error(`File not found: ${input}`);
    }
    return fs.readFileSync(input);
  }

  /** `skipFrames` is for commands whose output leaves frames out. */
  private decode(skipFrames: boolean = false): Replay {
    const replay = new SlpDecoder(this.readInputFile(), {
      verbose: this.options.verbose,
      skipFrames,
      computeHash: true,
    }).decode();
    for (const err of replay.errors) {
      if (err.code !== 'FrameOrder' || this.options.verbose) {
        this.warn(err.message);
      }
    }
    return replay;
  }

  private writeText(text: string): void {
    if (this.options.output) {
      fs.writeFileSync(this.options.output, text, 'utf8');
      this.success(`Exported to ${this.options.output}`);
    } else {
      console.log(text);
    }
  }

  /**
   * Summary of a replay
   */
  async parse(): Promise<void> {
    const replay = this.decode();
    const { start, metadata } = replay;
    const labels = DEFAULT_LABELS;

    this.log('=== SLP REPLAY INSPECTOR ===\n');
    this.log(`Version:    ${formatVersion(replay.version)}`);
    this.log(`Stage:      ${this.named(labels.lookup('stage', start.game.stage), start.game.stage)}`);
    this.log(`Frames:     ${metadata.frameCount} (${metadata.firstFrame ?? '-'} .. ${metadata.lastFrame ?? '-'})`);
    this.log(`Rollbacks:  ${metadata.rollbacks}`);
    if (metadata.startAt !== null) {
      this.log(`Started:    ${metadata.startAt}`);
    }
    if (replay.end !== null) {
      const method = replay.end.fields.method;
      this.log(`End:        ${this.named(labels.lookup('endMethod', method), method)}`);
    } else {
      this.warn('No end event');
    }
    if (replay.partial) {
      this.warn('Replay is partial');
    }

    this.log('\nPlayers:');
    for (const player of start.players) {
      const meta = metadata.players.find(p => p.port === player.port);
      const character = labels.lookup('externalCharacter', player.character);
      const netplay = meta?.netplay ? ` ${this.colorize(`${meta.netplay.name} (${meta.netplay.code})`, 'cyan')}` : '';
      this.log(`  P${player.port}: ${this.named(character, player.character)}${netplay}`);
      for (const entry of meta?.characters ?? []) {
        const name = labels.lookup('character', entry.character);
        this.log(`      ${this.named(name, entry.character)}: ${entry.frames} frame(s)`);
      }
    }
  }

  async export(): Promise<void> {
    const replay = this.decode(this.options.short);
    this.writeText(encodeJson(replay, { names: this.labels, short: this.options.short }));
  }

  /**
   * Runs every `-q` path; a failing query is reported and the rest still run.
   * Returns the number of failed queries.
   */
  async query(): Promise<number> {
    const queries = this.options.queries ?? [];
    if (queries.length === 0) {
      return this.error('--query is required');
    }
    const replay = this.decode();
    const lines: string[] = [];
    let failures = 0;

    for (const path of queries) {
      try {
        lines.push(queryJson(replay, path, { names: this.labels, quiet: this.options.quiet }));
      } catch (err: unknown) {
        if (!isSlpError(err)) {
          throw err;
        }
        failures++;
        console.error(this.colorize(`✗ ${err.message}`, 'red'));
      }
    }

    if (lines.length > 0) {
      this.writeText(lines.join('\n'));
    }
    return failures;
  }

  async convert(): Promise<void> {
    switch (this.options.format) {
      case 'json':
      case undefined:
        return this.export();
      case 'null': {
        const replay = this.decode(this.options.short);
        this.success(`Decoded ${replay.frames.length} frame(s)`);
        return;
      }
      case 'slp': {
        const output = this.requireOutput();
        const replay = this.decode(this.options.short);
        fs.writeFileSync(output, new SlpEncoder().encode(replay));
        this.success(`Wrote ${output}`);
        await this.verify(replay, async () => decodeReplay(fs.readFileSync(output)));
        return;
      }
      case 'arrow': {
        const output = this.requireOutput();
        const replay = this.decode(this.options.short);
        await encodeColumnar(replay, this.archiveWriter(output));
        this.success(`Wrote ${output}`);
        await this.verify(replay, async () => readColumnar(await readArchive(output)));
        return;
      }
    }
  }

  private noVerifyReason(): string | null {
    if (this.options.noVerify) {
      return '--no-verify';
    }
    if (this.options.short) {
      this.warn('Frames were skipped (--short)');
      return '--short';
    }
    return null;
  }

  /**
   * Reads the written output back and compares its event stream with the
   * one just converted.
   */
  private async verify(replay: Replay, readBack: () => Promise<Replay>): Promise<void> {
    const reason = this.noVerifyReason();
    if (reason !== null) {
      this.info(`Skipping round-trip verification (${reason})`);
      return;
    }
    const expected = contentHash(replay);
    const actual = contentHash(await readBack());
    this.info(`Input hash: ${replay.hash ?? '-'}`);
    this.info(`Round-trip hash: ${actual}`);
    if (actual !== expected) {
      return this.error(`Round-trip verification error (hash: ${replay.hash ?? expected})`);
    }
    this.success('Verified output');
  }

  private requireOutput(): string {
    return this.options.output ?? this.error('--output is required for this format');
  }

  private archiveWriter(output: string): ArchiveWriter {
    if (this.options.container === 'dir') {
      if (this.options.compression !== null) {
        this.warn('Compression is ignored for directory output');
      }
      return new DirectoryArchiveWriter(output);
    }
    return new TarArchiveWriter(output, this.options.compression ?? null);
  }

  private named(label: string | undefined, code: number): string {
    return label === undefined ? String(code) : `${this.colorize(label, 'yellow')} (${code})`;
  }

  private colorize(text: string, color: string): string {
    const colors: Record<string, string> = {
      reset: '\x1b[0m',
      red: '\x1b[31m',
      green: '\x1b[32m',
      yellow: '\x1b[33m',
      blue: '\x1b[34m',
      magenta: '\x1b[35m',
      cyan: '\x1b[36m',
    };

    return `${colors[color] || ''}${text}${colors.reset}`;
  }

  private log(message: string): void {
    console.log(message);
  }

  private success(message: string): void {
    console.error(this.colorize(`✓ ${message}`, 'green'));
  }

  private info(message: string): void {
    if (this.options.verbose) {
      console.error(message);
    }
  }

  private warn(message: string): void {
    console.warn(this.colorize(`⚠ ${message}`, 'yellow'));
  }

  private error(message: string): never {
    throw new CliUsageError(message);
  }
}

// ============================================================================
// Main CLI Entry Point
// ============================================================================

function printHelp(): void {
  console.log(`
SLP CLI - Slippi replay inspector and converter
===============================================

USAGE:
  slp <command> [options]

COMMANDS:
  parse              Summarize a replay
  export             Export the replay as JSON
  query              Evaluate one or more path queries
  convert            Convert to another format (see --format)
  help               Show this help

OPTIONS:
  -i, --input <file>         Input .slp file (required)
  -o, --output <path>        Output file (or directory with --container dir)
  -f, --format <format>      json, arrow, slp, null (default: json)
  -q, --query <path>         Path query, repeatable (e.g. frames[-1].ports[].leader.post.state)
  --quiet                    Unwrap single-element results, no {path: ...} wrapper
  -n, --names                Annotate codes with names ("14:WAIT")
  -s, --short                Skip frames when reading (start, end, metadata only)
  --container <kind>         Archive container for arrow: tar, dir (default: tar)
  -c, --compression <kind>   Compress the tar container: gzip
  --no-verify                Skip reading converted slp/arrow output back
  --verbose                  Verbose output

EXAMPLES:
  slp parse -i game.slp
  slp export -i game.slp -o game.json --short --names
  slp query -i game.slp -q metadata.frameCount -q "frames[-1].ports[].leader.post.state"
  slp convert -i game.slp -f arrow -o game.tar.gz -c gzip
`);
}

function oneOf<T extends string>(choices: readonly T[], value: string, flag: string): T {
  const match = choices.find(choice => choice === value);
  if (match === undefined) {
    throw new CliUsageError(`Invalid value for ${flag}: '${value}' (expected ${choices.join(', ')})`);
  }
  return match;
}

function parseArgs(args: string[]): ParsedArgs {
  const command = args[0] ?? 'help';
  const options: CliOptions = {};

  const next = (i: number, flag: string): string => {
    const value = args[i];
    if (value === undefined) {
      throw new CliUsageError(`Missing value for ${flag}`);
    }
    return value;
  };

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '-i':
      case '--input':
        options.input = next(++i, arg);
        break;
      case '-o':
      case '--output':
        options.output = next(++i, arg);
        break;
      case '-f':
      case '--format':
        options.format = oneOf(FORMATS, next(++i, arg), arg);
        break;
      case '-q':
      case '--query':
        options.queries = [...(options.queries ?? []), next(++i, arg)];
        break;
      case '--quiet':
        options.quiet = true;
        break;
      case '-n':
      case '--names':
        options.names = true;
        break;
      case '-s':
      case '--short':
        options.short = true;
        break;
      case '--container':
        options.container = oneOf(CONTAINERS, next(++i, arg), arg);
        break;
      case '-c':
      case '--compression':
        options.compression = oneOf(['gzip'] as const, next(++i, arg), arg);
        break;
      case '--no-verify':
        options.noVerify = true;
        break;
      case '--verbose':
        options.verbose = true;
        break;
      default:
        throw new CliUsageError(`Unknown option: ${arg}`);
    }
  }

  return { command, options };
}

/**
 * Runs one command line; resolves to the process exit code.
 */
async function main(args: string[]): Promise<number> {
  if (args.length === 0 || args[0] === 'help' || args[0] === '--help' || args[0] === '-h') {
    printHelp();
    return 0;
  }

  let verbose = false;
  try {
    const { command, options } = parseArgs(args);
    verbose = options.verbose ?? false;
    const cli = new SlpCli(options);

    switch (command) {
      case 'parse':
        await cli.parse();
        return 0;
      case 'export':
        await cli.export();
        return 0;
      case 'query':
        return (await cli.query()) > 0 ? 1 : 0;
      case 'convert':
        await cli.convert();
        return 0;
      default:
        console.error(`Unknown command: ${command}`);
        printHelp();
        return 1;
    }
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`\x1b[31m✗ ${message}\x1b[0m`);
    if (verbose && err instanceof Error && err.stack) {
      console.error(err.stack);
    }
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    }
  );
}

export { SlpCli, CliUsageError, parseArgs, main };

export type { CliOptions, ParsedArgs, OutputFormat, ContainerKind };

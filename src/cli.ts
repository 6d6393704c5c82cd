#!/usr/bin/env node
import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { realpathSync } from 'node:fs';
import { createRequire } from 'node:module';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { isElf } from './elf/parseElf.js';
import { AddDataError } from './errors.js';
import { detectFormat } from './formats/detect.js';
import type { HeaderEncoding } from './formats/header.js';
import { DEFAULT_HEADER_ENCODING, parseHeaderEncoding } from './formats/header.js';
import type { Artifact, InputFormat, OutputFormat, TextFormatKind } from './formats/types.js';
import { MemoryImage } from './image.js';

type CliExit = { code: number };

type InputSelection = InputFormat | { kind: 'auto' };

type GlobalOptions = {
  wordSizeBits: number;
  headerEncoding: HeaderEncoding;
};

type Command =
  | { name: 'info'; files: string[] }
  | {
      name: 'convert';
      input: InputSelection;
      output: OutputFormat;
      executionStartAddress?: number;
      overwrite: boolean;
      infiles: string[];
      outfile: string;
    }
  | { name: 'as'; output: OutputFormat; files: string[] }
  | { name: 'fill'; value?: number; maxWords?: number; infile: string; outfile: string };

type CliOptions = GlobalOptions & { command: Command };

const AS_COMMANDS: Record<string, OutputFormat> = {
  as_srec: { kind: 'srec' },
  as_ihex: { kind: 'ihex' },
  as_hexdump: { kind: 'hexdump' },
  as_ti_txt: { kind: 'ti_txt' },
  as_verilog_vmem: { kind: 'verilog_vmem' },
};

const OVERLAP_MESSAGE =
  'overlapping segments detected, give --overwrite to overwrite overlapping segments';

function usage(): string {
  return [
    'binsplice [global options] <command> [options] <file>...',
    '',
    'Commands:',
    '  info <file>...                       Print header, start address and data ranges',
    '  convert [options] <infile>... <outfile|->',
    '                                       Merge infiles and write them in one format',
    '  as_srec|as_ihex|as_hexdump|as_ti_txt|as_verilog_vmem <file>...',
    '                                       Print files in the given format',
    '  fill [options] <infile> [<outfile|->] Fill gaps between segments',
    '',
    'Global options:',
    '      --word-size-bits <n>    Bits per word, a multiple of 8 (default: 8)',
    '      --header-encoding <e>   Header codec: utf8|ascii|latin1|utf16le|none (default: utf8)',
    '  -V, --version               Print version',
    '  -h, --help                  Show help',
    '',
    'convert options:',
    '  -i, --input-format <f>      auto|srec|ihex|ti_txt|verilog_vmem|binary[,address]|elf',
    '                              (default: auto)',
    '  -o, --output-format <f>     srec[,bytes[,bits]]|ihex[,bytes[,bits]]|ti_txt|verilog_vmem|',
    '                              binary[,min[,max]]|hexdump|array (default: hexdump)',
    '  -s, --execution-start-address <n>  Set the execution start address',
    '      --overwrite             Let later data overwrite earlier data',
    '',
    'fill options:',
    '      --value <n>             Fill word value (default: all bits set)',
    '      --max-words <n>         Only fill gaps of at most this many words',
    '',
    'Numbers are decimal or 0x-prefixed hexadecimal. An output file of "-" is stdout.',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function isCliError(err: unknown): err is Error {
  return err instanceof Error && err.name === 'CliError';
}

function parseNumber(option: string, text: string): number {
  if (!/^(?:0x[0-9a-f]+|\d+)$/i.test(text)) {
    fail(`${option} expects a non-negative integer, but got "${text}"`);
  }
  return Number(text);
}

/**
 * Value of `--name value` or `--name=value`. Advances `state.i` past a separate value.
 */
function optionValue(argv: string[], state: { i: number }, arg: string, long: string): string {
  if (arg.startsWith(`${long}=`)) {
    const v = arg.slice(long.length + 1);
    if (!v) fail(`${long} expects a value`);
    return v;
  }
  const v = argv[++state.i];
  if (v === undefined || v === '') fail(`${arg} expects a value`);
  return v;
}

function matches(arg: string, long: string, short?: string): boolean {
  return arg === long || arg === short || arg.startsWith(`${long}=`);
}

const PLAIN_INPUTS = ['auto', 'srec', 'ihex', 'ti_txt', 'verilog_vmem', 'elf'] as const;
const RECORD_OUTPUTS = ['srec', 'ihex'] as const;
const WINDOW_OUTPUTS = ['binary', 'array'] as const;
const PLAIN_OUTPUTS = ['ti_txt', 'verilog_vmem', 'hexdump'] as const;

function isOneOf<T extends string>(values: readonly T[], text: string | undefined): text is T {
  return values.some((v) => v === text);
}

function parseInputFormat(text: string): InputSelection {
  const [kind, ...rest] = text.split(',');
  if (isOneOf(PLAIN_INPUTS, kind)) {
    if (rest.length > 0) fail(`input format "${kind}" takes no arguments`);
    return { kind };
  }
  if (kind === 'binary') {
    if (rest.length > 1) fail('input format "binary" takes at most an address');
    const address = rest[0];
    return {
      kind: 'binary',
      address: address === undefined ? 0 : parseNumber('binary address', address),
    };
  }
  return fail(
    `Unsupported input format "${text}" ` +
      '(expected auto|srec|ihex|ti_txt|verilog_vmem|binary[,address]|elf)',
  );
}

function parseOutputFormat(text: string): OutputFormat {
  const [kind, ...rest] = text.split(',');
  const numbers = rest.map((r) => parseNumber(`output format "${kind ?? ''}"`, r));
  if (isOneOf(RECORD_OUTPUTS, kind)) {
    if (numbers.length > 2) fail(`output format "${kind}" takes at most bytes and bits`);
    const [numberOfDataBytes, addressLengthBits] = numbers;
    return { kind, numberOfDataBytes, addressLengthBits };
  }
  if (isOneOf(WINDOW_OUTPUTS, kind)) {
    if (numbers.length > 2) fail(`output format "${kind}" takes at most min and max`);
    const [minimumAddress, maximumAddress] = numbers;
    return { kind, minimumAddress, maximumAddress };
  }
  if (isOneOf(PLAIN_OUTPUTS, kind)) {
    if (numbers.length > 0) fail(`output format "${kind}" takes no arguments`);
    return { kind };
  }
  return fail(
    `Unsupported output format "${text}" ` +
      '(expected srec|ihex|ti_txt|verilog_vmem|binary|hexdump|array)',
  );
}

function parseConvert(argv: string[]): Command {
  let input: InputSelection = { kind: 'auto' };
  let output: OutputFormat = { kind: 'hexdump' };
  let executionStartAddress: number | undefined;
  let overwrite = false;
  const files: string[] = [];

  const state = { i: 0 };
  for (; state.i < argv.length; state.i++) {
    const a = argv[state.i] ?? '';
    if (matches(a, '--input-format', '-i')) {
      input = parseInputFormat(optionValue(argv, state, a, '--input-format'));
      continue;
    }
    if (matches(a, '--output-format', '-o')) {
      output = parseOutputFormat(optionValue(argv, state, a, '--output-format'));
      continue;
    }
    if (matches(a, '--execution-start-address', '-s')) {
      executionStartAddress = parseNumber(
        '--execution-start-address',
        optionValue(argv, state, a, '--execution-start-address'),
      );
      continue;
    }
    if (a === '--overwrite') {
      overwrite = true;
      continue;
    }
    if (a.startsWith('-') && a !== '-') fail(`Unknown option "${a}"`);
    files.push(a);
  }

  const outfile = files.pop();
  if (outfile === undefined || files.length === 0) {
    fail('convert expects at least one <infile> and an <outfile>');
  }
  return {
    name: 'convert',
    input,
    output,
    ...(executionStartAddress !== undefined ? { executionStartAddress } : {}),
    overwrite,
    infiles: files,
    outfile,
  };
}

function parseFill(argv: string[]): Command {
  let value: number | undefined;
  let maxWords: number | undefined;
  const files: string[] = [];

  const state = { i: 0 };
  for (; state.i < argv.length; state.i++) {
    const a = argv[state.i] ?? '';
    if (matches(a, '--value')) {
      value = parseNumber('--value', optionValue(argv, state, a, '--value'));
      continue;
    }
    if (matches(a, '--max-words')) {
      maxWords = parseNumber('--max-words', optionValue(argv, state, a, '--max-words'));
      continue;
    }
    if (a.startsWith('-') && a !== '-') fail(`Unknown option "${a}"`);
    files.push(a);
  }

  const [infile, outfile = '-', ...extra] = files;
  if (infile === undefined || extra.length > 0) {
    fail('fill expects <infile> and an optional <outfile>');
  }
  return {
    name: 'fill',
    ...(value !== undefined ? { value } : {}),
    ...(maxWords !== undefined ? { maxWords } : {}),
    infile,
    outfile,
  };
}

function parseFiles(name: string, argv: string[]): string[] {
  for (const a of argv) {
    if (a.startsWith('-')) fail(`Unknown option "${a}"`);
  }
  if (argv.length === 0) fail(`${name} expects at least one <file>`);
  return argv;
}

function printVersion(): void {
  const require = createRequire(import.meta.url);
  const here = dirname(fileURLToPath(import.meta.url));
  // src/cli.ts and dist/src/cli.js both sit one or two levels below the package root.
  const candidates = [resolve(here, '..', 'package.json'), resolve(here, '..', '..', 'package.json')];
  for (const candidate of candidates) {
    try {
      const pkg: unknown = require(candidate);
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg) {
        process.stdout.write(`${String(pkg.version)}\n`);
        return;
      }
    } catch (err) {
      if (!(err instanceof Error && 'code' in err && err.code === 'MODULE_NOT_FOUND')) throw err;
    }
  }
  process.stdout.write('0.0.0\n');
}

function parseArgs(argv: string[]): CliOptions | CliExit {
  let wordSizeBits = 8;
  let headerEncoding = DEFAULT_HEADER_ENCODING;

  const state = { i: 0 };
  for (; state.i < argv.length; state.i++) {
    const a = argv[state.i] ?? '';
    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      printVersion();
      return { code: 0 };
    }
    if (matches(a, '--word-size-bits')) {
      wordSizeBits = parseNumber(
        '--word-size-bits',
        optionValue(argv, state, a, '--word-size-bits'),
      );
      continue;
    }
    if (matches(a, '--header-encoding')) {
      const v = optionValue(argv, state, a, '--header-encoding');
      const parsed = parseHeaderEncoding(v);
      if (parsed === undefined) fail(`Unsupported --header-encoding "${v}"`);
      headerEncoding = parsed;
      continue;
    }
    if (a.startsWith('-')) fail(`Unknown option "${a}"`);
    break;
  }

  const name = argv[state.i];
  if (name === undefined) fail('Expected a command');
  const rest = argv.slice(state.i + 1);

  let command: Command;
  if (name === 'info') {
    command = { name: 'info', files: parseFiles(name, rest) };
  } else if (name === 'convert') {
    command = parseConvert(rest);
  } else if (name === 'fill') {
    command = parseFill(rest);
  } else {
    const output = Object.hasOwn(AS_COMMANDS, name) ? AS_COMMANDS[name] : undefined;
    if (output === undefined) fail(`Unknown command "${name}"`);
    command = { name: 'as', output, files: parseFiles(name, rest) };
  }

  return { wordSizeBits, headerEncoding, command };
}

function newImage(options: GlobalOptions): MemoryImage {
  return new MemoryImage({
    wordSizeBits: options.wordSizeBits,
    headerEncoding: options.headerEncoding,
  });
}

async function loadImage(
  options: GlobalOptions,
  files: string[],
  input: InputSelection = { kind: 'auto' },
  overwrite = false,
): Promise<MemoryImage> {
  const image = newImage(options);
  for (const file of files) {
    const bytes = await readFile(file);
    try {
      image.addInput(input, bytes, overwrite);
    } catch (err) {
      if (err instanceof AddDataError) throw new AddDataError(OVERLAP_MESSAGE);
      throw err;
    }
  }
  return image;
}

async function writeOutput(outfile: string, artifact: Artifact): Promise<void> {
  const payload = artifact.kind === 'text' ? artifact.text : Buffer.from(artifact.bytes);
  if (outfile === '-') {
    process.stdout.write(payload);
    return;
  }
  await mkdir(dirname(resolve(outfile)), { recursive: true });
  await writeFile(outfile, payload);
}

/**
 * Format `fill` writes back: the detected text format of the input, else S-Records.
 */
async function fillOutputFormat(infile: string): Promise<OutputFormat> {
  const bytes = await readFile(infile);
  if (isElf(bytes)) return { kind: 'srec' };
  const kind: TextFormatKind = detectFormat(bytes.toString('utf8'));
  return { kind };
}

async function run(options: CliOptions): Promise<void> {
  const { command } = options;
  switch (command.name) {
    case 'info': {
      const infos: string[] = [];
      for (const file of command.files) {
        const image = await loadImage(options, [file]);
        infos.push(image.info());
      }
      process.stdout.write(infos.join('\n'));
      return;
    }
    case 'as':
      for (const file of command.files) {
        const image = await loadImage(options, [file]);
        await writeOutput('-', image.encode(command.output));
      }
      return;
    case 'convert': {
      const image = await loadImage(options, command.infiles, command.input, command.overwrite);
      if (command.executionStartAddress !== undefined) {
        image.executionStartAddress = command.executionStartAddress;
      }
      await writeOutput(command.outfile, image.encode(command.output));
      return;
    }
    case 'fill': {
      const image = await loadImage(options, [command.infile]);
      const value = command.value === undefined ? undefined : image.wordBytes(command.value);
      image.fill(value, command.maxWords);
      await writeOutput(command.outfile, image.encode(await fillOutputFormat(command.infile)));
      return;
    }
  }
}

export async function runCli(argv: string[]): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if ('code' in parsed) return parsed.code;
    await run(parsed);
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`binsplice: ${msg}\n`);
    if (isCliError(err)) {
      process.stderr.write(`${usage()}\n`);
      return 2;
    }
    return 1;
  }
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  const real = (() => {
    try {
      return realpathSync.native(resolved);
    } catch {
      return resolved;
    }
  })();
  return real.replace(/\\/g, '/');
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  const self = fileURLToPath(import.meta.url);
  if (normalizePathForCompare(invokedAs) === normalizePathForCompare(self)) return true;
  // npm bin shims can surface another spelling of the same file.
  const invoked = normalizePathForCompare(invokedAs);
  return invoked.endsWith('/dist/src/cli.js') && self.replace(/\\/g, '/').endsWith('/dist/src/cli.js');
}

if (isDirectCliInvocation(process.argv[1])) {
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}

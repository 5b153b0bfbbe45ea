import * as fs from 'fs';
import { VifDecoder } from './decomp';
import { fileSource, VifOpenError } from './source';
import { toCsvLine } from './format';
import { decodeOptionsSchema, DecodeOptions, DecodeOptionsInput } from './options';

export const VERSION = 'vif2csv 1.0.0';

export interface CliIO {
  stdout(chunk: Uint8Array): void;
  stderr(line: string): void;
  now?: () => Date;
}

const defaultIO: CliIO = {
  stdout: chunk => { process.stdout.write(chunk); },
  stderr: line => console.error(line),
};

export type CliCommand =
  | { kind: 'version' }
  | { kind: 'help' }
  | { kind: 'usage'; error?: string }
  | { kind: 'run'; options: DecodeOptions; files: string[] };

export function usageText(): string {
  return [
    'Usage: vif2csv [OPTIONS] FILE...',
    'OPTIONS:',
    ' -h  --header            = print the two header lines first',
    ' -V  --version           = print the version',
    ' -n                      = add counter column (default: on)',
    ' -N                      = remove counter column',
    ' -d  --day "YYYY-MM-DD"  = output only records from that day',
    ' -D  --today             = output only records from today',
    ' -L  --long              = four decimals on every value',
    ' -o  --output FILE       = write rows to FILE instead of stdout',
    '     --latin1            = write latin1 (Windows-1252 compatible) text',
    '     --help              = show this text',
    'FILE is one or more VIB record files.',
  ].join('\n');
}

export function parseCliArgs(argv: string[], log: (line: string) => void = () => {}): CliCommand {
  const raw: DecodeOptionsInput = {};
  const files: string[] = [];

  for (let i=0;i<argv.length;i++) {
    const arg = argv[i];
    switch (arg) {
      case '-V': case '--version':
        return { kind: 'version' };
      case '--help':
        return { kind: 'help' };
      case '-h': case '--header':
        raw.header = true;
        log('set header on.');
        break;
      case '-D': case '--today':
        raw.today = true;
        log('filter: today only.');
        break;
      case '-L': case '--long':
        raw.long = true;
        log('long format enabled.');
        break;
      case '-n': raw.counter = true; break;
      case '-N': raw.counter = false; break;
      case '--latin1': raw.encoding = 'latin1'; break;
      case '-d': case '--day':
      case '-o': case '--output': {
        const value = argv[i + 1];
        if (value === undefined) return { kind: 'usage', error: `Option ${arg} requires an argument` };
        i++;
        if (arg === '-d' || arg === '--day') {
          log(`set date filter to: "${value}"`);
          raw.day = value;
        } else {
          raw.output = value;
        }
        break;
      }
      default:
        if (arg.startsWith('-')) return { kind: 'usage', error: `Unknown Option '${arg}'` };
        files.push(arg);
    }
  }

  if (files.length === 0) return { kind: 'usage' };
  const parsed = decodeOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    return { kind: 'usage', error: `ERROR: ${parsed.error.issues[0].message}` };
  }
  return { kind: 'run', options: parsed.data, files };
}

type Sink = { write(line: string): void; close(): void };

function openSink(options: DecodeOptions, io: CliIO): Sink {
  const enc = options.encoding;
  if (options.output === undefined) {
    return { write: line => io.stdout(Buffer.from(line + '\n', enc)), close: () => {} };
  }
  const fd = fs.openSync(options.output, 'w');
  return {
    write: line => { fs.writeSync(fd, Buffer.from(line + '\n', enc)); },
    close: () => fs.closeSync(fd),
  };
}

/** Runs the command line and returns the process exit code. */
export function runCli(argv: string[], io: CliIO = defaultIO): number {
  const cmd = parseCliArgs(argv, io.stderr);
  if (cmd.kind === 'version') {
    io.stdout(Buffer.from(VERSION + '\n'));
    return 0;
  }
  if (cmd.kind === 'help') {
    io.stdout(Buffer.from(usageText() + '\n'));
    return 0;
  }
  if (cmd.kind === 'usage') {
    if (cmd.error) io.stderr(cmd.error);
    io.stderr(usageText());
    return 1;
  }

  const { options, files } = cmd;
  let sink: Sink | undefined;
  try {
    sink = openSink(options, io);
    let first = true;
    for (const file of files) {
      const decoder = new VifDecoder(() => fileSource(file), options, io.now);
      let headers: string[][];
      try {
        // opens the file for the mode pre-scan
        headers = decoder.headers();
      } catch (err) {
        if (err instanceof VifOpenError) {
          io.stderr(`ERROR: ${err.message}`);
          continue;
        }
        throw err;
      }
      if (options.header && first) {
        for (const h of headers) sink.write(toCsvLine(h));
      }
      first = false;
      for (const row of decoder.rows()) sink.write(toCsvLine(row));
      const s = decoder.stats();
      io.stderr(`Total records: ${s.recordsFound}`);
      io.stderr(`Processed: ${s.processed}, Skipped: ${s.skipped}`);
    }
    return 0;
  } catch (err) {
    io.stderr(`ERROR: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  } finally {
    sink?.close();
  }
}

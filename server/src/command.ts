import { spawn } from 'child_process';
import fs from 'fs';
import { parseArgs } from 'util';
import { loadConfig, resolveTaxRates } from './config.js';
import { exitCodeFor } from './errors.js';
import { enhanceFiles } from './report.js';
import type { EnhancedFile } from './types.js';

const USAGE = `Usage: portfolio-report [files...] [--output-dir DIR | --output FILE]
                        [--income-tax PERCENT] [--capital-gains-tax PERCENT] [--open]

Writes "Enhanced-<name>" next to each input (or into --output-dir).
With no files given and a piped stdin, reads input paths one per line.`;

export type CliOptions = {
  inputs: string[];
  piped: boolean;
  outputDir?: string;
  outputFile?: string;
  incomeTax?: string;
  capitalGainsTax?: string;
  open: boolean;
  help: boolean;
};

export function parseCli(argv: string[], stdin: () => string | null): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      'output-dir': { type: 'string', short: 'd' },
      output: { type: 'string', short: 'o' },
      'income-tax': { type: 'string' },
      'capital-gains-tax': { type: 'string' },
      open: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false }
    }
  });

  let inputs = positionals;
  let piped = false;
  if (inputs.length === 0) {
    const text = stdin();
    if (text !== null) {
      inputs = text.split(/\r?\n/).map(l => l.trim()).filter(Boolean);
      piped = true;
    }
  }

  return {
    inputs,
    piped,
    outputDir: values['output-dir'],
    outputFile: values.output,
    incomeTax: values['income-tax'],
    capitalGainsTax: values['capital-gains-tax'],
    open: values.open ?? false,
    help: values.help ?? false
  };
}

function readPipedStdin(): string | null {
  if (process.stdin.isTTY) return null;
  return fs.readFileSync(0, 'utf8');
}

/** Opens a file in the platform's default viewer without waiting for it. */
export function openInViewer(file: string) {
  const [cmd, args]: [string, string[]] =
    process.platform === 'darwin' ? ['open', [file]] :
    process.platform === 'win32' ? ['cmd', ['/c', 'start', '', file]] :
    ['xdg-open', [file]];
  const child = spawn(cmd, args, { detached: true, stdio: 'ignore' });
  child.on('error', e => console.warn(`⚠️  Could not open ${file} – ${e.message}`));
  child.unref();
}

export function toRecord(r: EnhancedFile) {
  return { InputFile: r.inputFile, OutputFile: r.outputFile };
}

export async function run(argv: string[], stdin: () => string | null = readPipedStdin): Promise<number> {
  try {
    const opts = parseCli(argv, stdin);
    if (opts.help) {
      console.log(USAGE);
      return 0;
    }
    const config = loadConfig();
    await enhanceFiles(opts.inputs, {
      outputDir: opts.outputDir ?? (opts.outputFile ? undefined : config.outputDir),
      outputFile: opts.outputFile,
      piped: opts.piped,
      taxRates: resolveTaxRates(config.taxRates, { incomeTax: opts.incomeTax, capitalGainsTax: opts.capitalGainsTax }),
      onFile: r => {
        console.error(`Enhanced ${r.inputFile} -> ${r.outputFile}`);
        console.log(JSON.stringify(toRecord(r)));
        if (opts.open) openInViewer(r.outputFile);
      }
    });
    return 0;
  } catch (e) {
    console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
    return exitCodeFor(e);
  }
}

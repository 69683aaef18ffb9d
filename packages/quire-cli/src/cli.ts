/**
 * Quire CLI - compile a JSON document and dump its laid-out frames
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { BACKENDS, type BackendName } from 'quire-backend-fot';
import { QuireError, type StyleEntry, formatSpan } from 'quire-core';
import { DocumentLoadError, loadDocument, loadStylesheet } from './document-loader.js';
import { render } from './render.js';

interface CliOptions {
  styles: string[];
  backend: BackendName;
  output?: string;
  maxPasses?: number;
  date?: Date;
  indent: number;
  anchors: boolean;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  return parsed;
}

function parseIndent(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

function parseDate(value: string): Date {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    throw new InvalidArgumentError('Expected a date as YYYY-MM-DD.');
  }
  const date = new Date(`${value}T00:00:00Z`);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidArgumentError(`Not a valid date: ${value}`);
  }
  return date;
}

function reportError(error: unknown): void {
  if (error instanceof QuireError) {
    const where = error.span ? `${formatSpan(error.span)}: ` : '';
    console.error(`Error: ${where}${error.message}`);
    error.hints.forEach(hint => console.error(`  hint: ${hint}`));
  } else if (error instanceof DocumentLoadError) {
    console.error(`Error: ${error.message}`);
    error.hints.forEach(hint => console.error(`  ${hint}`));
  } else if (error instanceof Error) {
    console.error('Error:', error.message);
  } else {
    console.error('Error:', String(error));
  }
  if (process.env.DEBUG && error instanceof Error) {
    console.error(error.stack);
  }
}

const program = new Command();

program
  .name('quire')
  .description('Compile a JSON document through style rules and introspective layout')
  .version('0.1.0')
  .option('-s, --styles <file...>', 'Stylesheet files, applied in order', [])
  .addOption(new Option('-t, --backend <type>', 'Output backend').choices(BACKENDS).default('xml'))
  .option('-o, --output <file>', 'Output file (default: stdout)')
  .option('--max-passes <n>', 'Maximum number of layout passes', parsePositiveInt)
  .option('--date <yyyy-mm-dd>', 'Date reported by today()', parseDate)
  .option('--indent <n>', 'Spaces per nesting level in XML output', parseIndent, 0)
  .option('--no-anchors', 'Leave out location anchors')
  .argument('[input]', 'Input JSON document')
  .action((inputFile: string | undefined, options: CliOptions) => {
    try {
      if (!inputFile || inputFile.trim() === '') {
        console.error('Error: Input document is required');
        process.exit(1);
      }

      if (!fs.existsSync(inputFile)) {
        console.error(`Error: Input file not found: ${inputFile}`);
        process.exit(1);
      }

      const styles: StyleEntry[] = [];
      for (const file of options.styles) {
        if (!fs.existsSync(file)) {
          console.error(`Error: Stylesheet not found: ${file}`);
          process.exit(1);
        }
        styles.push(...loadStylesheet(path.resolve(file)));
      }

      const document = loadDocument(path.resolve(inputFile));
      const result = render(document, {
        backend: options.backend,
        styles,
        maxPasses: options.maxPasses,
        now: options.date,
        indent: options.indent,
        anchors: options.anchors,
      });

      for (const warning of result.warnings) {
        const where = warning.span ? `${formatSpan(warning.span)}: ` : '';
        console.error(`Warning: ${where}${warning.message}`);
      }

      if (options.output) {
        fs.writeFileSync(path.resolve(options.output), result.output);
      } else {
        process.stdout.write(result.output);
      }
    } catch (error) {
      reportError(error);
      process.exit(1);
    }
  });

program.parse();

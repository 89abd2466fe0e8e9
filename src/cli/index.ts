#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import colors from '../utils/colors.js';
import { COMMANDS, formatError, handleCommand, type CliCommand, type CliOptions } from './handler.js';

const DESCRIPTIONS: Record<CliCommand, string> = {
  tables: 'Extract every <table> (CSV per table with --out)',
  html: 'Print the page markup, one node per line (.html with --out)',
  links: 'List links as internal, external, anchor, email or phone',
  colors: 'Collect colors from <style>, inline styles and linked stylesheets',
  images: 'List images with alt, title, dimensions and type',
  perf: 'Response time, page weight and resource sizes',
  seo: 'Meta tags, headings, alt coverage, links and structured data',
};

/**
 * Read the version from package.json beside dist/ (or src/)
 */
function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    // Fallback below when package.json is not shipped
  }
  return '0.0.0';
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('pagelens')
    .description('Fetch a webpage and extract tables, links, colors, images, performance and SEO metrics')
    .version(readVersion())
    .addHelpText('after', `
${colors.bold(colors.yellow('Examples:'))}
  ${colors.green('$ pagelens tables https://example.com/stats --out ./exports')}
  ${colors.green('$ pagelens links https://example.com --json')}
  ${colors.green('$ pagelens seo https://example.com --verbose')}
`);

  for (const name of COMMANDS) {
    const command = program
      .command(name)
      .description(DESCRIPTIONS[name])
      .argument('<url>', 'Page URL, including http:// or https://')
      .option('-o, --out <dir>', 'Write exports into this directory')
      .option('-j, --json', 'Print JSON instead of the formatted view')
      .option('-v, --verbose', 'Debug logging and a report of skipped items');

    if (name === 'images') {
      command.option('--no-probe', 'Do not download images to measure their dimensions');
    }

    command.action(async (url: string, options: CliOptions) => {
      await handleCommand(name, url, options);
    });
  }

  return program;
}

async function main() {
  await createProgram().parseAsync();
}

main().catch((error: unknown) => {
  console.error(formatError(error));
  process.exit(1);
});

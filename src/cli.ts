#!/usr/bin/env node

/**
 * Trust Radar CLI
 *
 * Usage:
 *   trust-radar scan <url>                 - Discovery brief for a site
 *   trust-radar scan <url> --json          - Output the serialized brief
 *   trust-radar scan <url> --strict        - Allow escalation up to High
 *   trust-radar serve                      - Start the HTTP API
 */

import { Command } from 'commander';
import ora from 'ora';
import { discover } from './core/discovery.js';
import { serializeBrief } from './core/brief.js';
import { closePool } from './core/http-fetch.js';
import { loadRunDefaults } from './core/config.js';
import type { DiscoveryBrief } from './types.js';
import { getVersion } from './version.js';

const program = new Command();
const defaults = loadRunDefaults();

program
  .name('trust-radar')
  .description('Discovery-level trust & risk briefs for human review')
  .version(getVersion());

interface ScanOptions {
  maxPages: number;
  strict?: boolean;
  concurrency: number;
  timeout: number;
  deadline?: number;
  ignoreRobots?: boolean;
  silent?: boolean;
  json?: boolean;
}

function parseInteger(value: string): number {
  return parseInt(value, 10);
}

/** Plain-text rendering of a brief for the terminal */
function formatBrief(brief: DiscoveryBrief): string {
  const lines: string[] = [];
  lines.push(`Origin:           ${brief.origin.scheme}://${brief.origin.host}`);
  lines.push(`Discovery health: ${brief.discoveryHealth}`);
  lines.push(`Archetype:        ${brief.archetype}`);
  if (brief.cancelled) lines.push('Run cancelled:    partial brief');

  let currentDomain = '';
  for (const page of brief.pages) {
    if (page.trustDomain !== currentDomain) {
      currentDomain = page.trustDomain;
      lines.push('', `== ${currentDomain} ==`, brief.doctrine.reviewPrompts[page.trustDomain]);
    }
    lines.push('', `${page.url}${page.title ? `  (${page.title})` : ''}`);
    lines.push(`  Attention: ${page.attentionBand}  Confidence: ${page.confidence}`);
    for (const signal of page.signals) {
      lines.push(`  - ${signal.description} [${signal.evidenceType}, ${signal.confidence}]`);
    }
  }

  if (brief.fetchErrors.length > 0) {
    lines.push('', 'Fetch errors:');
    for (const e of brief.fetchErrors) {
      lines.push(`  ${e.url}: ${e.error}`);
    }
  }

  lines.push('', brief.doctrine.evidenceBar);
  return lines.join('\n');
}

program
  .command('scan <url>')
  .description('Discover pages under an origin and propose attention bands')
  .option('--max-pages <number>', `Maximum pages to analyse, homepage included (default: ${defaults.maxPages})`, parseInteger, defaults.maxPages)
  .option('--strict', 'Strict mode: allow escalation up to High')
  .option('--concurrency <number>', `Simultaneous fetches (default: ${defaults.concurrency})`, parseInteger, defaults.concurrency)
  .option('--timeout <ms>', `Per-request timeout in ms (default: ${defaults.timeoutMs})`, parseInteger, defaults.timeoutMs)
  .option('--deadline <ms>', 'Abort the run after this many ms and report what completed', parseInteger)
  .option('--ignore-robots', 'Ignore robots.txt (default: respect robots.txt)')
  .option('-s, --silent', 'Silent mode (no spinner)')
  .option('--json', 'Output as JSON')
  .action(async (url: string, options: ScanOptions) => {
    const spinner = options.silent ? null : ora('Discovering...').start();

    // Ctrl-C aborts in-flight fetches; the partial brief is still printed
    const controller = new AbortController();
    const onSigint = () => controller.abort();
    process.once('SIGINT', onSigint);

    try {
      const brief = await discover(url, {
        maxPages: options.maxPages,
        strict: options.strict === true,
        concurrency: options.concurrency,
        timeoutMs: options.timeout,
        deadlineMs: options.deadline,
        respectRobotsTxt: options.ignoreRobots ? false : defaults.respectRobotsTxt,
        userAgent: defaults.userAgent,
        signal: controller.signal,
      });

      if (spinner) {
        spinner.succeed(`Analysed ${brief.pages.length} pages (${brief.fetchErrors.length} fetch errors)`);
      }

      console.log(options.json ? JSON.stringify(serializeBrief(brief), null, 2) : formatBrief(brief));
      process.exitCode = 0;
    } catch (error) {
      if (spinner) {
        spinner.fail('Discovery failed');
      }
      console.error(`\nError: ${error instanceof Error ? error.message : 'Unknown error occurred'}`);
      process.exitCode = 1;
    } finally {
      process.removeListener('SIGINT', onSigint);
      await closePool();
    }
  });

program
  .command('serve')
  .description('Start the HTTP API')
  .option('-p, --port <number>', 'Port to listen on (default: $PORT or 3000)', parseInteger)
  .action(async (options: { port?: number }) => {
    const { startServer } = await import('./server/app.js');
    startServer({ port: options.port });
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});

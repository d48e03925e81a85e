#!/usr/bin/env node
/**
 * topic-share CLI
 *
 * Commands:
 * - topic-share balance            Show remaining DataForSEO credit
 * - topic-share estimate <seeds>   Pre-flight cost of a run
 * - topic-share keywords <seeds>   Fetch, merge and filter keywords
 * - topic-share analyze <seeds>    Full run: keywords, SERPs, domain share
 * - topic-share serve              Start the dashboard API
 */

import { mkdirSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { ZodError } from 'zod';
import { ConfigError, credentialsFromEnv, loadConfig, type Config, type Credentials } from '../utils/config';
import { logger } from '../utils/logger';
import { createClientFromConfig } from '../dataforseo/client';
import { FetchError } from '../dataforseo/errors';
import { createKeywordSource, createSerpSource } from '../dataforseo/sources';
import { BudgetExceededError } from '../cost/estimator';
import {
  discoverKeywords,
  estimateKeywordStageCost,
  estimateSerpStageCost,
  runAnalysis,
  uniqueSeeds,
} from '../analysis/pipeline';
import { resolveRunSettings, runOverridesSchema, type RunOverrides } from '../analysis/settings';
import { parseListInput } from '../keywords/negatives';
import { domainSummaryCsv, keywordListCsv, serpDetailCsv } from '../export/reports';
import { formatCurrency, formatPercent } from '../export/formats';
import { createServer } from '../dashboard/server';

const program = new Command();

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection');
});

program
  .name('topic-share')
  .description('Estimate organic traffic share per domain for a keyword market')
  .version('0.1.0')
  .option('-c, --config <path>', 'Config file (default: ~/.topic-share/config.json)')
  .option('--login <login>', 'DataForSEO login (default: DATAFORSEO_LOGIN)')
  .option('--password <password>', 'DataForSEO API password (default: DATAFORSEO_PASSWORD)');

// ============================================================================
// Option helpers
// ============================================================================

interface GlobalOptions {
  config?: string;
  login?: string;
  password?: string;
}

interface RunOptions {
  location?: number;
  language?: string;
  sources?: string;
  perSource?: number;
  minVolume?: number;
  analyze?: number;
  depth?: number;
  maxSpend?: number;
  negKeywords?: string;
  negDomains?: string;
}

function parseIntArg(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isFinite(n)) throw new InvalidArgumentError('Not a number.');
  return n;
}

function parseFloatArg(value: string): number {
  const n = Number.parseFloat(value);
  if (!Number.isFinite(n)) throw new InvalidArgumentError('Not a number.');
  return n;
}

function withRunOptions(command: Command): Command {
  return command
    .option('--location <code>', 'DataForSEO location code', parseIntArg)
    .option('--language <code>', 'Language code')
    .option('--sources <list>', 'related_terms,topic_ideas,autocomplete')
    .option('--per-source <n>', 'Keywords requested per seed and source', parseIntArg)
    .option('--min-volume <n>', 'Minimum monthly search volume', parseIntArg)
    .option('--analyze <n>', 'Top keywords sent to the SERP stage', parseIntArg)
    .option('--depth <n>', 'SERP depth: 10, 20, 50 or 100', parseIntArg)
    .option('--max-spend <usd>', 'Spending ceiling per stage, and per run for analyze', parseFloatArg)
    .option('--neg-keywords <list>', 'Negative keyword substrings (replaces config)')
    .option('--neg-domains <list>', 'Negative domains (replaces config)');
}

function toOverrides(options: RunOptions): RunOverrides {
  return runOverridesSchema.parse({
    location: options.location,
    language: options.language,
    sources: options.sources ? parseListInput(options.sources) : undefined,
    keywordsPerSource: options.perSource,
    minSearchVolume: options.minVolume,
    keywordsToAnalyze: options.analyze,
    serpDepth: options.depth,
    maxSpend: options.maxSpend,
    negativeKeywords: options.negKeywords,
    negativeDomains: options.negDomains,
  });
}

function globals(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

function loadCliConfig(): Config {
  return loadConfig({ path: globals().config });
}

function requireCredentials(): Credentials {
  const { login, password } = globals();
  if (login && password) return { login, password };
  const fromEnv = credentialsFromEnv();
  if (!fromEnv) {
    throw new ConfigError('DataForSEO credentials missing: set DATAFORSEO_LOGIN and DATAFORSEO_PASSWORD or pass --login/--password');
  }
  return fromEnv;
}

function seedsFrom(args: string[]): string[] {
  return parseListInput(args.join(','));
}

function writeOutput(dir: string, name: string, content: string): string {
  mkdirSync(dir, { recursive: true });
  const path = join(dir, name);
  writeFileSync(path, `${content}\n`, 'utf-8');
  return path;
}

/** Known failures print one line and exit 1; anything else is a crash */
async function run(fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err) {
    if (
      err instanceof ConfigError ||
      err instanceof BudgetExceededError ||
      err instanceof FetchError ||
      err instanceof ZodError
    ) {
      const message = err instanceof ZodError
        ? err.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
        : err.message;
      console.error(`\x1b[31m✗\x1b[0m ${message}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}

// ============================================================================
// balance
// ============================================================================
program
  .command('balance')
  .description('Show remaining DataForSEO account balance')
  .action(() =>
    run(async () => {
      const config = loadCliConfig();
      const client = createClientFromConfig(config.api, requireCredentials());
      const balance = await client.getBalance();
      console.log(`Balance: ${formatCurrency(balance)}`);
    }),
  );

// ============================================================================
// estimate
// ============================================================================
withRunOptions(
  program
    .command('estimate')
    .description('Estimate the cost of a run without calling the API')
    .argument('<seeds...>', 'Seed keywords (comma separated or one per argument)'),
).action((args: string[], options: RunOptions) =>
  run(async () => {
    const config = loadCliConfig();
    const { settings, sources } = resolveRunSettings(config, toOverrides(options));
    const seeds = uniqueSeeds(seedsFrom(args));
    const keywordStage = estimateKeywordStageCost(sources, seeds.length, settings);
    const serpStage = estimateSerpStageCost(settings.keywordsToAnalyze, settings);

    console.log(`\n\x1b[1mCost estimate\x1b[0m (${seeds.length} seeds, ${sources.join(', ')})\n`);
    console.log(`  Keyword stage: ${formatCurrency(keywordStage, 4)}`);
    console.log(`  SERP stage:    ${formatCurrency(serpStage, 4)} (${settings.keywordsToAnalyze} keywords @ depth ${settings.serpDepth})`);
    console.log(`  Total:         ${formatCurrency(keywordStage + serpStage, 4)}`);
    console.log(`  Limit:         ${formatCurrency(settings.maxSpend)} (analyze checks the total)\n`);
  }),
);

// ============================================================================
// keywords
// ============================================================================
withRunOptions(
  program
    .command('keywords')
    .description('Fetch and merge keywords for seed topics')
    .argument('<seeds...>', 'Seed keywords')
    .option('-o, --out <dir>', 'Write keywords.csv to this directory'),
).action((args: string[], options: RunOptions & { out?: string }) =>
  run(async () => {
    const config = loadCliConfig();
    const { settings, sources } = resolveRunSettings(config, toOverrides(options));
    const client = createClientFromConfig(config.api, requireCredentials());
    const discovery = await discoverKeywords(
      seedsFrom(args),
      sources.map((kind) => createKeywordSource(kind, client)),
      settings,
    );

    for (const failure of discovery.sourceFailures) {
      console.error(`\x1b[33m!\x1b[0m ${failure.source}: ${failure.message}`);
    }
    if (options.out) {
      const path = writeOutput(resolve(options.out), 'keywords.csv', keywordListCsv(discovery.keywords));
      console.log(`Wrote ${discovery.keywords.length} keywords to ${path}`);
      return;
    }
    console.log(keywordListCsv(discovery.keywords));
  }),
);

// ============================================================================
// analyze
// ============================================================================
withRunOptions(
  program
    .command('analyze')
    .description('Run the full analysis and print the domain share table')
    .argument('<seeds...>', 'Seed keywords')
    .option('--remove <list>', 'Keywords to drop before the SERP stage')
    .option('--top <n>', 'Domains to print', parseIntArg, 20)
    .option('-o, --out <dir>', 'Write keywords.csv, domains.csv and serp.csv to this directory'),
).action((args: string[], options: RunOptions & { remove?: string; top: number; out?: string }) =>
  run(async () => {
    const config = loadCliConfig();
    const { settings, sources } = resolveRunSettings(config, toOverrides(options));
    const client = createClientFromConfig(config.api, requireCredentials());

    const controller = new AbortController();
    const onSigint = () => {
      console.error('\nCancelling: waiting for in-flight requests...');
      controller.abort();
    };
    process.once('SIGINT', onSigint);

    try {
      const report = await runAnalysis(
        seedsFrom(args),
        {
          keywordSources: sources.map((kind) => createKeywordSource(kind, client)),
          serpSource: createSerpSource(client),
        },
        settings,
        {
          removals: options.remove ? parseListInput(options.remove) : [],
          signal: controller.signal,
          onProgress: (p) => logger.debug(p, 'SERP progress'),
        },
      );

      const { summary } = report;
      console.log(`\n\x1b[1mMarket\x1b[0m: ${summary.marketType}${report.cancelled ? ' (cancelled, partial)' : ''}`);
      console.log(`  Keywords analyzed: ${report.completedKeywords}/${report.keywords.length}`);
      console.log(`  Domains: ${summary.totalDomains}, est. traffic: ${Math.round(summary.totalTraffic)}`);
      console.log(`  Top 3: ${formatPercent(summary.top3Share)}  Top 5: ${formatPercent(summary.top5Share)}  Top 10: ${formatPercent(summary.top10Share)}`);
      console.log(`  Estimated cost: ${formatCurrency(report.estimatedCost.total, 4)}\n`);

      for (const stat of report.stats.slice(0, Math.max(0, options.top))) {
        console.log(
          `  ${String(stat.rank).padStart(3)}. ${stat.domain.padEnd(40)} ${formatPercent(stat.share).padStart(8)}  ${String(Math.round(stat.totalTraffic)).padStart(8)}  (${stat.keywordCount} kw)`,
        );
      }

      for (const failure of report.sourceFailures) {
        console.error(`\x1b[33m!\x1b[0m ${failure.source}: ${failure.message}`);
      }
      if (report.keywordFailures.length > 0) {
        console.error(`\x1b[33m!\x1b[0m ${report.keywordFailures.length} SERP fetches failed`);
      }

      if (options.out) {
        const dir = resolve(options.out);
        writeOutput(dir, 'keywords.csv', keywordListCsv(report.keywords));
        writeOutput(dir, 'domains.csv', domainSummaryCsv(report.stats));
        writeOutput(dir, 'serp.csv', serpDetailCsv(report.contributions));
        console.log(`\nWrote CSV exports to ${dir}`);
      }
    } finally {
      process.removeListener('SIGINT', onSigint);
    }
  }),
);

// ============================================================================
// serve
// ============================================================================
program
  .command('serve')
  .description('Start the dashboard JSON API')
  .option('-p, --port <port>', 'Override dashboard port', parseIntArg)
  .option('--host <host>', 'Bind address', '127.0.0.1')
  .option('--cors <origins>', "Allowed origins, comma separated, or '*'")
  .action((options: { port?: number; host: string; cors?: string }) =>
    run(async () => {
      const config = loadCliConfig();
      const server = createServer(
        {
          port: options.port ?? config.dashboard.port,
          host: options.host,
          cors: options.cors
            ? { origins: options.cors === '*' ? true : parseListInput(options.cors) }
            : undefined,
        },
        { config, fallbackCredentials: credentialsFromEnv() },
      );
      await server.start();

      const shutdown = () => {
        logger.info('Shutting down...');
        server.stop().then(
          () => process.exit(0),
          (err: unknown) => {
            logger.error({ err }, 'Shutdown error');
            process.exit(1);
          },
        );
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    }),
  );

program.parseAsync(process.argv).catch((err: unknown) => {
  logger.error({ err }, 'Command failed');
  process.exit(1);
});

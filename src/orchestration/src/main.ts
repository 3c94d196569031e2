#!/usr/bin/env node
/**
 * Main entry point for the crop Q&A CLI
 * Commands: ingest, ask, stats
 */

import 'dotenv/config';
import { loadConfig, ConfigOverrides } from './config';
import { openOrBuildStore, runIngestion } from './ingest';
import { answerQuestion, createAssistantContext, formatCitation, saveAnswer } from './assistant';
import { FileVectorStore } from './vectorStore';
import { describeError } from './errors';
import { logger } from './logger';
import { AnswerOutcome, IngestReport } from './types';

export type Command = 'ingest' | 'ask' | 'stats' | 'help';

export interface CliArgs {
  command: Command;
  question?: string;
  location?: string;
  weatherEnabled: boolean;
  reset: boolean;
  outputPath?: string;
  overrides: ConfigOverrides;
}

export const HELP_TEXT = `
Crop Q&A Assistant

Usage:
  npm run ingest -- [options]
  npm run ask -- "<question>" [options]
  npm start -- stats [options]

Commands:
  ingest                    Load PDFs from the data folder into the vector store
  ask <question>            Answer a question from the documents (and weather)
  stats                     Show what the vector store contains

Options:
  --data <dir>              PDF folder (default: data, or DATA_DIR)
  --db <dir>                Vector store folder (default: db, or DB_DIR)
  --reset                   ingest: clear the vector store first
  --location <city>         ask: place for the weather lookup (default: Delhi, or DEFAULT_LOCATION)
  --no-weather              ask: do not fetch or use weather
  --k <number>              ask: number of passages to retrieve (default: 3, or TOP_K)
  --output <path>           ask: also save the answer as JSON
  --groq-key <key>          Groq API key (or set GROQ_API_KEY)
  --help, -h                Show this help message

Examples:
  npm run ingest -- --reset
  npm run ask -- "What crops are suitable for monsoon?" --location Pune
  npm run ask -- "How to control pests in wheat?" --no-weather --output answers/wheat.json
`;

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith('--')) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
}

/**
 * Parse command line arguments (without the node and script entries)
 */
export function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = {
    command: 'help',
    weatherEnabled: true,
    reset: false,
    overrides: {}
  };

  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    return parsed;
  }

  const [command, ...rest] = args;
  if (command !== 'ingest' && command !== 'ask' && command !== 'stats') {
    throw new Error(`Unknown command: ${command}`);
  }
  parsed.command = command;

  const positional: string[] = [];

  for (let i = 0; i < rest.length; i++) {
    const key = rest[i];

    switch (key) {
      case '--data':
        parsed.overrides.dataDirectory = requireValue(key, rest[++i]);
        break;
      case '--db':
        parsed.overrides.dbDirectory = requireValue(key, rest[++i]);
        break;
      case '--groq-key':
        parsed.overrides.groqApiKey = requireValue(key, rest[++i]);
        break;
      case '--k': {
        const value = requireValue(key, rest[++i]);
        const k = parseInt(value, 10);
        if (!Number.isInteger(k) || k < 1 || String(k) !== value) {
          throw new Error(`--k must be a positive integer, got "${value}"`);
        }
        parsed.overrides.topK = k;
        break;
      }
      case '--location':
        parsed.location = requireValue(key, rest[++i]);
        break;
      case '--output':
        parsed.outputPath = requireValue(key, rest[++i]);
        break;
      case '--no-weather':
        parsed.weatherEnabled = false;
        break;
      case '--reset':
        parsed.reset = true;
        break;
      default:
        if (key.startsWith('--')) {
          throw new Error(`Unknown option: ${key}`);
        }
        positional.push(key);
    }
  }

  if (command === 'ask') {
    parsed.question = positional.join(' ').trim();
    if (!parsed.question) {
      throw new Error('Please provide a question, e.g. npm run ask -- "When to sow cotton seeds?"');
    }
  }

  return parsed;
}

/**
 * Human-readable rendering of an answer outcome
 */
export function renderOutcome(outcome: AnswerOutcome): string {
  if (outcome.status === 'failed') {
    return `Error processing question: ${outcome.reason}`;
  }

  const lines: string[] = [`Question: ${outcome.query.question}`, '', 'Answer:', outcome.answer.text, ''];

  if (outcome.status === 'degraded') {
    lines.push(`Weather unavailable: ${outcome.reason}`, '');
  } else if (outcome.weather) {
    const weather = outcome.weather;
    lines.push(`Current weather in ${weather.location}:`);
    lines.push(`  Temperature: ${weather.temperature}°C`);
    if (weather.humidity !== undefined) {
      lines.push(`  Humidity: ${weather.humidity}%`);
    }
    lines.push(`  Conditions: ${weather.conditions}`);
    lines.push(`  Rainfall: ${weather.precipitation} mm`, '');
  }

  if (outcome.answer.citations.length === 0) {
    lines.push('Sources: none (no matching documents)');
  } else {
    lines.push('Sources:');
    outcome.answer.citations.forEach((citation, i) => {
      lines.push(`  ${i + 1}. ${formatCitation(citation)}`);
    });
  }

  return lines.join('\n');
}

export function renderIngestReport(report: IngestReport): string {
  const lines = [
    `Documents found:    ${report.documentsFound}`,
    `Documents ingested: ${report.documentsIngested}`,
    `Pages loaded:       ${report.pagesLoaded}`,
    `Chunks stored:      ${report.chunksStored}`
  ];

  if (report.skipped.length > 0) {
    lines.push('Skipped:');
    report.skipped.forEach(doc => lines.push(`  - ${doc.sourceFile}: ${doc.reason}`));
  }

  return lines.join('\n');
}

async function runIngest(cli: CliArgs): Promise<number> {
  const config = loadConfig(process.env, cli.overrides);
  const report = await runIngestion(config, { reset: cli.reset });

  logger.separator('=');
  console.log(renderIngestReport(report));
  logger.separator('=');

  if (report.documentsFound === 0) {
    console.error(`No PDF files found in '${config.dataDirectory}'. Place the PDFs there and run ingest again.`);
    return 1;
  }
  return report.documentsIngested > 0 ? 0 : 1;
}

async function runAsk(cli: CliArgs): Promise<number> {
  const config = loadConfig(process.env, cli.overrides);

  const store = await openOrBuildStore(config);
  const context = createAssistantContext(config, store);

  const outcome = await answerQuestion(
    {
      question: cli.question ?? '',
      weatherEnabled: cli.weatherEnabled,
      location: cli.location,
      topK: config.topK
    },
    context
  );

  logger.separator('=');
  console.log(renderOutcome(outcome));
  logger.separator('=');

  if (cli.outputPath) {
    saveAnswer(outcome, cli.outputPath);
  }

  return outcome.status === 'failed' ? 1 : 0;
}

async function runStats(cli: CliArgs): Promise<number> {
  const config = loadConfig(process.env, cli.overrides);
  const store = await FileVectorStore.open(config.dbDirectory);
  const stats = store.getStats();

  console.log(`Store:           ${config.dbDirectory}`);
  console.log(`Chunks:          ${stats.chunkCount}`);
  console.log(`Embedding model: ${stats.embeddingModel ?? '-'}`);
  console.log(`Dimensions:      ${stats.dimensions ?? '-'}`);
  console.log(`Metric:          ${stats.metric}`);
  for (const [sourceFile, count] of Object.entries(stats.chunksBySource)) {
    console.log(`  ${sourceFile}: ${count} chunks`);
  }
  return 0;
}

async function main(): Promise<void> {
  let exitCode = 0;

  try {
    const cli = parseArgs(process.argv.slice(2));

    switch (cli.command) {
      case 'help':
        console.log(HELP_TEXT);
        break;
      case 'ingest':
        exitCode = await runIngest(cli);
        break;
      case 'ask':
        exitCode = await runAsk(cli);
        break;
      case 'stats':
        exitCode = await runStats(cli);
        break;
    }
  } catch (error) {
    logger.error('Command failed', error);
    console.error(`Error: ${describeError(error)}`);
    exitCode = 1;
  } finally {
    logger.close();
  }

  process.exitCode = exitCode;
}

if (require.main === module) {
  void main();
}

#!/usr/bin/env node

import fs from 'fs/promises';
import path from 'path';
import { DatabaseConfig } from './config/database.js';
import { OpenAIConfig } from './config/openai.js';
import { AnthropicConfig } from './config/anthropic.js';
import { loadEngineConfig, type EngineConfig } from './config/engine.js';
import { ProviderFactory } from './clients/ProviderFactory.js';
import { parseFieldSpecifications } from './discovery/fieldSpecs.js';
import { DirectoryDocumentAccessor } from './document/DocumentAccessor.js';
import { ExtractionEngine } from './engine/ExtractionEngine.js';
import type { EngineEvent } from './engine/events.js';
import { describeError } from './errors.js';
import { logger } from './utils/logger.js';

/**
 * CLI for the Adaptive Extraction Engine
 *
 * A document is a directory holding one text/markdown file per page
 * (page-1.md, page-2.md, ...). The directory name is the document id.
 *
 * Usage:
 *   npm run dev discover <pagesDir>                 - Discover the field set
 *   npm run dev extract <pagesDir> <fieldsJson>     - Extract a record for a given field set
 *   npm run dev process <pagesDir>                  - Discover, extract and persist
 *   npm run dev test-connections                    - Test database and provider connections
 */

const COMMANDS = ['discover', 'extract', 'process', 'test-connections', 'help'];

function openDocument(pagesDir: string): { accessor: DirectoryDocumentAccessor; documentId: string } {
  const resolved = path.resolve(pagesDir);
  return {
    accessor: new DirectoryDocumentAccessor(path.dirname(resolved)),
    documentId: path.basename(resolved),
  };
}

function logEvent(event: EngineEvent): void {
  switch (event.type) {
    case 'field-init-complete':
      logger.info(`Discovery complete (${event.discoveryMethod})`, {
        documentId: event.documentId,
        fields: event.fieldSpecifications.length,
      });
      break;
    case 'agent-scaling-complete':
      logger.info(`Scaled to ${event.agentCount} agents over ${event.pageCount} pages`, {
        documentId: event.documentId,
      });
      break;
    case 'extraction-task-complete':
      logger.info(`Agent ${event.agentId} ${event.status}`, {
        pages: `${event.pageRange.startPage}-${event.pageRange.endPage}`,
        extractions: event.extractionCount,
        durationMs: event.durationMs,
      });
      break;
    case 'extraction-complete':
      logger.info(`Extraction ${event.completionStatus}`, {
        documentId: event.documentId,
        completedAgents: `${event.completedAgents}/${event.agentCount}`,
      });
      break;
  }
}

function buildEngine(config: EngineConfig, accessor: DirectoryDocumentAccessor): ExtractionEngine {
  return ExtractionEngine.fromConfig(config, accessor, { onEvent: logEvent });
}

/**
 * Read a field list: either a bare array or `{ "fields": [...] }`
 */
async function readFieldsFile(fieldsJson: string) {
  const data: unknown = JSON.parse(await fs.readFile(fieldsJson, 'utf-8'));
  const list = typeof data === 'object' && data !== null && 'fields' in data ? data.fields : data;
  return parseFieldSpecifications(list);
}

async function discover(pagesDir: string): Promise<void> {
  const { accessor, documentId } = openDocument(pagesDir);
  const engine = buildEngine(loadEngineConfig(), accessor);

  const fields = await engine.discoverFields(documentId);
  console.log(JSON.stringify({ fields }, null, 2));
}

async function extract(pagesDir: string, fieldsJson: string): Promise<void> {
  const { accessor, documentId } = openDocument(pagesDir);
  const engine = buildEngine(loadEngineConfig(), accessor);

  const fields = await readFieldsFile(fieldsJson);
  const record = await engine.extractStructured(documentId, fields);
  console.log(JSON.stringify(record, null, 2));
}

async function processDocument(pagesDir: string): Promise<void> {
  const { accessor, documentId } = openDocument(pagesDir);
  const engine = buildEngine(loadEngineConfig(), accessor);

  const result = await engine.processDocument(documentId);
  if (!result.ok) {
    console.error(`\n❌ ${result.error.name} [${result.error.code}]: ${result.error.message}`);
    process.exitCode = 1;
    return;
  }

  console.log(JSON.stringify({ version: result.version, record: result.record }, null, 2));
  console.log(`\n✅ Stored ${documentId} as version ${result.version} (${result.record.status})`);
}

/**
 * Test database and provider connections
 */
async function testConnections(): Promise<void> {
  console.log('\n🧪 Testing connections...\n');

  const config = loadEngineConfig();
  let allOk = true;

  if (config.recordSink === 'postgres') {
    console.log('Testing PostgreSQL connection...');
    if (await DatabaseConfig.testConnection()) {
      console.log('✅ Database connection successful\n');
    } else {
      console.log('❌ Database connection failed\n');
      allOk = false;
    }
  } else {
    console.log(`Records are written as JSON under ${config.recordOutputDir}/\n`);
  }

  console.log('Testing OpenAI configuration...');
  console.log(OpenAIConfig.validate() ? '✅ OpenAI configuration valid\n' : '⚠️  OpenAI configuration invalid\n');

  console.log('Testing Anthropic configuration...');
  console.log(AnthropicConfig.validate() ? '✅ Anthropic configuration valid\n' : '⚠️  Anthropic configuration invalid\n');

  if (!ProviderFactory.validateProvider(config.provider)) {
    console.log(`❌ Selected provider '${config.provider}' is not configured.\n`);
    allOk = false;
  }

  if (allOk) {
    console.log('✅ All required connections successful!');
  } else {
    console.log('❌ Some required connections failed. Please check your .env file.');
    process.exitCode = 1;
  }
}

/**
 * Print help message
 */
function printHelp(): void {
  console.log(`
Adaptive Extraction Engine

Discovers the fields of a paged document, fans extraction out over page
ranges and consolidates the results into one confidence-scored record.

USAGE:
  npm run dev <command> [options]

COMMANDS:
  discover <pagesDir>               Discover the field specification set
  extract <pagesDir> <fieldsJson>   Extract a record for the fields in fieldsJson
  process <pagesDir>                Discover, extract and persist a new record version
  test-connections                  Test database and provider connections
  help                              Show this help message

EXAMPLES:
  npm run dev discover ./documents/contract-17
  npm run dev extract ./documents/contract-17 fields.json
  npm run dev process ./documents/contract-17

ENVIRONMENT:
  Configuration is loaded from .env file (see .env.example)
    - MODEL_PROVIDER (openai | anthropic), OPENAI_API_KEY or ANTHROPIC_API_KEY
    - RECORD_SINK (json | postgres), RECORD_OUTPUT_DIR
    - PGHOST, PGUSER, PGPASSWORD, PGDATABASE, PGPORT (postgres sink)
`);
}

/**
 * Main CLI entry point
 */
async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === 'help') {
    printHelp();
    return;
  }

  const [command, pagesDir, fieldsJson] = args;

  try {
    switch (command) {
      case 'discover':
        if (!pagesDir) {
          console.error('Usage: npm run dev discover <pagesDir>');
          process.exitCode = 1;
          return;
        }
        await discover(pagesDir);
        break;

      case 'extract':
        if (!pagesDir || !fieldsJson) {
          console.error('Usage: npm run dev extract <pagesDir> <fieldsJson>');
          process.exitCode = 1;
          return;
        }
        await extract(pagesDir, fieldsJson);
        break;

      case 'process':
        if (!pagesDir) {
          console.error('Usage: npm run dev process <pagesDir>');
          process.exitCode = 1;
          return;
        }
        await processDocument(pagesDir);
        break;

      case 'test-connections':
        await testConnections();
        break;

      default:
        console.error(`Unknown command: ${command}`);
        console.error(`Valid commands: ${COMMANDS.join(', ')}`);
        printHelp();
        process.exitCode = 1;
    }
  } catch (error) {
    logger.error('Command failed', { error: describeError(error) });
    console.error('\n❌ Command failed:', describeError(error));
    process.exitCode = 1;
  } finally {
    await DatabaseConfig.close();
  }
}

main().catch((error: unknown) => {
  console.error('Fatal:', describeError(error));
  process.exit(1);
});

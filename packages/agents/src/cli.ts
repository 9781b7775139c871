#!/usr/bin/env node
// CIM Analyst command-line entry point
//
// Usage:
//   cim analyze memo.txt                   # full pipeline, summary on stdout
//   cim analyze memo.txt --id deal-42      # explicit document id
//   cim analyze memo.txt --chunked --json  # per-chunk fan-out, full JSON report
//   cim chunk memo.txt                     # chunk table only
//   cim --help                             # usage

import 'dotenv/config';
import { readFileSync } from 'node:fs';
import { loadConfig, type CimConfig } from '../config/index.js';
import { createRecordStore } from '../config/store.js';
import { createModelClient } from '../bridge/model-client.js';
import { Orchestrator } from '../orchestrator/coordinator.js';
import { DocumentChunker } from '../chunking/document-chunker.js';
import { ALL_AGENTS } from '../types/agents.js';
import type { Chunk } from '../types/document.js';
import type { ChunkedRunReport, RunReport } from '../types/run.js';
import { closePool } from '../db/pg-client.js';
import { parseAnalyzeArgs, type AnalyzeArgs } from './args.js';
import { toErrorMessage } from '../utils/errors.js';

// ── ANSI helpers (no chalk dependency) ──────────────────────────────

const isTTY = process.stdout.isTTY ?? false;

const ansi = {
  reset: isTTY ? '\x1b[0m' : '',
  bold: isTTY ? '\x1b[1m' : '',
  dim: isTTY ? '\x1b[2m' : '',
  green: isTTY ? '\x1b[32m' : '',
  yellow: isTTY ? '\x1b[33m' : '',
  red: isTTY ? '\x1b[31m' : '',
};

function c(color: keyof typeof ansi, text: string): string {
  return `${ansi[color]}${text}${ansi.reset}`;
}

function readDocument(file: string): string {
  try {
    return readFileSync(file, 'utf-8');
  } catch (err) {
    throw new Error(`Cannot read ${file}: ${toErrorMessage(err)}`);
  }
}

function chunkTable(chunks: readonly Chunk[]): string {
  const lines = ['  #    Section             Chars  Pages    Title'];
  for (const chunk of chunks) {
    const pages = chunk.pageRange ? `${chunk.pageRange.start}-${chunk.pageRange.end}` : '-';
    lines.push(
      `  ${String(chunk.sequence).padEnd(4)} ${chunk.sectionType.padEnd(19)} ${String(chunk.length).padStart(5)}  ${pages.padEnd(8)} ${chunk.title ?? ''}`,
    );
  }
  return lines.join('\n');
}

function reportSummary(report: RunReport): string {
  const lines = [`  ${c('bold', 'Document')} ${report.documentId}  status: ${report.status === 'complete' ? c('green', 'complete') : c('red', 'error')}`];
  for (const name of ALL_AGENTS) {
    const result = report.results[name];
    if (!result) continue;
    const mark = result.status === 'success' ? c('green', 'ok   ') : c('red', 'error');
    lines.push(`    ${mark} ${name.padEnd(12)} ${(result.durationMs / 1000).toFixed(1)}s`);
  }
  const { financial, memo } = report.results;
  if (financial?.status === 'success') lines.push(`    metrics extracted: ${financial.output.length}`);
  if (memo?.status === 'success') {
    lines.push(`    investment grade: ${memo.output.investment_grade}  recommendation: ${memo.output.recommendation.decision}`);
  }
  for (const error of report.errors) lines.push(`    ${c('red', '!')} ${error}`);
  if (report.persistence) {
    const rows = Object.values(report.persistence.inserted).reduce((a, b) => a + b, 0);
    lines.push(c('dim', `    persisted ${rows} row(s), ${report.persistence.errors.length} store error(s)`));
  }
  return lines.join('\n');
}

// ── CLI class ───────────────────────────────────────────────────────

class CimCli {
  private config: CimConfig | null = null;

  private getConfig(): CimConfig {
    if (!this.config) this.config = loadConfig();
    return this.config;
  }

  async start(rawArgs: string[]): Promise<number> {
    if (rawArgs.includes('--help') || rawArgs.includes('-h') || rawArgs.length === 0) {
      this.printHelp();
      return 0;
    }

    const command = rawArgs[0];
    const rest = rawArgs.slice(1);

    switch (command) {
      case 'analyze':
        return this.handleAnalyze(rest);
      case 'chunk':
        return this.handleChunk(rest);
      case 'help':
        this.printHelp();
        return 0;
      default:
        console.error(`Unknown command: ${command}\n`);
        this.printHelp();
        return 1;
    }
  }

  // ── Subcommand: chunk ───────────────────────────────────────────

  private handleChunk(args: string[]): number {
    const file = args.find(a => !a.startsWith('--'));
    if (!file) {
      console.error(`  ${c('red', 'Error:')} No input file provided.\n`);
      return 1;
    }
    const { chunking } = this.getConfig();
    const chunks = new DocumentChunker(chunking).chunk(readDocument(file));
    console.log(chunkTable(chunks));
    return 0;
  }

  // ── Subcommand: analyze ─────────────────────────────────────────

  private async handleAnalyze(args: string[]): Promise<number> {
    const parsed = parseAnalyzeArgs(args);
    if (!parsed.ok) {
      if ('help' in parsed) {
        this.printHelp();
        return 0;
      }
      console.error(`  ${c('red', 'Error:')} ${parsed.error}. Use "cim --help" for usage.\n`);
      return 1;
    }

    const config = this.getConfig();
    const model = createModelClient(config);
    if (!model) {
      console.error(`  ${c('red', 'Error:')} ANTHROPIC_API_KEY environment variable is required.\n`);
      return 1;
    }

    const store = await createRecordStore(config);
    const orchestrator = new Orchestrator({
      model,
      models: config.models,
      chunker: config.chunking,
      store,
      includeAuxiliary: parsed.args.includeAuxiliary,
    });

    try {
      return await this.runAnalysis(orchestrator, parsed.args);
    } finally {
      if (config.store.backend === 'postgres') await closePool();
    }
  }

  private async runAnalysis(orchestrator: Orchestrator, args: AnalyzeArgs): Promise<number> {
    const text = readDocument(args.file);
    const controller = new AbortController();
    const onSigint = () => controller.abort();
    process.once('SIGINT', onSigint);

    try {
      if (args.chunked) {
        const report: ChunkedRunReport = await orchestrator.runChunkedPipeline(text, args.documentId, { signal: controller.signal });
        if (args.json) {
          console.log(JSON.stringify(report, null, 2));
        } else {
          console.log(chunkTable(report.chunks));
          report.perChunkResults.forEach((r, i) => console.log(`\n  ${c('dim', `chunk ${i}`)}\n${reportSummary(r)}`));
        }
        return report.perChunkResults.some(r => r.status === 'error') ? 1 : 0;
      }

      const report = await orchestrator.runPipeline(text, args.documentId, { signal: controller.signal });
      console.log(args.json ? JSON.stringify(report, null, 2) : reportSummary(report));
      return report.status === 'error' ? 1 : 0;
    } finally {
      process.off('SIGINT', onSigint);
    }
  }

  // ── Help screen ─────────────────────────────────────────────────

  printHelp(): void {
    console.log(`
  ${c('bold', 'CIM Analyst')}: multi-agent analysis of Confidential Information Memoranda

  ${c('bold', 'Usage:')}
    cim analyze <file> [options]    Run the agent pipeline on a plain-text CIM
    cim chunk <file>                Print the chunk table for a document
    cim --help                      Show this help

  ${c('bold', 'Analyze options:')}
    --id <documentId>               Document id (default: file name without extension)
    --chunked                       Run every agent over each chunk
    --no-aux                        Skip the quote and chart agents
    --json                          Print the full report as JSON

  ${c('bold', 'Environment:')}
    ANTHROPIC_API_KEY               Required for analyze.
    CIM_MODEL, CIM_MODEL_<AGENT>    Model overrides.
    CIM_STORE_BACKEND               local (default) or postgres.
    CIM_LOG_LEVEL                   debug, info, warn or error.
`);
  }
}

// ── Entry point ─────────────────────────────────────────────────────

const cli = new CimCli();
cli.start(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`${c('red', 'Fatal:')} ${toErrorMessage(err)}`);
    process.exit(1);
  },
);

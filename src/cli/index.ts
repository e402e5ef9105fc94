#!/usr/bin/env node
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import { ConfigLoadError, loadConfigFile, toDecisionInputs } from '../engine/config-loader.js';
import { decide } from '../engine/decide.js';
import { createDb } from '../store/db.js';
import { HistoryStore } from '../store/history.js';
import { formatDecision } from './format.js';

const CONFIG_PATH = process.env.SHIFTVOTE_CONFIG ?? './shift.yaml';
const DB_PATH = process.env.SHIFTVOTE_DB ?? './data/shiftvote.db';
const LOG_HISTORY = process.env.SHIFTVOTE_NO_HISTORY !== '1';

const USAGE = [
  'Usage:',
  '  shiftvote [config.yaml]                     decide today and log it',
  '  shiftvote actuals <id> <hours> <net>        record what actually happened',
  '  shiftvote history [days]                    list recent decisions',
].join('\n');

function todayIso(): string {
  return new Date().toISOString().slice(0, 10);
}

function openStore(): { store: HistoryStore; close: () => void } {
  const dbDir = dirname(DB_PATH);
  if (!existsSync(dbDir)) {
    mkdirSync(dbDir, { recursive: true });
  }
  const { db, sqlite } = createDb(DB_PATH);
  return { store: new HistoryStore(db), close: () => sqlite.close() };
}

function parseNumber(label: string, raw: string | undefined): number {
  const value = Number(raw);
  if (raw === undefined || raw.trim() === '' || !Number.isFinite(value)) {
    throw new Error(`${label} must be a number, got "${raw ?? ''}"\n${USAGE}`);
  }
  return value;
}

function runDecision(configPath: string): void {
  const config = loadConfigFile(configPath);
  console.log(`[SHIFTVOTE] Loaded config from ${configPath}`);

  const prepared = toDecisionInputs(config, todayIso());
  const { store, close } = openStore();
  try {
    const history = store.stats(prepared.date);
    const result = decide({ ...prepared.inputs, history }, prepared.rules);

    for (const line of formatDecision(result)) {
      console.log(line);
    }

    if (LOG_HISTORY) {
      const entry = store.recordDecision(result, prepared.date);
      console.log(`[SHIFTVOTE] Logged decision ${entry.id} for ${prepared.date}`);
    }
  } finally {
    close();
  }
}

function runActuals(args: string[]): void {
  const [id, hours, net] = args;
  if (!id) throw new Error(`Missing decision id\n${USAGE}`);

  const { store, close } = openStore();
  try {
    if (!store.recordActuals(id, parseNumber('hours', hours), parseNumber('net', net))) {
      throw new Error(`No decision with id ${id}`);
    }
    console.log(`[SHIFTVOTE] Recorded actuals for ${id}`);
  } finally {
    close();
  }
}

function runHistory(args: string[]): void {
  const days = args[0] === undefined ? 7 : parseNumber('days', args[0]);
  const { store, close } = openStore();
  try {
    for (const entry of store.listRecent(todayIso(), { lookbackDays: days })) {
      const actual = entry.actualHours === null ? '' : ` | actual ${entry.actualHours}h $${entry.actualNet ?? 0}`;
      console.log(`${entry.decidedOn}  ${entry.choice.padEnd(5)}  ${entry.hours}h  net $${entry.net.toFixed(2)}${actual}  (${entry.id})`);
    }
  } finally {
    close();
  }
}

function main(argv: string[]): void {
  const [command, ...rest] = argv;
  switch (command) {
    case 'actuals':
      runActuals(rest);
      break;
    case 'history':
      runHistory(rest);
      break;
    case '--help':
    case '-h':
      console.log(USAGE);
      break;
    default:
      runDecision(command ?? CONFIG_PATH);
  }
}

try {
  main(process.argv.slice(2));
} catch (err) {
  const error = err instanceof Error ? err : new Error(String(err));
  console.error(`[SHIFTVOTE] ${error.name}: ${error.message}`);
  if (error instanceof ConfigLoadError) {
    for (const detail of error.details) {
      console.error(`[SHIFTVOTE]   - ${detail}`);
    }
  }
  process.exitCode = 1;
}

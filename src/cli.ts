#!/usr/bin/env node
import 'dotenv/config';
import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import chalk from 'chalk';
import { loadCoreNlpConfig } from './config/corenlp.js';
import type { JvmServerLauncher } from './core/bootstrap.js';
import { createCoreNlpClient, type CoreNlpClient } from './core/client.js';
import { toStdError } from './core/errors.js';
import type { LanguageProfile } from './core/language_profile.js';
import type { AnnotatedDocumentT } from './schemas/corenlp.js';
import { createLogger } from './util/logging.js';

export interface CliCommand {
  command: 'resolve' | 'annotate';
  language: string;
  annotators: string[];
  custom: Record<string, string>;
  models: Array<[string, string]>;
}

const USAGE = [
  'Usage:',
  '  corenlp-config resolve <language> <annotator...> [--set key=value] [--model key=path]',
  '  corenlp-config annotate <language> <annotator...> [--set key=value] [--model key=path]',
].join('\n');

function splitPair(flag: string, value: string | undefined): [string, string] {
  const eq = value === undefined ? -1 : value.indexOf('=');
  if (value === undefined || eq <= 0) {
    throw new Error(`${flag} expects key=value`);
  }
  return [value.slice(0, eq), value.slice(eq + 1)];
}

export function parseArgs(argv: readonly string[]): CliCommand {
  const [command, language, ...rest] = argv;
  if (command !== 'resolve' && command !== 'annotate') throw new Error(USAGE);
  if (!language) throw new Error(USAGE);

  const annotators: string[] = [];
  const custom: Record<string, string> = {};
  const models: Array<[string, string]> = [];
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i] ?? '';
    if (arg === '--set') {
      const [k, v] = splitPair(arg, rest[++i]);
      custom[k] = v;
    } else if (arg === '--model') {
      models.push(splitPair(arg, rest[++i]));
    } else {
      // Accept both "pos ner" and "pos,ner".
      annotators.push(...arg.split(',').map((a) => a.trim()).filter(Boolean));
    }
  }
  if (annotators.length === 0) throw new Error(USAGE);
  return { command, language, annotators, custom, models };
}

export function formatProperties(properties: Readonly<Record<string, string>>): string[] {
  return Object.keys(properties)
    .sort()
    .map((key) => `${chalk.cyan(key)} = ${properties[key] === '' ? chalk.gray('""') : properties[key]}`);
}

export function formatDocument(doc: AnnotatedDocumentT): string[] {
  return doc.sentences.map((sentence) =>
    sentence.tokens
      .map((t) => {
        const tags = [t.pos, t.ner && t.ner !== 'O' ? t.ner : undefined].filter(Boolean).join('/');
        return tags ? `${t.word}${chalk.gray('/' + tags)}` : t.word;
      })
      .join(' '),
  );
}

function applyModels(client: CoreNlpClient, profile: LanguageProfile, models: Array<[string, string]>): LanguageProfile {
  return models.reduce((p, [key, file]) => client.setModelOverride(p, key, file), profile);
}

async function main(argv: string[]): Promise<number> {
  const log = createLogger();
  let cmd: CliCommand;
  try {
    cmd = parseArgs(argv);
  } catch (e) {
    console.error(e instanceof Error ? e.message : String(e));
    return 2;
  }

  let launcher: JvmServerLauncher | null = null;
  try {
    const wired = createCoreNlpClient(loadCoreNlpConfig(), log);
    const { client } = wired;
    launcher = wired.launcher;
    const profile = applyModels(client, client.selectLanguage(cmd.language), cmd.models);

    if (cmd.command === 'resolve') {
      const properties = client.resolve(profile, cmd.annotators, cmd.custom);
      for (const line of formatProperties(properties)) console.log(line);
      return 0;
    }

    const pipeline = await client.loadPipeline(profile, cmd.annotators, cmd.custom);
    const rl = readline.createInterface({ input, output, terminal: false });
    try {
      for await (const line of rl) {
        if (!line.trim()) continue;
        const doc = await pipeline.annotate(line);
        for (const out of formatDocument(doc)) console.log(out);
      }
    } finally {
      rl.close();
    }
    return 0;
  } catch (e) {
    const err = toStdError(e, cmd.command);
    log.debug({ err: e }, 'CoreNLP: command failed');
    console.error(`${chalk.red(err.code)}: ${err.message}`);
    return 1;
  } finally {
    launcher?.stop();
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((e: unknown) => {
      console.error(e);
      process.exitCode = 1;
    });
}

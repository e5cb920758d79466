import { accessSync, constants } from 'node:fs';
import path from 'node:path';
import type pino from 'pino';
import type { LanguageProfile } from './language_profile.js';
import { modelsOfFamily } from './language_profile.js';
import { getModelCatalog, type ModelCatalog } from './model_catalog.js';
import { ConfigurationError, ModelNotFoundError, ModelUnavailableError } from './errors.js';

/** Flat property bag handed to the CoreNLP engine. */
export type ResolvedConfiguration = Readonly<Record<string, string>>;

/** Answers whether a model file can be read. */
export type FileProbe = (absolutePath: string) => boolean;

export const readableFile: FileProbe = (absolutePath) => {
  try {
    accessSync(absolutePath, constants.R_OK);
    return true;
  } catch {
    return false;
  }
};

export const SUTIME_RULE_FILES = ['defs.sutime.txt', 'english.sutime.txt'] as const;

export interface ResolveOptions {
  modelPath: string;
  custom?: Readonly<Record<string, string>>;
  probe?: FileProbe;
  catalog?: ModelCatalog;
  log?: pino.Logger;
}

/**
 * True when the overrides name a model file for `family`: `<family>.model`,
 * `<family>.model.*`, or one of the catalog's own keys for that family.
 * Other settings of the family (`ner.useSUTime`, …) do not count.
 */
function hasCustomModel(custom: Readonly<Record<string, string>>, family: string, catalog: ModelCatalog): boolean {
  const known = catalog.modelKeys(family);
  return Object.keys(custom).some(
    (key) => key === `${family}.model` || key.startsWith(`${family}.model.`) || known.has(key),
  );
}

/**
 * Turns a language profile and an ordered annotator list into the property
 * bag for the pipeline. Throws on the first unreadable model file; nothing is
 * returned in that case.
 */
export function resolveConfiguration(
  profile: LanguageProfile,
  annotators: readonly string[],
  opts: ResolveOptions,
): ResolvedConfiguration {
  const catalog = opts.catalog ?? getModelCatalog();
  const probe = opts.probe ?? readableFile;
  const custom = opts.custom ?? {};

  if (annotators.length === 0) {
    throw new ConfigurationError('At least one annotator is required');
  }
  const names = annotators.map((a) => a.trim());
  if (names.includes('')) {
    throw new ConfigurationError('Annotator names must not be empty');
  }

  const properties: Record<string, string> = {};

  for (const family of new Set(names)) {
    if (!catalog.isCatalogFamily(family)) continue;
    const entries = modelsOfFamily(profile, family);
    if (entries.length === 0) {
      if (hasCustomModel(custom, family, catalog)) continue;
      throw new ModelUnavailableError(family, profile.language);
    }
    for (const entry of entries) {
      const file = path.join(opts.modelPath, entry.relativePath);
      if (!probe(file)) {
        opts.log?.debug({ key: entry.key, file }, 'CoreNLP: model file missing');
        throw new ModelNotFoundError(file);
      }
      properties[entry.key] = file;
    }
  }

  properties.annotators = names.join(', ');

  if (profile.language !== 'english') {
    // Non-English grammars reject -retainTmpSubcategories and fail building graphs.
    properties['parse.flags'] = '';
    properties['parse.buildgraphs'] = 'false';
  }

  // SUTime fails to initialise its binders otherwise.
  properties['sutime.binders'] = '0';

  if (names.includes('ner')) {
    properties['sutime.rules'] = SUTIME_RULE_FILES.map((file) =>
      path.join(opts.modelPath, 'sutime', file),
    ).join(', ');
  }

  const resolved = Object.freeze({ ...properties, ...custom });
  opts.log?.debug(
    { language: profile.language, annotators: resolved.annotators, keys: Object.keys(resolved).length },
    'CoreNLP: configuration resolved',
  );
  return resolved;
}

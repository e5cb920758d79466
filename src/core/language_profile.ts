import { resolveLanguage, type LanguageCode } from './language_registry.js';
import { getModelCatalog, type FlatModel, type ModelCatalog } from './model_catalog.js';
import { UnknownModelFamilyError } from './errors.js';

/**
 * Immutable language selection: the canonical language plus every model file
 * the catalog offers for it, indexed by family.
 */
export interface LanguageProfile {
  readonly language: LanguageCode;
  readonly modelFiles: ReadonlyMap<string, FlatModel>;
}

function freezeProfile(language: LanguageCode, entries: Iterable<FlatModel>): LanguageProfile {
  const modelFiles = new Map<string, FlatModel>();
  for (const entry of entries) {
    modelFiles.set(entry.key, Object.freeze({ ...entry }));
  }
  return Object.freeze({ language, modelFiles });
}

/**
 * Builds a fresh model table for `token`. Nothing is carried over from any
 * earlier selection.
 */
export function selectLanguage(token: string, catalog: ModelCatalog = getModelCatalog()): LanguageProfile {
  const language = resolveLanguage(token);
  const entries = catalog.families().flatMap((family) => catalog.flattenModels(family, language));
  return freezeProfile(language, entries);
}

/**
 * Replaces (or adds) one model path. `key` is a property key such as
 * `pos.model` or `ner.model.3class`; its first segment names the family whose
 * folder prefixes `relativePath`.
 */
export function withModelOverride(
  profile: LanguageProfile,
  key: string,
  relativePath: string,
  catalog: ModelCatalog = getModelCatalog(),
): LanguageProfile {
  const family = key.split('.')[0] ?? '';
  if (!catalog.isCatalogFamily(family)) throw new UnknownModelFamilyError(family);
  const entry: FlatModel = { family, key, relativePath: catalog.folderFor(family) + relativePath };
  const entries = new Map(profile.modelFiles);
  entries.set(key, entry);
  return freezeProfile(profile.language, entries.values());
}

/** Model entries of one family, in table order. */
export function modelsOfFamily(profile: LanguageProfile, family: string): FlatModel[] {
  return [...profile.modelFiles.values()].filter((entry) => entry.family === family);
}

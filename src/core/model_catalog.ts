import { readFileSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { LanguageCode } from './language_registry.js';
import { UnknownModelFamilyError } from './errors.js';

const CATALOG_FILE = path.join(__dirname, '..', 'data', 'model_catalog.json');

const ModelEntrySchema = z.union([z.string().min(1), z.record(z.string().min(1)), z.null()]);

export const ModelCatalogSchema = z
  .object({
    folders: z.record(z.string()),
    models: z.record(z.record(ModelEntrySchema)),
  })
  .superRefine((catalog, ctx) => {
    for (const family of Object.keys(catalog.models)) {
      if (!(family in catalog.folders)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['folders', family],
          message: `family "${family}" has models but no folder`,
        });
      }
    }
  });

export type ModelCatalogData = z.infer<typeof ModelCatalogSchema>;

/**
 * What a family offers for one language: a single model file, or named
 * variants (e.g. NER ships 3-, 4- and 7-class classifiers).
 */
export type FamilyModels =
  | { kind: 'single'; path: string }
  | { kind: 'variants'; variants: Readonly<Record<string, string>> };

export interface FlatModel {
  family: string;
  key: string;
  /** Relative to the model path, folder included. */
  relativePath: string;
}

export class ModelCatalog {
  private readonly data: ModelCatalogData;

  constructor(data: unknown) {
    this.data = ModelCatalogSchema.parse(data);
  }

  static fromFile(file: string = CATALOG_FILE): ModelCatalog {
    return new ModelCatalog(JSON.parse(readFileSync(file, 'utf8')));
  }

  families(): string[] {
    return Object.keys(this.data.models);
  }

  isCatalogFamily(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.data.models, name);
  }

  folderFor(family: string): string {
    const folder = this.data.folders[family];
    if (folder === undefined || !this.isCatalogFamily(family)) {
      throw new UnknownModelFamilyError(family);
    }
    return folder;
  }

  modelsFor(family: string, language: LanguageCode): FamilyModels | null {
    if (!this.isCatalogFamily(family)) throw new UnknownModelFamilyError(family);
    const entry = this.data.models[family]?.[language];
    if (entry === undefined || entry === null) return null;
    if (typeof entry === 'string') return { kind: 'single', path: entry };
    if (Object.keys(entry).length === 0) return null;
    return { kind: 'variants', variants: entry };
  }

  /**
   * Flattens a family's models into property keys: `family.model` for a single
   * model, `family.<variant>` for each variant.
   */
  flattenModels(family: string, language: LanguageCode): FlatModel[] {
    const models = this.modelsFor(family, language);
    if (!models) return [];
    const folder = this.folderFor(family);
    if (models.kind === 'single') {
      return [{ family, key: `${family}.model`, relativePath: folder + models.path }];
    }
    return Object.entries(models.variants).map(([variant, file]) => ({
      family,
      key: `${family}.${variant}`,
      relativePath: folder + file,
    }));
  }

  /** Every property key that names a model of `family`, in any language. */
  modelKeys(family: string): Set<string> {
    if (!this.isCatalogFamily(family)) throw new UnknownModelFamilyError(family);
    const keys = new Set<string>();
    for (const entry of Object.values(this.data.models[family] ?? {})) {
      if (typeof entry === 'string') keys.add(`${family}.model`);
      else if (entry) for (const variant of Object.keys(entry)) keys.add(`${family}.${variant}`);
    }
    return keys;
  }
}

let defaultCatalog: ModelCatalog | null = null;

/** The bundled catalog, loaded once. */
export function getModelCatalog(): ModelCatalog {
  if (!defaultCatalog) defaultCatalog = ModelCatalog.fromFile();
  return defaultCatalog;
}

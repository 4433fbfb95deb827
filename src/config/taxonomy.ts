import fs from 'fs/promises';
import { z } from 'zod';
import { Taxonomy, TaxonomyCategory } from '../types/taxonomy.types';
import { LabelSelection } from '../types/item.types';
import { AppError, ErrorCode } from '../types/error.types';
import { logger } from './logger';

const rawLabelSchema = z.union([
  z.string().min(1),
  z.object({
    id: z.string().min(1).optional(),
    name: z.string().min(1).optional(),
    shortcut: z.string().nullable().optional(),
  }),
]);

const rawCategorySchema = z.object({
  id: z.string().min(1, 'Category id is required'),
  name: z.string().min(1).optional(),
  labels: z.array(rawLabelSchema).default([]),
});

const taxonomyFileSchema = z.object({
  categories: z.array(rawCategorySchema).default([]),
  image_directory: z.string().min(1).optional(),
  reservation_timeout_seconds: z.number().int().positive().optional(),
});

export const EMPTY_TAXONOMY: Taxonomy = {
  categories: [],
  imageDirectory: null,
  leaseDurationSeconds: null,
};

/**
 * Normalise a parsed config.json: label ids default to `<category>_<index>`,
 * names default to ids
 */
export function parseTaxonomy(raw: unknown): Taxonomy {
  const parsed = taxonomyFileSchema.safeParse(raw);

  if (!parsed.success) {
    throw new AppError(ErrorCode.CONFIGURATION_ERROR, 'Invalid taxonomy configuration', 500, {
      errors: parsed.error.errors.map((err) => ({ field: err.path.join('.'), message: err.message })),
    });
  }

  const seen = new Set<string>();
  const categories: TaxonomyCategory[] = parsed.data.categories.map((category) => {
    if (seen.has(category.id)) {
      throw new AppError(ErrorCode.CONFIGURATION_ERROR, `Duplicate category id: ${category.id}`, 500);
    }
    seen.add(category.id);

    return {
      id: category.id,
      name: category.name ?? category.id,
      labels: category.labels.map((label, index) => {
        if (typeof label === 'string') {
          return { id: label, name: label, shortcut: null };
        }
        const id = label.id ?? `${category.id}_${index}`;
        return { id, name: label.name ?? id, shortcut: label.shortcut ?? null };
      }),
    };
  });

  return {
    categories,
    imageDirectory: parsed.data.image_directory ?? null,
    leaseDurationSeconds: parsed.data.reservation_timeout_seconds ?? null,
  };
}

/**
 * Read the taxonomy file; a missing file yields an empty taxonomy
 */
export async function loadTaxonomy(filePath: string): Promise<Taxonomy> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      logger.warn('Taxonomy file not found, continuing without categories', { filePath });
      return EMPTY_TAXONOMY;
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new AppError(ErrorCode.CONFIGURATION_ERROR, `Taxonomy file is not valid JSON: ${filePath}`, 500, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const taxonomy = parseTaxonomy(raw);
  logger.info('Taxonomy loaded', { filePath, categories: taxonomy.categories.length });
  return taxonomy;
}

export interface VocabularyReport {
  unknownCategories: string[];
  unknownLabels: string[];
}

/**
 * Categories and `category/label` pairs in `selection` the taxonomy does not define
 */
export function findUnknownLabels(taxonomy: Taxonomy, selection: LabelSelection): VocabularyReport {
  const report: VocabularyReport = { unknownCategories: [], unknownLabels: [] };

  for (const [categoryId, labelIds] of Object.entries(selection)) {
    const category = taxonomy.categories.find((c) => c.id === categoryId);
    if (!category) {
      report.unknownCategories.push(categoryId);
      continue;
    }
    const known = new Set(category.labels.map((label) => label.id));
    for (const labelId of labelIds) {
      if (!known.has(labelId)) {
        report.unknownLabels.push(`${categoryId}/${labelId}`);
      }
    }
  }

  return report;
}

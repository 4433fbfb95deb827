import { z } from 'zod';
import { ItemState, LabelSelection } from '../types/item.types';

/**
 * Label selection and persisted-value schemas
 */

export const labelSelectionSchema = z.record(
  z.string().min(1, 'Category id must not be empty'),
  z.array(z.string().min(1, 'Label id must not be empty'))
);

export const itemStateSchema = z.nativeEnum(ItemState);

/**
 * Copy of `labels` with category keys in sorted order
 */
export function sortSelection(labels: LabelSelection): LabelSelection {
  const sorted: LabelSelection = {};
  for (const key of Object.keys(labels).sort()) {
    const values = labels[key];
    if (values) sorted[key] = values;
  }
  return sorted;
}

// Sorted keys, so equal selections store equal text
export function serializeLabels(labels: LabelSelection): string {
  return JSON.stringify(sortSelection(labels));
}

export function parseStoredLabels(raw: string | null): LabelSelection {
  if (!raw) return {};
  return labelSelectionSchema.parse(JSON.parse(raw));
}

/**
 * Label taxonomy types (normalised form of config.json)
 */

export interface TaxonomyLabel {
  id: string;
  name: string;
  shortcut: string | null;
}

export interface TaxonomyCategory {
  id: string;
  name: string;
  labels: TaxonomyLabel[];
}

export interface Taxonomy {
  categories: TaxonomyCategory[];
  imageDirectory: string | null;
  leaseDurationSeconds: number | null;
}

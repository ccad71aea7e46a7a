/**
 * A fixed business category. Its examples define the semantic center
 * the engine compares questions against.
 */
export interface Category {
  /** Short machine-readable identifier, unique within a catalog */
  readonly id: string;
  /** Human-readable label (may equal id) */
  readonly displayName: string;
  /** One or more representative phrases, in order */
  readonly examples: readonly string[];
}

/**
 * Canonical order of the default catalog. Ties between equally similar
 * categories resolve to the one listed first.
 */
export const DEFAULT_CATEGORY_IDS = [
  'yorum',
  'ozel_talep',
  'teknik',
  'yanlis_hasarli',
  'orijinallik',
  'iade_degisim',
  'stok',
  'kargo_bilgileri',
  'siparis_teslimat',
] as const;

export type DefaultCategoryId = (typeof DEFAULT_CATEGORY_IDS)[number];

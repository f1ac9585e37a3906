/**
 * Display configuration
 */

export interface PrintOptions {
  /** Arrays with more elements than this are summarized */
  readonly threshold: number;
  /** Items shown at each edge of a summarized dimension */
  readonly edgeItems: number;
  /** Maximum decimals printed for floating values */
  readonly precision: number;
}

export const DEFAULT_PRINT_OPTIONS: PrintOptions = {
  threshold: 1000,
  edgeItems: 3,
  precision: 4,
};

export function resolvePrintOptions(overrides: Partial<PrintOptions> = {}): PrintOptions {
  return { ...DEFAULT_PRINT_OPTIONS, ...overrides };
}

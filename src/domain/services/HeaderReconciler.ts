import type { Header } from '../model/Header.js';
import type { ColumnMapping } from '../model/ColumnMapping.js';
import { headersEqual } from '../model/Header.js';
import { buildColumnMapping } from '../model/ColumnMapping.js';

/** Result of comparing a file's header against the canonical header of its directory. */
export type HeaderComparison =
  | { readonly kind: 'identical' }
  | { readonly kind: 'reordered' }
  | {
      readonly kind: 'mismatch';
      /** Canonical columns the file lacks, in canonical order. */
      readonly missing: readonly string[];
      /** File columns not in the canonical header, in file order. */
      readonly extra: readonly string[];
    };

/**
 * Domain service that owns the canonical header of one directory.
 *
 * Pure logic: compares file headers against the canonical one and derives the column mapping
 * used to realign each file's rows. Comparison results are diagnostic only.
 */
export class HeaderReconciler {
  private readonly canonicalNames: ReadonlySet<string>;

  constructor(readonly canonical: Header) {
    if (canonical.length === 0) {
      throw new Error('HeaderReconciler: canonical header must have at least one column');
    }
    this.canonicalNames = new Set(canonical);
  }

  compare(fileHeader: Header): HeaderComparison {
    if (headersEqual(this.canonical, fileHeader)) {
      return { kind: 'identical' };
    }

    const fileNames = new Set(fileHeader);
    const missing = [...this.canonicalNames].filter((name) => !fileNames.has(name));
    const extra = [...fileNames].filter((name) => !this.canonicalNames.has(name));

    if (missing.length === 0 && extra.length === 0) {
      return { kind: 'reordered' };
    }
    return { kind: 'mismatch', missing, extra };
  }

  mappingFor(fileHeader: Header): ColumnMapping {
    return buildColumnMapping(this.canonical, fileHeader);
  }
}
